import { minimatch } from "minimatch";
import { contextCommand, createLogger, type Rule } from "hookwarden-core";
import { stringListOption } from "../options.js";

const log = createLogger("no-bash-file-write");

const WRITE_PATTERNS: { re: RegExp; label: string }[] = [
  { re: /\b(?:cat|echo|printf)\b.*>{1,2}\s*(\S+)/, label: "redirect (>/>>)" },
  { re: /\btee\s+(?:-a\s+)?(\S+)/, label: "tee" },
  { re: /\bsed\s+(?:.*\s)?-i\s/, label: "sed -i" },
  { re: /\bcp\s+\S+\s+(\S+)/, label: "cp" },
  { re: /\bmv\s+\S+\s+(\S+)/, label: "mv" },
  { re: /\bperl\s+.*-[a-zA-Z]*p[a-zA-Z]*i/, label: "perl -pi -e" },
  { re: /\bawk\b.*>\s*(\S+)/, label: "awk >" },
  { re: /\bdd\b.*\bof=(\S+)/, label: "dd of=" },
  { re: /\bpython[23]?\s+-c\s+.*(?:open\s*\(|\.write\s*\(|Path\s*\()/, label: "python -c write" },
  { re: /\bcat\b.*<<\s*['"\\]?\w+/, label: "heredoc" },
];

// $(cat <<'EOF' ...) passes a multi-line argument (commit messages, PR bodies); it writes no file.
const HEREDOC_CMD_SUB_RE = /\$\(\s*cat\s+<</;

const TARGET_EXTRACTORS = [
  />{1,2}\s*(\S+)/g,
  /\btee\s+(?:-a\s+)?(\S+)/g,
  /\bcp\s+\S+\s+(\S+)/g,
  /\bmv\s+\S+\s+(\S+)/g,
  /\bdd\b.*\bof=(\S+)/g,
];

export function extractTargetPaths(command: string): string[] {
  const paths: string[] = [];
  for (const re of TARGET_EXTRACTORS) {
    for (const m of command.matchAll(re)) {
      const p = (m[1] ?? "").replace(/^['"]+|['"]+$/g, "");
      if (p) paths.push(p);
    }
  }
  return paths;
}

function commandAllowed(command: string, patterns: string[]): boolean {
  return patterns.some((p) => {
    try {
      return new RegExp(p).test(command);
    } catch (err) {
      log.warning(`ignoring invalid allow pattern ${JSON.stringify(p)}`, err);
      return false;
    }
  });
}

function pathAllowed(target: string, globs: string[]): boolean {
  return globs.some((g) => minimatch(target, g, { dot: true }));
}

export const noBashFileWrite: Rule = {
  id: "no-bash-file-write",
  description: "Blocks file writes via Bash (cat >, tee, sed -i, cp, heredocs, etc.)",
  severity: "error",
  events: ["PreToolUse"],
  pack: "security",

  evaluate(ctx) {
    if (ctx.toolName !== "Bash") return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const allowPatterns = stringListOption(ctx, this.id, "allow_patterns");
    const allowPaths = stringListOption(ctx, this.id, "allow_paths");
    if (allowPatterns.length > 0 && commandAllowed(command, allowPatterns)) return [];

    for (const { re, label } of WRITE_PATTERNS) {
      if (!re.test(command)) continue;
      if (label === "heredoc" && HEREDOC_CMD_SUB_RE.test(command)) continue;

      const targets = extractTargetPaths(command);
      if (allowPaths.length > 0 && targets.length > 0 && targets.every((t) => pathAllowed(t, allowPaths))) {
        continue;
      }

      // One finding per command.
      return [
        {
          ruleId: this.id,
          message: `Bash file write detected via ${label}`,
          severity: this.severity,
          filePath: targets[0],
          suggestion: "Use the Write or Edit tool instead of writing files through Bash.",
        },
      ];
    }

    return [];
  },
};
