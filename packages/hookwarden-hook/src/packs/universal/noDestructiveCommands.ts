import path from "node:path";
import { contextCommand, type Finding, type Rule, type Severity } from "hookwarden-core";

const SAFE_RM_TARGETS = new Set(["node_modules", "__pycache__", ".cache", "dist", "build", ".venv", ".pytest_cache"]);
const PROTECTED_BRANCHES = new Set(["main", "master", "develop", "production", "release"]);

const RM_RF_RE = /\brm\s+-[^\s]*r[^\s]*f|\brm\s+-[^\s]*f[^\s]*r/i;
const RM_ROOT_RE = /\brm\s+-[^\s]*r[^\s]*f\s+\/(?:\s|$)|\brm\s+-[^\s]*f[^\s]*r\s+\/(?:\s|$)/;
const RM_HOME_RE = /\brm\s+-[^\s]*(?:rf|fr)\s+(?:~|\$HOME)(?:\s|\/|$)/i;
const GIT_BRANCH_DELETE_RE = /\bgit\s+branch\s+-D\s+(\S+)/i;

type Check = {
  re: RegExp;
  message: string;
  suggestion: string;
  // Overrides the rule's declared severity.
  severity?: Severity;
};

const CHECKS: Check[] = [
  {
    re: /\bDROP\s+TABLE\b/i,
    message: "Destructive command detected: DROP TABLE",
    suggestion: "Ensure you have a backup before dropping tables.",
  },
  {
    re: /\bDROP\s+DATABASE\b/i,
    message: "Destructive command detected: DROP DATABASE",
    suggestion: "Ensure you have a backup before dropping databases.",
  },
  {
    re: /\bgit\s+reset\s+--hard\b/i,
    message: "Destructive command detected: git reset --hard",
    suggestion: "Consider using git stash instead of git reset --hard.",
  },
  {
    re: /\bgit\s+clean\s+-fd\b/i,
    message: "Destructive command detected: git clean -fd",
    suggestion: "Run git clean -n first to preview what will be removed.",
  },
  {
    re: /\bchmod\s+(?:-R\s+)?777\b/i,
    message: "Overly permissive command detected: chmod 777",
    suggestion: "Use more restrictive permissions (e.g. chmod 755 for dirs, 644 for files).",
  },
  {
    re: /\bmkfs\b/i,
    message: "Catastrophic command detected: mkfs (filesystem format)",
    suggestion: "mkfs will destroy all data on the target device.",
    severity: "error",
  },
  {
    re: /\bdd\b.*\bif=\/dev\/zero\b/i,
    message: "Catastrophic command detected: dd if=/dev/zero (disk wipe)",
    suggestion: "dd if=/dev/zero will overwrite data irreversibly.",
    severity: "error",
  },
  {
    re: /:\(\)\s*\{\s*:\|:\s*&\s*\}\s*;|\.\/:0\b/,
    message: "Fork bomb detected",
    suggestion: "This command will exhaust system resources.",
    severity: "error",
  },
  {
    re: /\bdocker\s+system\s+prune\b.*-a\b.*--volumes\b/i,
    message: "Destructive command detected: docker system prune -a --volumes",
    suggestion: "This removes all unused containers, images, networks, and volumes.",
  },
  {
    re: /\bkubectl\s+delete\s+namespace\b/i,
    message: "Destructive command detected: kubectl delete namespace",
    suggestion: "Verify you are not targeting a production namespace.",
  },
];

/** True when every rm -rf target is a build or cache directory. */
export function rmTargetsSafe(command: string): boolean {
  const parts = command.split(/\brm\s+-\S+\s+/);
  if (parts.length < 2) return false;

  const tail = parts[parts.length - 1] ?? "";
  const targets = (tail.split(/[;&|]/)[0] ?? "").trim().split(/\s+/).filter(Boolean);
  if (targets.length === 0) return false;

  return targets.every((t) => {
    const cleaned = t.replace(/^['"]+|['"]+$/g, "").replace(/\/+$/, "");
    return SAFE_RM_TARGETS.has(path.basename(cleaned));
  });
}

export const noDestructiveCommands: Rule = {
  id: "no-destructive-commands",
  description: "Warns on destructive commands like rm -rf, DROP TABLE, git reset --hard",
  severity: "warning",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (ctx.toolName !== "Bash") return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const findings: Finding[] = [];

    if (RM_RF_RE.test(command)) {
      if (RM_ROOT_RE.test(command) || RM_HOME_RE.test(command)) {
        findings.push({
          ruleId: this.id,
          message: "Catastrophic command detected: rm -rf on root or home directory",
          severity: "error",
          suggestion: "This would destroy critical system or user files. Never run rm -rf on / or ~.",
        });
      } else if (!rmTargetsSafe(command)) {
        findings.push({
          ruleId: this.id,
          message: "Destructive command detected: rm -rf",
          severity: this.severity,
          suggestion: "Double-check the target path before running rm -rf.",
        });
      }
    }

    for (const check of CHECKS) {
      if (!check.re.test(command)) continue;
      findings.push({
        ruleId: this.id,
        message: check.message,
        severity: check.severity ?? this.severity,
        suggestion: check.suggestion,
      });
    }

    const branchMatch = GIT_BRANCH_DELETE_RE.exec(command);
    const branch = branchMatch?.[1];
    if (branch && PROTECTED_BRANCHES.has(branch.toLowerCase())) {
      findings.push({
        ruleId: this.id,
        message: `Destructive command detected: git branch -D ${branch}`,
        severity: "error",
        suggestion: `Deleting the '${branch}' branch is dangerous. Use a feature branch instead.`,
      });
    }

    return findings;
  },
};
