import path from "node:path";
import type { Finding, Rule } from "hookwarden-core";
import { isTestPath, readChangedFile, sessionChangedFiles } from "../changedFiles.js";

const JS_EXTENSIONS = new Set([".js", ".ts", ".tsx"]);
const PY_EXTENSIONS = new Set([".py"]);
const PRINT_ALLOWED_NAMES = new Set(["cli.py", "__main__.py", "manage.py", "setup.py"]);

const CONSOLE_LOG_RE = /\bconsole\.log\(/;
const DEBUGGER_RE = /\bdebugger\b/;
const PRINT_RE = /\bprint\(/;
const PDB_RE = /\bpdb\.set_trace\(\)/;
const BREAKPOINT_RE = /\bbreakpoint\(\)/;

export function findDebugArtifacts(filePath: string, content: string): string[] {
  const ext = path.extname(filePath);
  const artifacts: string[] = [];

  if (JS_EXTENSIONS.has(ext)) {
    if (CONSOLE_LOG_RE.test(content)) artifacts.push("console.log()");
    if (DEBUGGER_RE.test(content)) artifacts.push("debugger");
  }

  if (PY_EXTENSIONS.has(ext)) {
    const printAllowed =
      PRINT_ALLOWED_NAMES.has(path.basename(filePath).toLowerCase()) || content.includes("if __name__");
    if (PRINT_RE.test(content) && !printAllowed) artifacts.push("print()");
    if (PDB_RE.test(content)) artifacts.push("pdb.set_trace()");
    if (BREAKPOINT_RE.test(content)) artifacts.push("breakpoint()");
  }

  return artifacts;
}

export const noDebugArtifacts: Rule = {
  id: "no-debug-artifacts",
  description: "Detects leftover debug statements (console.log, print, debugger, breakpoint)",
  severity: "warning",
  events: ["Stop"],
  pack: "universal",

  async evaluate(ctx) {
    const findings: Finding[] = [];
    for (const filePath of sessionChangedFiles(ctx)) {
      if (isTestPath(filePath)) continue;
      const content = await readChangedFile(ctx, filePath);
      if (content === null) continue;

      const artifacts = findDebugArtifacts(filePath, content);
      if (artifacts.length === 0) continue;
      findings.push({
        ruleId: this.id,
        message: `Debug artifacts in ${filePath}: ${artifacts.join(", ")}`,
        severity: this.severity,
        filePath,
        suggestion: "Remove debug statements before finalizing.",
      });
    }
    return findings;
  },
};
