import path from "node:path";
import type { Rule } from "hookwarden-core";
import { isTestPath, sessionChangedFiles } from "../changedFiles.js";

const SOURCE_EXTENSIONS = new Set([".py", ".ts", ".tsx", ".js", ".jsx"]);
// Migrations, config and fixtures rarely come with tests of their own.
const SKIP_PATTERNS = ["migration", "alembic", "config", "settings", "conftest"];

export function isSourcePath(filePath: string): boolean {
  const ext = path.extname(filePath);
  if (!SOURCE_EXTENSIONS.has(ext)) return false;
  const stem = path.basename(filePath, ext).toLowerCase();
  return !SKIP_PATTERNS.some((p) => stem.includes(p));
}

export const testWithChanges: Rule = {
  id: "test-with-changes",
  description: "Warns when source files are changed but no test files were updated",
  severity: "warning",
  events: ["Stop"],
  pack: "universal",

  evaluate(ctx) {
    const changed = sessionChangedFiles(ctx);
    if (changed.length === 0) return [];

    const sources = changed.filter((f) => isSourcePath(f) && !isTestPath(f));
    const tests = changed.filter(isTestPath);
    if (sources.length === 0 || tests.length > 0) return [];

    return [
      {
        ruleId: this.id,
        message: `Changed ${sources.length} source file(s) but no test files were updated`,
        severity: this.severity,
        suggestion: "Consider adding or updating tests for the changed source files.",
      },
    ];
  },
};
