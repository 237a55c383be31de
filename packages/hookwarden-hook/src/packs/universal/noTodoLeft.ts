import type { Finding, Rule } from "hookwarden-core";
import { readChangedFile, sessionChangedFiles } from "../changedFiles.js";

// Only markers that follow a comment opener (#, // or /*).
const TODO_RE = /(?:#|\/\/|\/\*)\s*(?:TODO|FIXME|HACK|XXX)\b/g;

export const noTodoLeft: Rule = {
  id: "no-todo-left",
  description: "Detects leftover TODO/FIXME/HACK/XXX comments in changed files",
  severity: "info",
  events: ["Stop"],
  pack: "universal",

  async evaluate(ctx) {
    const findings: Finding[] = [];
    for (const filePath of sessionChangedFiles(ctx)) {
      const content = await readChangedFile(ctx, filePath);
      if (content === null) continue;

      const count = [...content.matchAll(TODO_RE)].length;
      if (count === 0) continue;
      findings.push({
        ruleId: this.id,
        message: `Found ${count} TODO/FIXME comment(s) in ${filePath}`,
        severity: this.severity,
        filePath,
        suggestion: "Review and resolve TODO comments before finalizing.",
      });
    }
    return findings;
  },
};
