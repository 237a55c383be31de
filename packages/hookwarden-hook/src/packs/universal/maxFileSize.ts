import { contextFilePath, type Rule } from "hookwarden-core";
import { numberOption } from "../options.js";

const WRITE_TOOLS = new Set(["Write", "Edit"]);
const DEFAULT_LIMIT = 500;

export function countLines(content: string): number {
  const newlines = content.split("\n").length - 1;
  return newlines + (content && !content.endsWith("\n") ? 1 : 0);
}

export const maxFileSize: Rule = {
  id: "max-file-size",
  description: "Warns when a file exceeds a configurable line-count limit after Write/Edit",
  severity: "warning",
  events: ["PostToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (!WRITE_TOOLS.has(ctx.toolName)) return [];
    if (ctx.fileContent === undefined) return [];

    const limit = numberOption(ctx, this.id, "limit", DEFAULT_LIMIT);
    const lines = countLines(ctx.fileContent);
    if (lines <= limit) return [];

    const filePath = contextFilePath(ctx) ?? undefined;
    return [
      {
        ruleId: this.id,
        message: `File ${filePath ?? "(unknown)"} has ${lines} lines (limit: ${limit})`,
        severity: this.severity,
        filePath,
        suggestion: `Consider splitting the file into smaller modules (limit is ${limit} lines).`,
      },
    ];
  },
};
