import path from "node:path";
import { contextFilePath, type Rule } from "hookwarden-core";

const WRITE_TOOLS = new Set(["Write", "Edit"]);
const SAFE_SUFFIXES = [".example", ".template", ".sample"];
const BLOCKED_RE = /(^|\/)\.env(\.local|\.production|\.staging|\.development)?$/;

export const noEnvCommit: Rule = {
  id: "no-env-commit",
  description: "Prevents writing to .env files that may contain secrets",
  severity: "error",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (!WRITE_TOOLS.has(ctx.toolName)) return [];
    const filePath = contextFilePath(ctx);
    if (!filePath) return [];

    const base = path.basename(filePath);
    if (SAFE_SUFFIXES.some((s) => base.endsWith(s))) return [];
    if (!BLOCKED_RE.test(filePath)) return [];

    return [
      {
        ruleId: this.id,
        message: `Writing to env file is blocked: ${filePath}`,
        severity: this.severity,
        filePath,
        suggestion: "Use .env.example for templates; keep real .env out of version control.",
      },
    ];
  },
};
