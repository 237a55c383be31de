import { contextCommand, type Rule } from "hookwarden-core";

const BASH_TOOLS = new Set(["Bash", "bash"]);

// `git push` with --force or -f that names main or master anywhere after it.
const FORCE_PUSH_RE = /git\s+push\b(?=.*(?:--force|-f\b))(?=.*\b(main|master)\b)/i;

export const noForcePush: Rule = {
  id: "no-force-push",
  description: "Prevents force-pushing to main or master branches",
  severity: "error",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (!BASH_TOOLS.has(ctx.toolName)) return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const match = FORCE_PUSH_RE.exec(command);
    if (!match) return [];
    const branch = match[1] ?? "main";
    return [
      {
        ruleId: this.id,
        message: `Force push to '${branch}' is blocked`,
        severity: this.severity,
        suggestion: `Never force-push to ${branch}. Push to a feature branch instead.`,
      },
    ];
  },
};
