import { contextCommand, type Rule } from "hookwarden-core";

// Force pushes are left to no-force-push.
const PUSH_MAIN_RE = /\bgit\s+push\b(?!.*(?:--force(?:-with-lease)?|-f\b)).*\b(main|master)\b/i;

export const noPushToMain: Rule = {
  id: "no-push-to-main",
  description: "Warns on direct push to main or master branches",
  severity: "warning",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (ctx.toolName !== "Bash") return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const match = PUSH_MAIN_RE.exec(command);
    if (!match) return [];
    const branch = match[1] ?? "main";
    return [
      {
        ruleId: this.id,
        message: `Direct push to '${branch}' detected`,
        severity: this.severity,
        suggestion: `Push to a feature branch and create a pull request instead of pushing directly to ${branch}.`,
      },
    ];
  },
};
