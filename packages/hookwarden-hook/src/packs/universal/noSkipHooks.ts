import { contextCommand, type Finding, type Rule } from "hookwarden-core";

const NO_VERIFY_RE = /\bgit\s+commit\b.*--no-verify\b/i;
const NO_GPG_SIGN_RE = /\bgit\s+commit\b.*--no-gpg-sign\b/i;

export const noSkipHooks: Rule = {
  id: "no-skip-hooks",
  description: "Warns on git commit --no-verify or --no-gpg-sign",
  severity: "warning",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (ctx.toolName !== "Bash") return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const findings: Finding[] = [];
    if (NO_VERIFY_RE.test(command)) {
      findings.push({
        ruleId: this.id,
        message: "git commit --no-verify skips pre-commit hooks",
        severity: this.severity,
        suggestion: "Remove --no-verify to run pre-commit hooks. Fix hook issues instead of bypassing them.",
      });
    }
    if (NO_GPG_SIGN_RE.test(command)) {
      findings.push({
        ruleId: this.id,
        message: "git commit --no-gpg-sign skips commit signing",
        severity: this.severity,
        suggestion: "Remove --no-gpg-sign if your project requires signed commits.",
      });
    }
    return findings;
  },
};
