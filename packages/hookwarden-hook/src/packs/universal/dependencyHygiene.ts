import { contextCommand, type Finding, type Rule } from "hookwarden-core";

const PIP_INSTALL_RE = /\bpip3?\s+install\b/i;
// Editable local installs and requirements files are fine.
const PIP_LOCAL_DEV_RE = /\bpip3?\s+install\s+-e\s+\./i;
const PIP_REQUIREMENTS_RE = /\bpip3?\s+install\s+-r\s+/i;
// Bare `npm install` and `npm ci` are fine.
const NPM_INSTALL_PKG_RE = /\bnpm\s+install\s+(?!-)[a-zA-Z@]/i;

export const dependencyHygiene: Rule = {
  id: "dependency-hygiene",
  description: "Suggests using lockfile-based tools instead of ad-hoc pip/npm install",
  severity: "warning",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (ctx.toolName !== "Bash") return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const findings: Finding[] = [];
    if (PIP_INSTALL_RE.test(command) && !PIP_LOCAL_DEV_RE.test(command) && !PIP_REQUIREMENTS_RE.test(command)) {
      findings.push({
        ruleId: this.id,
        message: "Ad-hoc pip install detected",
        severity: this.severity,
        suggestion: "Use poetry/uv add to keep dependencies in a lockfile.",
      });
    }
    if (NPM_INSTALL_PKG_RE.test(command)) {
      findings.push({
        ruleId: this.id,
        message: "Ad-hoc npm install <package> detected",
        severity: this.severity,
        suggestion: "Use npm ci for reproducible installs.",
      });
    }
    return findings;
  },
};
