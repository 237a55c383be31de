import { contextCommand, createLogger, type Rule } from "hookwarden-core";
import { gitCleanStashes, gitHasChanges, gitStashPush, isGitRepo } from "../../git.js";
import { numberOption, stringListOption } from "../options.js";

const log = createLogger("git-checkpoint");

export const CHECKPOINT_PREFIX = "hookwarden-checkpoint";

const DEFAULT_TRIGGERS = [
  /\brm\s+-[^\s]*r[^\s]*f|\brm\s+-[^\s]*f[^\s]*r/i,
  /\bgit\s+reset\s+--hard\b/i,
  /\bgit\s+checkout\s+\.(?:\s|$)/i,
  /\bgit\s+clean\s+-fd\b/i,
  /\bDROP\s+TABLE\b/i,
  /\bDROP\s+DATABASE\b/i,
];

function compileTriggers(patterns: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const p of patterns) {
    try {
      compiled.push(new RegExp(p, "i"));
    } catch (err) {
      log.warning(`ignoring invalid trigger pattern ${JSON.stringify(p)}`, err);
    }
  }
  return compiled;
}

/**
 * Stashes uncommitted work before a destructive command and drops old
 * checkpoints at Stop. Off unless the project sets `enabled: true`.
 */
export const gitCheckpoint: Rule = {
  id: "git-checkpoint",
  description: "Creates a git safety checkpoint before destructive operations",
  severity: "info",
  events: ["PreToolUse", "Stop"],
  pack: "universal",

  evaluate(ctx) {
    if (ctx.config[this.id]?.enabled !== true) return [];

    if (ctx.event === "Stop") {
      const cleanupHours = numberOption(ctx, this.id, "cleanup_hours", 24);
      if (!isGitRepo(ctx.projectDir)) return [];
      const removed = gitCleanStashes(ctx.projectDir, CHECKPOINT_PREFIX, cleanupHours);
      if (removed === 0) return [];
      return [
        {
          ruleId: this.id,
          message: `Cleaned up ${removed} old checkpoint(s) (older than ${cleanupHours}h).`,
          severity: "info",
        },
      ];
    }

    if (ctx.toolName !== "Bash") return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const custom = stringListOption(ctx, this.id, "triggers");
    const triggers = custom.length > 0 ? compileTriggers(custom) : DEFAULT_TRIGGERS;
    if (!triggers.some((re) => re.test(command))) return [];

    if (!isGitRepo(ctx.projectDir) || !gitHasChanges(ctx.projectDir)) return [];

    const message = `${CHECKPOINT_PREFIX}-${Math.floor(Date.now() / 1000)}`;
    if (!gitStashPush(ctx.projectDir, message)) return [];
    return [
      {
        ruleId: this.id,
        message: "Created git checkpoint before destructive operation. Use `git stash pop` to recover if needed.",
        severity: this.severity,
        suggestion: `Checkpoint saved as: ${message}`,
      },
    ];
  },
};
