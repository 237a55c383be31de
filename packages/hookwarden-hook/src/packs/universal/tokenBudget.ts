import { isJsonObject, type EventContext, type Finding, type JsonObject, type Rule } from "hookwarden-core";
import { numberOption, sessionNumber } from "../options.js";

const DEFAULT_MAX_INVOCATIONS = 200;
const DEFAULT_WARN_PERCENT = 80;

function budgetState(ctx: EventContext): JsonObject {
  const existing = ctx.sessionState.token_budget;
  if (isJsonObject(existing)) return existing;
  const created: JsonObject = {};
  ctx.sessionState.token_budget = created;
  return created;
}

function invocationCounts(budget: JsonObject): JsonObject {
  const existing = budget.tool_invocations;
  if (isJsonObject(existing)) return existing;
  const created: JsonObject = {};
  budget.tool_invocations = created;
  return created;
}

function formatDuration(ms: number): string {
  const elapsed = Math.max(0, Math.floor(ms / 1000));
  return `${Math.floor(elapsed / 60)}m${elapsed % 60}s`;
}

export const tokenBudget: Rule = {
  id: "token-budget",
  description: "Tracks session activity and warns on excessive tool invocations",
  severity: "warning",
  events: ["PostToolUse", "Stop"],
  pack: "universal",

  evaluate(ctx) {
    const budget = budgetState(ctx);
    const maxInvocations = numberOption(ctx, this.id, "max_tool_invocations", DEFAULT_MAX_INVOCATIONS);

    if (ctx.event === "PostToolUse") {
      if (typeof budget.session_start_time !== "number") budget.session_start_time = Date.now();

      const counts = invocationCounts(budget);
      const tool = ctx.toolName || "unknown";
      counts[tool] = sessionNumber(counts[tool]) + 1;

      const content = ctx.toolInput.content;
      const bytes = typeof content === "string" ? Buffer.byteLength(content, "utf8") : 0;
      budget.total_content_bytes = sessionNumber(budget.total_content_bytes) + bytes;

      const total = Object.values(counts).reduce<number>((sum, n) => sum + sessionNumber(n), 0);
      budget.total_calls = total;

      const warnPercent = numberOption(ctx, this.id, "warn_at_percent", DEFAULT_WARN_PERCENT);
      // Fires once, on the call that crosses the threshold.
      if (total !== Math.floor((maxInvocations * warnPercent) / 100)) return [];
      return [
        {
          ruleId: this.id,
          message: `Session activity: ${total}/${maxInvocations} tool calls (${warnPercent}% of budget)`,
          severity: this.severity,
          suggestion: "Consider wrapping up or breaking this into smaller tasks.",
        },
      ];
    }

    if (ctx.event === "Stop") {
      const total = sessionNumber(budget.total_calls);
      if (total === 0) return [];

      const start = budget.session_start_time;
      const duration = typeof start === "number" ? ` over ${formatDuration(Date.now() - start)}` : "";
      const top = Object.entries(invocationCounts(budget))
        .map(([name, n]) => ({ name, count: sessionNumber(n) }))
        .sort((a, b) => b.count - a.count)
        .slice(0, 5)
        .map((t) => `${t.name}: ${t.count}`)
        .join(", ");
      const bytes = sessionNumber(budget.total_content_bytes).toLocaleString("en-US");

      const finding: Finding = {
        ruleId: this.id,
        message: `Session activity: ${total} tool calls${duration}, ${bytes} bytes written. Top: ${top}`,
        severity: total > maxInvocations ? "warning" : "info",
      };
      return [finding];
    }

    return [];
  },
};
