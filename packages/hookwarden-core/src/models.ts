export type Severity = "error" | "warning" | "info";

// Higher rank blocks harder.
export const SEVERITY_RANK: Record<Severity, number> = {
  error: 3,
  warning: 2,
  info: 1,
};

export function isSeverity(value: unknown): value is Severity {
  return value === "error" || value === "warning" || value === "info";
}

export function isBlockingSeverity(severity: Severity): boolean {
  return severity === "error";
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * Lifecycle events the agent supervisor can invoke the hook for.
 */
export const HOOK_EVENTS = [
  "PreToolUse",
  "PostToolUse",
  "Stop",
  "SessionStart",
  "SessionEnd",
  "UserPromptSubmit",
  "SubagentStart",
  "SubagentStop",
  "Notification",
  "PreCompact",
  "PostToolUseFailure",
  "PermissionRequest",
  "ConfigChange",
  "WorktreeCreate",
  "WorktreeRemove",
  "TeammateIdle",
  "TaskCompleted",
] as const;

export type HookEvent = (typeof HOOK_EVENTS)[number];

export function parseHookEvent(value: string): HookEvent | null {
  const match = HOOK_EVENTS.find((e) => e === value);
  return match ?? null;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Session-scoped state that outlives a single hook invocation. */
export type SessionState = JsonObject;

export type Finding = {
  ruleId: string;
  message: string;
  severity: Severity;
  filePath?: string;
  line?: number;
  suggestion?: string;
};

function isOptional(value: unknown, type: "string" | "number"): boolean {
  return value === undefined || typeof value === type;
}

/** Structural check for findings returned by rules the hook did not compile. */
export function isFinding(value: unknown): value is Finding {
  if (typeof value !== "object" || value === null) return false;
  if (!("ruleId" in value) || !("message" in value) || !("severity" in value)) return false;
  return (
    typeof value.ruleId === "string" &&
    typeof value.message === "string" &&
    isSeverity(value.severity) &&
    isOptional("filePath" in value ? value.filePath : undefined, "string") &&
    isOptional("line" in value ? value.line : undefined, "number") &&
    isOptional("suggestion" in value ? value.suggestion : undefined, "string")
  );
}

export function findingToJson(f: Finding): JsonObject {
  return {
    rule_id: f.ruleId,
    message: f.message,
    severity: f.severity,
    file_path: f.filePath ?? null,
    line: f.line ?? null,
    suggestion: f.suggestion ?? null,
  };
}

/** Per-rule options keyed by rule id, as read from the project configuration. */
export type RulesConfig = Record<string, Record<string, unknown>>;

export type EventContext = {
  event: HookEvent;
  toolName: string;
  toolInput: Record<string, unknown>;
  projectDir: string;
  fileContent?: string;
  fileContentBefore?: string;
  prompt?: string;
  subagentOutput?: string;
  notificationType?: string;
  compactSource?: string;
  config: RulesConfig;
  sessionState: SessionState;
};

export function contextFilePath(ctx: EventContext): string | null {
  const v = ctx.toolInput.file_path;
  return typeof v === "string" && v.length > 0 ? v : null;
}

export function contextCommand(ctx: EventContext): string | null {
  const v = ctx.toolInput.command;
  return typeof v === "string" && v.length > 0 ? v : null;
}

export function ruleOptions(ctx: EventContext, ruleId: string): Record<string, unknown> {
  return ctx.config[ruleId] ?? {};
}

export type Rule = {
  id: string;
  description: string;
  severity: Severity;
  events: readonly HookEvent[];
  pack: string;
  evaluate(ctx: EventContext): Finding[] | Promise<Finding[]>;
};

export function ruleMatchesEvent(rule: Rule, event: HookEvent): boolean {
  return rule.events.includes(event);
}

export function isRule(value: unknown): value is Rule {
  if (typeof value !== "object" || value === null) return false;
  if (
    !("id" in value) ||
    !("description" in value) ||
    !("severity" in value) ||
    !("events" in value) ||
    !("pack" in value) ||
    !("evaluate" in value)
  ) {
    return false;
  }
  return (
    typeof value.id === "string" &&
    value.id.length > 0 &&
    typeof value.description === "string" &&
    typeof value.pack === "string" &&
    isSeverity(value.severity) &&
    Array.isArray(value.events) &&
    value.events.every((e: unknown) => typeof e === "string" && parseHookEvent(e) !== null) &&
    typeof value.evaluate === "function"
  );
}
