import { ruleOptions, type EventContext, type JsonValue } from "hookwarden-core";

export function numberOption(ctx: EventContext, ruleId: string, key: string, fallback: number): number {
  const v = ruleOptions(ctx, ruleId)[key];
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

export function stringListOption(ctx: EventContext, ruleId: string, key: string): string[] {
  const v = ruleOptions(ctx, ruleId)[key];
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === "string" && s.length > 0) : [];
}

export function sessionNumber(value: JsonValue | undefined, fallback = 0): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function sessionBoolean(value: JsonValue | undefined, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}
