import { createLogger } from "./logger.js";
import { isBlockingSeverity, isJsonObject, type Finding, type JsonValue, type RulesConfig, type SessionState, type Severity } from "./models.js";

/**
 * Circuit breaker for noisy rules.
 *
 * Tracks per-rule fire counts in session state and progressively degrades
 * error findings: error -> warning -> info -> suppressed. Only error findings
 * are counted; warnings and info pass through and never touch a record.
 *
 * Security-critical rules are tracked but never degraded.
 */

const log = createLogger("circuit-breaker");

export const PROTECTED_RULES: ReadonlySet<string> = new Set(["no-secrets", "no-env-commit"]);

export const GLOBAL_BREAKER_KEY = "_circuit_breaker_global";
export const SESSION_KEY = "circuit_breaker";

export type BreakerState = "active" | "degraded" | "passive" | "open";

const BREAKER_STATES: readonly BreakerState[] = ["active", "degraded", "passive", "open"];

export type BreakerConfig = {
  enabled: boolean;
  degraded_after: number;
  passive_after: number;
  open_after: number;
  reset_after_clean: number;
  reset_after_minutes: number;
};

export const DEFAULT_BREAKER_CONFIG: Readonly<BreakerConfig> = {
  enabled: true,
  degraded_after: 3,
  passive_after: 6,
  open_after: 10,
  reset_after_clean: 5,
  reset_after_minutes: 30,
};

export type BreakerTransition = {
  from: BreakerState;
  to: BreakerState;
  ts: number;
  reason: "fire_count" | "reset";
};

export type BreakerRecord = {
  fire_count: number;
  clean_count: number;
  // epoch milliseconds
  first_fire_ts: number | null;
  last_fire_ts: number | null;
  state: BreakerState;
  transitions: JsonValue[];
};

export type BreakerSummary = {
  ruleId: string;
  state: BreakerState;
  fireCount: number;
  cleanCount: number;
  lastFireTs: number | null;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isBreakerState(value: unknown): value is BreakerState {
  return typeof value === "string" && BREAKER_STATES.some((s) => s === value);
}

function applyOverrides(target: BreakerConfig, block: unknown): void {
  if (!isPlainObject(block)) return;
  if (typeof block.enabled === "boolean") target.enabled = block.enabled;
  if (isFiniteNumber(block.degraded_after)) target.degraded_after = block.degraded_after;
  if (isFiniteNumber(block.passive_after)) target.passive_after = block.passive_after;
  if (isFiniteNumber(block.open_after)) target.open_after = block.open_after;
  if (isFiniteNumber(block.reset_after_clean)) target.reset_after_clean = block.reset_after_clean;
  if (isFiniteNumber(block.reset_after_minutes)) target.reset_after_minutes = block.reset_after_minutes;
}

/** Global defaults from the reserved key, then the rule's own `circuit_breaker` block. */
export function resolveBreakerConfig(ruleId: string, rulesConfig: RulesConfig): BreakerConfig {
  const cfg: BreakerConfig = { ...DEFAULT_BREAKER_CONFIG };
  applyOverrides(cfg, rulesConfig[GLOBAL_BREAKER_KEY]);
  applyOverrides(cfg, rulesConfig[ruleId]?.circuit_breaker);
  return cfg;
}

export function stateForFireCount(fireCount: number, cfg: BreakerConfig): BreakerState {
  if (fireCount >= cfg.open_after) return "open";
  if (fireCount >= cfg.passive_after) return "passive";
  if (fireCount >= cfg.degraded_after) return "degraded";
  return "active";
}

/** Returns null when the finding must be suppressed. */
export function downgradeSeverity(severity: Severity, state: BreakerState): Severity | null {
  if (!isBlockingSeverity(severity)) return severity;
  switch (state) {
    case "active":
      return "error";
    case "degraded":
      return "warning";
    case "passive":
      return "info";
    case "open":
      return null;
  }
}

export function emptyRecord(): BreakerRecord {
  return {
    fire_count: 0,
    clean_count: 0,
    first_fire_ts: null,
    last_fire_ts: null,
    state: "active",
    transitions: [],
  };
}

function count(value: JsonValue | undefined): number {
  return isFiniteNumber(value) && value >= 0 ? Math.floor(value) : 0;
}

function timestamp(value: JsonValue | undefined): number | null {
  return isFiniteNumber(value) ? value : null;
}

/**
 * Hand-edited or half-written session files must not break the pipeline:
 * every field that is missing or of the wrong shape falls back to its default.
 */
export function normalizeRecord(raw: JsonValue | undefined): BreakerRecord {
  if (!isJsonObject(raw)) return emptyRecord();
  return {
    fire_count: count(raw.fire_count),
    clean_count: count(raw.clean_count),
    first_fire_ts: timestamp(raw.first_fire_ts),
    last_fire_ts: timestamp(raw.last_fire_ts),
    state: isBreakerState(raw.state) ? raw.state : "active",
    transitions: Array.isArray(raw.transitions) ? [...raw.transitions] : [],
  };
}

function recordTransition(record: BreakerRecord, transition: BreakerTransition): void {
  record.transitions.push(transition);
}

function resetRecord(record: BreakerRecord, ruleId: string, now: number): void {
  const oldState = record.state;
  record.fire_count = 0;
  record.clean_count = 0;
  record.first_fire_ts = null;
  record.last_fire_ts = null;
  if (oldState !== "active") {
    recordTransition(record, { from: oldState, to: "active", ts: now, reason: "reset" });
    log.debug(`${ruleId} reset to active (from=${oldState})`);
  }
  record.state = "active";
}

function shouldResetByTime(record: BreakerRecord, cfg: BreakerConfig, now: number): boolean {
  if (record.last_fire_ts === null) return false;
  const elapsedMinutes = (now - record.last_fire_ts) / 60_000;
  return elapsedMinutes >= cfg.reset_after_minutes;
}

/**
 * Normalizes every stored record into a Map keyed by rule id. Rule ids come
 * from custom modules too, so the table is never indexed as a plain object.
 */
function openStore(sessionState: SessionState): Map<string, BreakerRecord> {
  const existing = sessionState[SESSION_KEY];
  const records = new Map<string, BreakerRecord>();
  if (!isJsonObject(existing)) return records;
  for (const [ruleId, value] of Object.entries(existing)) {
    records.set(ruleId, normalizeRecord(value));
  }
  return records;
}

// Object.fromEntries defines own properties, so an id such as "__proto__" stays a key.
function closeStore(sessionState: SessionState, records: Map<string, BreakerRecord>): void {
  sessionState[SESSION_KEY] = Object.fromEntries(records);
}

function annotate(finding: Finding, fireCount: number, severity: Severity): string {
  return `[Circuit breaker: fired ${fireCount}x, degraded from ${finding.severity} to ${severity}] ${finding.message}`;
}

export function applyCircuitBreaker(
  findings: readonly Finding[],
  sessionState: SessionState,
  rulesConfig: RulesConfig,
  now: number = Date.now(),
): Finding[] {
  const records = openStore(sessionState);

  const fired = new Set<string>();
  for (const f of findings) {
    if (isBlockingSeverity(f.severity)) fired.add(f.ruleId);
  }

  // Clean-side accounting for tracked rules that stayed quiet this round.
  for (const [ruleId, record] of records) {
    if (fired.has(ruleId)) continue;
    const cfg = resolveBreakerConfig(ruleId, rulesConfig);
    if (!PROTECTED_RULES.has(ruleId) && !cfg.enabled) continue;
    record.clean_count += 1;
    if (record.clean_count >= cfg.reset_after_clean) {
      resetRecord(record, ruleId, now);
    }
  }

  const result: Finding[] = [];
  for (const finding of findings) {
    // Protection is decided before the enabled flag so configuration cannot turn it off.
    const isProtected = PROTECTED_RULES.has(finding.ruleId);
    const cfg = resolveBreakerConfig(finding.ruleId, rulesConfig);

    if (!isProtected && !cfg.enabled) {
      result.push(finding);
      continue;
    }

    if (!isBlockingSeverity(finding.severity)) {
      result.push(finding);
      continue;
    }

    let record = records.get(finding.ruleId);
    if (!record) {
      record = emptyRecord();
      records.set(finding.ruleId, record);
    }

    if (shouldResetByTime(record, cfg, now)) {
      resetRecord(record, finding.ruleId, now);
    }

    record.fire_count += 1;
    record.clean_count = 0;
    if (record.first_fire_ts === null) record.first_fire_ts = now;
    record.last_fire_ts = now;

    if (isProtected) {
      record.state = "active";
      result.push(finding);
      continue;
    }

    const nextState = stateForFireCount(record.fire_count, cfg);
    if (nextState !== record.state) {
      recordTransition(record, { from: record.state, to: nextState, ts: now, reason: "fire_count" });
      log.info(`${finding.ruleId} transitioned ${record.state} -> ${nextState} (fire_count=${record.fire_count})`);
      record.state = nextState;
    }

    const severity = downgradeSeverity(finding.severity, record.state);
    if (severity === null) {
      log.info(`suppressing ${finding.ruleId} (fire_count=${record.fire_count}, state=open)`);
      continue;
    }

    if (severity === finding.severity) {
      result.push(finding);
      continue;
    }

    result.push({
      ...finding,
      severity,
      message: annotate(finding, record.fire_count, severity),
    });
  }

  closeStore(sessionState, records);
  return result;
}

/** Read-only view of tracked records, for reports and status output. */
export function summarizeBreakers(sessionState: SessionState): BreakerSummary[] {
  const existing = sessionState[SESSION_KEY];
  if (!isJsonObject(existing)) return [];
  return Object.entries(existing)
    .map(([ruleId, value]) => {
      const record = normalizeRecord(value);
      return {
        ruleId,
        state: record.state,
        fireCount: record.fire_count,
        cleanCount: record.clean_count,
        lastFireTs: record.last_fire_ts,
      };
    })
    .sort((a, b) => a.ruleId.localeCompare(b.ruleId));
}
