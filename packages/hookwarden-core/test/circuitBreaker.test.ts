import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  applyCircuitBreaker,
  normalizeRecord,
  resolveBreakerConfig,
  summarizeBreakers,
  type BreakerRecord,
} from "../src/circuitBreaker.js";
import { evaluate } from "../src/engine.js";
import { isJsonObject, type Finding, type RulesConfig, type SessionState } from "../src/models.js";

const MINUTE = 60_000;

function errorFinding(ruleId: string, message = `${ruleId} fired`): Finding {
  return { ruleId, message, severity: "error" };
}

function record(state: SessionState, ruleId: string): BreakerRecord {
  const store = state.circuit_breaker;
  if (!isJsonObject(store)) throw new Error("no circuit_breaker store");
  return normalizeRecord(store[ruleId]);
}

function hasRecord(state: SessionState, ruleId: string): boolean {
  const store = state.circuit_breaker;
  return isJsonObject(store) && ruleId in store;
}

describe("circuit breaker", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("degrades a noisy rule over ten rounds while protected rules keep blocking", () => {
    const state: SessionState = {};
    const rounds: Finding[][] = [];
    for (let i = 1; i <= 10; i++) {
      rounds.push(
        applyCircuitBreaker([errorFinding("no-secrets"), errorFinding("no-force-push")], state, {}, i * 1000),
      );
    }

    for (const out of rounds) {
      expect(out[0]).toEqual(errorFinding("no-secrets"));
    }

    const forcePushSeverity = rounds.map((out) => out.find((f) => f.ruleId === "no-force-push")?.severity ?? null);
    expect(forcePushSeverity).toEqual([
      "error",
      "error",
      "warning",
      "warning",
      "warning",
      "info",
      "info",
      "info",
      "info",
      null,
    ]);

    expect(rounds[2]?.[1]?.message).toBe(
      "[Circuit breaker: fired 3x, degraded from error to warning] no-force-push fired",
    );
    expect(rounds[5]?.[1]?.message).toBe(
      "[Circuit breaker: fired 6x, degraded from error to info] no-force-push fired",
    );

    const secrets = record(state, "no-secrets");
    expect(secrets.fire_count).toBe(10);
    expect(secrets.state).toBe("active");
    expect(secrets.transitions).toEqual([]);

    const forcePush = record(state, "no-force-push");
    expect(forcePush.fire_count).toBe(10);
    expect(forcePush.state).toBe("open");
    expect(forcePush.first_fire_ts).toBe(1000);
    expect(forcePush.last_fire_ts).toBe(10_000);
    expect(forcePush.transitions).toEqual([
      { from: "active", to: "degraded", ts: 3000, reason: "fire_count" },
      { from: "degraded", to: "passive", ts: 6000, reason: "fire_count" },
      { from: "passive", to: "open", ts: 10_000, reason: "fire_count" },
    ]);
  });

  it("does not count warning or info findings", () => {
    const state: SessionState = {};
    const findings: Finding[] = [
      { ruleId: "no-skip-hooks", message: "w", severity: "warning" },
      { ruleId: "no-todo-left", message: "i", severity: "info" },
    ];
    for (let i = 0; i < 12; i++) {
      expect(applyCircuitBreaker(findings, state, {}, i)).toEqual(findings);
    }
    expect(state.circuit_breaker).toEqual({});
  });

  it("resets after exactly reset_after_clean clean rounds", () => {
    const state: SessionState = {};
    for (let i = 0; i < 3; i++) applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 1000);
    expect(record(state, "no-force-push").state).toBe("degraded");

    for (let i = 0; i < 4; i++) applyCircuitBreaker([], state, {}, 2000);
    const beforeReset = record(state, "no-force-push");
    expect(beforeReset.clean_count).toBe(4);
    expect(beforeReset.fire_count).toBe(3);
    expect(beforeReset.state).toBe("degraded");

    applyCircuitBreaker([], state, {}, 3000);
    const afterReset = record(state, "no-force-push");
    expect(afterReset.fire_count).toBe(0);
    expect(afterReset.clean_count).toBe(0);
    expect(afterReset.state).toBe("active");
    expect(afterReset.last_fire_ts).toBeNull();
    expect(afterReset.transitions.at(-1)).toEqual({ from: "degraded", to: "active", ts: 3000, reason: "reset" });

    const out = applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 4000);
    expect(out[0]?.severity).toBe("error");
  });

  it("a fire in between clean rounds restarts the clean streak", () => {
    const state: SessionState = {};
    for (let i = 0; i < 3; i++) applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 0);
    for (let i = 0; i < 4; i++) applyCircuitBreaker([], state, {}, 0);
    applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 0);
    for (let i = 0; i < 4; i++) applyCircuitBreaker([], state, {}, 0);
    const rec = record(state, "no-force-push");
    expect(rec.fire_count).toBe(4);
    expect(rec.clean_count).toBe(4);
    expect(rec.state).toBe("degraded");
  });

  it("resets when reset_after_minutes have elapsed since the last fire", () => {
    const state: SessionState = {};
    for (let i = 0; i < 3; i++) applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 0);

    const stillDegraded = applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 29 * MINUTE);
    expect(stillDegraded[0]?.severity).toBe("warning");
    expect(record(state, "no-force-push").fire_count).toBe(4);

    const afterWindow = applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 59 * MINUTE);
    expect(afterWindow[0]).toEqual(errorFinding("no-force-push"));
    const rec = record(state, "no-force-push");
    expect(rec.fire_count).toBe(1);
    expect(rec.first_fire_ts).toBe(59 * MINUTE);
    expect(rec.transitions).toEqual([
      { from: "active", to: "degraded", ts: 0, reason: "fire_count" },
      { from: "degraded", to: "active", ts: 59 * MINUTE, reason: "reset" },
    ]);
  });

  it("recovers corrupted records and a non-object store", () => {
    const state: SessionState = {
      circuit_breaker: {
        "no-force-push": { fire_count: "many", clean_count: -4, state: "bogus", transitions: "x" },
      },
    };
    const out = applyCircuitBreaker([errorFinding("no-force-push")], state, {}, 500);
    expect(out[0]?.severity).toBe("error");
    expect(record(state, "no-force-push")).toEqual({
      fire_count: 1,
      clean_count: 0,
      first_fire_ts: 500,
      last_fire_ts: 500,
      state: "active",
      transitions: [],
    });

    const broken: SessionState = { circuit_breaker: "garbage" };
    applyCircuitBreaker([errorFinding("no-force-push")], broken, {}, 0);
    expect(record(broken, "no-force-push").fire_count).toBe(1);
  });

  it("treats zero thresholds as reached immediately", () => {
    const state: SessionState = {};
    const config: RulesConfig = {
      "no-force-push": { circuit_breaker: { degraded_after: 0, passive_after: 0, open_after: 0 } },
    };
    expect(applyCircuitBreaker([errorFinding("no-force-push")], state, config, 0)).toEqual([]);
    expect(record(state, "no-force-push").state).toBe("open");
  });

  it("passes findings through untracked when a rule's breaker is disabled", () => {
    const state: SessionState = {};
    const config: RulesConfig = { "no-force-push": { circuit_breaker: { enabled: false } } };
    for (let i = 0; i < 12; i++) {
      expect(applyCircuitBreaker([errorFinding("no-force-push")], state, config, i)).toEqual([
        errorFinding("no-force-push"),
      ]);
    }
    expect(hasRecord(state, "no-force-push")).toBe(false);
  });

  it("never degrades protected rules whatever the configuration says", () => {
    const state: SessionState = {};
    const config: RulesConfig = {
      _circuit_breaker_global: { degraded_after: 1, open_after: 1 },
      "no-env-commit": { circuit_breaker: { enabled: false, open_after: 1 } },
    };
    for (let i = 0; i < 5; i++) {
      expect(applyCircuitBreaker([errorFinding("no-env-commit")], state, config, i)).toEqual([
        errorFinding("no-env-commit"),
      ]);
    }
    const rec = record(state, "no-env-commit");
    expect(rec.fire_count).toBe(5);
    expect(rec.state).toBe("active");
  });

  it("merges the global block under per-rule overrides, ignoring values of the wrong type", () => {
    const config: RulesConfig = {
      _circuit_breaker_global: { degraded_after: 1, passive_after: "soon", reset_after_minutes: 5 },
      "no-force-push": { circuit_breaker: { degraded_after: 2 } },
    };
    expect(resolveBreakerConfig("no-force-push", config)).toEqual({
      enabled: true,
      degraded_after: 2,
      passive_after: 6,
      open_after: 10,
      reset_after_clean: 5,
      reset_after_minutes: 5,
    });
    expect(resolveBreakerConfig("no-skip-hooks", config).degraded_after).toBe(1);

    const state: SessionState = {};
    const out = applyCircuitBreaker([errorFinding("no-skip-hooks", "skip")], state, config, 0);
    expect(out).toEqual([
      {
        ruleId: "no-skip-hooks",
        message: "[Circuit breaker: fired 1x, degraded from error to warning] skip",
        severity: "warning",
      },
    ]);
  });

  it("composes with strict mode: a promoted warning is counted and degraded", async () => {
    const state: SessionState = {};
    const rule = {
      id: "dependency-hygiene",
      description: "test",
      severity: "warning" as const,
      events: ["PreToolUse" as const],
      pack: "universal",
      evaluate: (): Finding[] => [{ ruleId: "dependency-hygiene", message: "use the lockfile", severity: "warning" }],
    };

    const severities: string[] = [];
    for (let i = 0; i < 3; i++) {
      const res = await evaluate(
        [rule],
        {
          event: "PreToolUse",
          toolName: "Bash",
          toolInput: { command: "pip install requests" },
          projectDir: "/tmp/project",
          config: {},
          sessionState: state,
        },
        { packs: ["universal"], severityMode: "strict" },
      );
      const out = applyCircuitBreaker(res.findings, state, {}, i);
      severities.push(out[0]?.severity ?? "none");
    }
    expect(severities).toEqual(["error", "error", "warning"]);
    expect(record(state, "dependency-hygiene").fire_count).toBe(3);
  });

  it("keeps a rule id of __proto__ as an ordinary key", () => {
    const state: SessionState = {};
    applyCircuitBreaker([errorFinding("__proto__")], state, {}, 5);

    const store = state.circuit_breaker;
    if (!isJsonObject(store)) throw new Error("no circuit_breaker store");
    expect(Object.getPrototypeOf(store)).toBe(Object.prototype);
    expect(Object.keys(store)).toEqual(["__proto__"]);

    const reloaded: unknown = JSON.parse(JSON.stringify(state));
    if (!isJsonObject(reloaded)) throw new Error("state did not round-trip");
    applyCircuitBreaker([errorFinding("__proto__")], reloaded, {}, 6);
    expect(summarizeBreakers(reloaded)).toEqual([
      { ruleId: "__proto__", state: "active", fireCount: 2, cleanCount: 0, lastFireTs: 6 },
    ]);
  });

  it("summarizes tracked rules sorted by id", () => {
    const state: SessionState = {};
    for (let i = 0; i < 3; i++) {
      applyCircuitBreaker([errorFinding("no-force-push"), errorFinding("no-env-commit")], state, {}, 42);
    }
    expect(summarizeBreakers(state)).toEqual([
      { ruleId: "no-env-commit", state: "active", fireCount: 3, cleanCount: 0, lastFireTs: 42 },
      { ruleId: "no-force-push", state: "degraded", fireCount: 3, cleanCount: 0, lastFireTs: 42 },
    ]);
    expect(summarizeBreakers({})).toEqual([]);
  });
});
