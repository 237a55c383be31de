import {
  applyCircuitBreaker,
  contextFilePath,
  createFileSessionStore,
  createLogger,
  evaluate,
  findingToJson,
  isBlocking,
  summarizeBreakers,
  type Finding,
  type HookEvent,
  type Rule,
  type SessionState,
  type SessionStore,
} from "hookwarden-core";
import { loadConfig, resolveProjectDir, type HookwardenConfig } from "./config.js";
import { buildContext, takeSnapshot } from "./context.js";
import { loadCustomRules } from "./customRules.js";
import { getChangedFiles } from "./git.js";
import { loadBuiltinRules } from "./packs/index.js";
import { parsePayload } from "./payload.js";
import { exitCode, formatHookOutput, formatSessionReport } from "./reporter.js";

const log = createLogger("pipeline");

export type CommandResult = {
  /** Written to stdout verbatim; null means print nothing. */
  stdout: string | null;
  exitCode: number;
};

export type CheckInput = {
  event: HookEvent;
  rawInput: string;
  projectDirArg?: string | null;
  store?: SessionStore;
  now?: number;
};

export type CheckResult = CommandResult & { findings: Finding[]; rulesEvaluated: number };

export async function loadRules(config: HookwardenConfig, projectDir: string): Promise<Rule[]> {
  const rules = loadBuiltinRules(config.packs);
  if (config.customRulesDir) {
    rules.push(...(await loadCustomRules(config.customRulesDir, projectDir)));
  }
  return rules;
}

async function persist(store: SessionStore, event: HookEvent, state: SessionState): Promise<void> {
  try {
    if (event === "SessionEnd") await store.cleanup();
    else await store.save(state);
  } catch (err) {
    // The decision is still emitted; only this round's state is lost.
    log.error("failed to save session state", err);
  }
}

/**
 * payload -> config -> rules -> session -> context -> engine -> breaker ->
 * persist -> decision
 */
export async function runCheck(input: CheckInput): Promise<CheckResult> {
  const payload = parsePayload(input.rawInput);
  const projectDir = resolveProjectDir(input.projectDirArg ?? null, payload.cwd);
  const config = await loadConfig(projectDir);
  const rules = await loadRules(config, projectDir);

  const store = input.store ?? createFileSessionStore({ defaultKey: payload.session_id });
  const sessionState = await store.load();

  const ctx = await buildContext({ event: input.event, payload, projectDir, config, sessionState });
  const result = await evaluate(rules, ctx, { packs: config.packs, severityMode: config.severity });
  const findings = applyCircuitBreaker(result.findings, sessionState, config.rules, input.now);
  log.debug(`${input.event} findings: ${JSON.stringify(findings.map(findingToJson))}`);

  // A denied edit never runs, so no PostToolUse will come to claim its snapshot.
  const filePath = contextFilePath(ctx);
  if (input.event === "PreToolUse" && filePath && isBlocking(findings)) {
    takeSnapshot(sessionState, filePath);
  }

  await persist(store, input.event, sessionState);

  return {
    stdout: formatHookOutput(input.event, findings),
    exitCode: exitCode(input.event, findings),
    findings,
    rulesEvaluated: result.rulesEvaluated,
  };
}

export type ReportInput = {
  rawInput: string;
  projectDirArg?: string | null;
  store?: SessionStore;
};

/** End-of-session summary for the Stop hook. Removes the session file afterwards. */
export async function runReport(input: ReportInput): Promise<CommandResult> {
  const payload = parsePayload(input.rawInput);
  const projectDir = resolveProjectDir(input.projectDirArg ?? null, payload.cwd);
  const config = await loadConfig(projectDir);
  const rules = await loadRules(config, projectDir);

  const store = input.store ?? createFileSessionStore({ defaultKey: payload.session_id });
  const sessionState = await store.load();

  const recorded = sessionState.changed_files;
  const changedFiles =
    Array.isArray(recorded) && recorded.length > 0
      ? recorded.filter((f): f is string => typeof f === "string")
      : getChangedFiles(projectDir);
  sessionState.changed_files = changedFiles;

  const ctx = await buildContext({
    event: "Stop",
    payload: { ...payload, tool_name: undefined, tool_input: undefined },
    projectDir,
    config,
    sessionState,
  });
  const result = await evaluate(rules, ctx, { packs: config.packs, severityMode: config.severity });

  const report = formatSessionReport({
    findings: result.findings,
    rulesEvaluated: result.rulesEvaluated,
    filesChanged: changedFiles.length,
    breakers: summarizeBreakers(sessionState),
  });

  try {
    await store.cleanup();
  } catch (err) {
    log.error("failed to remove session state", err);
  }

  return { stdout: JSON.stringify({ systemMessage: report, continue: true }), exitCode: 0 };
}
