import { createLogger } from "./logger.js";
import {
  isBlockingSeverity,
  isFinding,
  ruleMatchesEvent,
  type EventContext,
  type Finding,
  type Rule,
  type RulesConfig,
} from "./models.js";
import { effectiveSeverity, type SeverityMode } from "./severityPolicy.js";

const log = createLogger("engine");

export type EngineOptions = {
  packs: readonly string[];
  severityMode: SeverityMode;
};

export type EvaluationResult = {
  findings: Finding[];
  rulesEvaluated: number;
};

export type RuleOutcome =
  | { ok: true; findings: Finding[] }
  | { ok: false; error: unknown };

export function isRuleEnabled(rulesConfig: RulesConfig, ruleId: string): boolean {
  return rulesConfig[ruleId]?.enabled !== false;
}

/**
 * Runs one rule and folds a throw, a rejection or a malformed result into a
 * failed outcome, so the dispatch loop never has to catch. Findings are
 * copied; the rule keeps ownership of the objects it returned.
 */
export async function runRule(rule: Rule, ctx: EventContext): Promise<RuleOutcome> {
  let returned: unknown;
  try {
    returned = await rule.evaluate(ctx);
  } catch (error) {
    return { ok: false, error };
  }

  if (!Array.isArray(returned)) {
    return { ok: false, error: new TypeError(`rule ${rule.id} returned ${typeof returned}, expected an array`) };
  }

  const findings: Finding[] = [];
  for (const [index, item] of returned.entries()) {
    if (!isFinding(item)) {
      return { ok: false, error: new TypeError(`rule ${rule.id} returned a malformed finding at index ${index}`) };
    }
    findings.push({ ...item });
  }
  return { ok: true, findings };
}

export async function evaluate(
  rules: readonly Rule[],
  ctx: EventContext,
  options: EngineOptions,
): Promise<EvaluationResult> {
  const result: EvaluationResult = { findings: [], rulesEvaluated: 0 };

  for (const rule of rules) {
    if (!options.packs.includes(rule.pack)) continue;
    if (!isRuleEnabled(ctx.config, rule.id)) continue;
    if (!ruleMatchesEvent(rule, ctx.event)) continue;

    result.rulesEvaluated += 1;

    const outcome = await runRule(rule, ctx);
    if (!outcome.ok) {
      log.error(`rule ${rule.id} failed; skipping`, outcome.error);
      continue;
    }

    for (const finding of outcome.findings) {
      result.findings.push({ ...finding, severity: effectiveSeverity(finding.severity, options.severityMode) });
    }
  }

  return result;
}

export function isBlocking(findings: readonly Finding[]): boolean {
  return findings.some((f) => isBlockingSeverity(f.severity));
}
