import {
  compareSeverity,
  isBlocking,
  isBlockingSeverity,
  type BreakerSummary,
  type Finding,
  type HookEvent,
  type Severity,
} from "hookwarden-core";

/**
 * Output in the supervisor's hook protocol.
 *
 * IMPORTANT: whatever these functions return is the only thing that may be
 * written to stdout.
 */

const BANDS: { severity: Severity; title: string }[] = [
  { severity: "error", title: "BLOCKED" },
  { severity: "warning", title: "WARNINGS" },
  { severity: "info", title: "INFO" },
];

function findingLines(f: Finding, indent: string): string[] {
  const lines = [`${indent}[${f.ruleId}] ${f.message}`];
  if (f.suggestion) lines.push(`${indent}  -> ${f.suggestion}`);
  return lines;
}

export function formatDenyReason(findings: readonly Finding[]): string {
  const blocking = findings.filter((f) => isBlockingSeverity(f.severity));
  const rest = findings
    .filter((f) => !isBlockingSeverity(f.severity))
    .sort((a, b) => compareSeverity(b.severity, a.severity));

  const lines = ["hookwarden blocked this action:"];
  for (const f of blocking) lines.push(...findingLines(f, ""));
  if (rest.length > 0) {
    lines.push("Additional context:");
    for (const f of rest) lines.push(...findingLines(f, ""));
  }
  return lines.join("\n");
}

export function formatAdvisory(findings: readonly Finding[]): string {
  const lines = ["", "hookwarden:"];
  for (const band of BANDS) {
    const inBand = findings.filter((f) => f.severity === band.severity);
    if (inBand.length === 0) continue;
    lines.push(`  ${band.title}:`);
    for (const f of inBand) lines.push(...findingLines(f, "    "));
  }
  return lines.join("\n");
}

/** Returns null when nothing should be printed. */
export function formatHookOutput(event: HookEvent, findings: readonly Finding[]): string | null {
  if (findings.length === 0) return null;

  if (event === "PreToolUse" && isBlocking(findings)) {
    return JSON.stringify({
      hookSpecificOutput: {
        hookEventName: "PreToolUse",
        permissionDecision: "deny",
        permissionDecisionReason: formatDenyReason(findings),
      },
    });
  }

  return JSON.stringify({ systemMessage: formatAdvisory(findings) });
}

// PreToolUse communicates a block through the deny payload, which the
// supervisor only honours on a zero exit.
export function exitCode(event: HookEvent, findings: readonly Finding[]): number {
  if (event === "PreToolUse") return 0;
  return isBlocking(findings) ? 2 : 0;
}

export type SessionReportInput = {
  findings: readonly Finding[];
  rulesEvaluated: number;
  filesChanged: number;
  breakers: readonly BreakerSummary[];
};

export function formatSessionReport(input: SessionReportInput): string {
  const errors = input.findings.filter((f) => isBlockingSeverity(f.severity));
  const warnings = input.findings.filter((f) => f.severity === "warning");
  const passed = Math.max(0, input.rulesEvaluated - input.findings.length);

  const lines = [
    "hookwarden session report",
    `Files changed: ${input.filesChanged}  |  Rules evaluated: ${input.rulesEvaluated}`,
    `Passed: ${passed}  |  Warnings: ${warnings.length}  |  Blocked: ${errors.length}`,
  ];

  if (errors.length > 0) {
    lines.push("", "Blocked actions:");
    for (const f of errors) lines.push(`  [${f.ruleId}] ${f.message}`);
  }

  if (warnings.length > 0) {
    lines.push("", "Warnings:");
    for (const f of warnings) lines.push(`  [${f.ruleId}] ${f.message}`);
  }

  const tripped = input.breakers.filter((b) => b.state !== "active");
  if (tripped.length > 0) {
    lines.push("", "Circuit breaker:");
    for (const b of tripped) lines.push(`  [${b.ruleId}] ${b.state} (fired ${b.fireCount}x)`);
  }

  return lines.join("\n");
}
