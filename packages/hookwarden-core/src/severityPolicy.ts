import type { Severity } from "./models.js";

export type SeverityMode = "strict" | "standard" | "relaxed";

export function parseSeverityMode(value: unknown): SeverityMode {
  if (value === "strict" || value === "relaxed" || value === "standard") return value;
  return "standard";
}

/**
 * Project-wide strictness applied to every finding before the circuit breaker
 * sees it.
 *  - strict: warning -> error, info -> warning
 *  - standard: unchanged
 *  - relaxed: warning -> info
 */
export function effectiveSeverity(base: Severity, mode: SeverityMode): Severity {
  if (mode === "strict") {
    if (base === "warning") return "error";
    if (base === "info") return "warning";
    return base;
  }
  if (mode === "relaxed") {
    if (base === "warning") return "info";
    return base;
  }
  return base;
}
