import type { Rule } from "hookwarden-core";
import { securityRules } from "./security/index.js";
import { universalRules } from "./universal/index.js";

export const BUILTIN_PACKS: Readonly<Record<string, readonly Rule[]>> = {
  universal: universalRules,
  security: securityRules,
};

export function builtinPackNames(): string[] {
  return Object.keys(BUILTIN_PACKS).sort();
}

/** Rules of every named built-in pack, in pack order. Unknown names contribute nothing. */
export function loadBuiltinRules(packs: readonly string[]): Rule[] {
  const rules: Rule[] = [];
  for (const name of packs) {
    rules.push(...(BUILTIN_PACKS[name] ?? []));
  }
  return rules;
}
