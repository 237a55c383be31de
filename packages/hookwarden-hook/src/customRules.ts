import path from "node:path";
import fs from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { createLogger, isRule, type Rule } from "hookwarden-core";

const log = createLogger("custom-rules");

const RULE_FILE_EXTENSIONS = new Set([".js", ".mjs"]);

export function isRuleFile(name: string): boolean {
  return !name.startsWith("_") && RULE_FILE_EXTENSIONS.has(path.extname(name));
}

/**
 * A module may export a rule as default, a `rules` array, or any number of
 * named rule exports. Everything that fits the rule shape is taken once.
 */
export function rulesFromModule(mod: unknown): Rule[] {
  if (typeof mod !== "object" || mod === null) return [];

  const candidates: unknown[] = [];
  for (const value of Object.values(mod)) {
    if (Array.isArray(value)) candidates.push(...value);
    else candidates.push(value);
  }

  const seen = new Set<Rule>();
  for (const c of candidates) {
    if (isRule(c)) seen.add(c);
  }
  return [...seen];
}

export async function loadCustomRules(rulesDir: string, projectDir: string): Promise<Rule[]> {
  const dir = path.resolve(projectDir, rulesDir);

  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch {
    log.warning(`custom rules directory not found: ${dir}`);
    return [];
  }

  const rules: Rule[] = [];
  for (const name of names.filter(isRuleFile).sort()) {
    const filePath = path.join(dir, name);
    try {
      const mod: unknown = await import(pathToFileURL(filePath).href);
      const found = rulesFromModule(mod);
      if (found.length === 0) log.warning(`no rules exported from ${name}`);
      rules.push(...found);
    } catch (err) {
      log.warning(`failed to load custom rules from ${name}`, err);
    }
  }
  return rules;
}
