import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import { createLogger, parseSeverityMode, type RulesConfig, type SeverityMode } from "hookwarden-core";

const log = createLogger("config");

export const CONFIG_FILE_NAME = "hookwarden.json";

export type HookwardenConfig = {
  severity: SeverityMode;
  packs: string[];
  /** Per-rule options keyed by rule id, including the `_circuit_breaker_global` block. */
  rules: RulesConfig;
  customRulesDir: string | null;
  /** Where the configuration was read from, or null when defaults were used. */
  sourcePath: string | null;
};

export function defaultConfig(): HookwardenConfig {
  return {
    severity: "standard",
    packs: ["universal"],
    rules: {},
    customRulesDir: null,
    sourcePath: null,
  };
}

// Each section falls back on its own so one bad value does not discard the rest.
const ConfigFileSchema = z.object({
  severity: z.unknown().transform(parseSeverityMode),
  packs: z.array(z.string().min(1)).min(1).catch(["universal"]),
  rules: z.record(z.unknown()).catch({}),
  custom_rules_dir: z.string().min(1).nullable().catch(null),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRulesConfig(raw: Record<string, unknown>): RulesConfig {
  const rules: RulesConfig = {};
  for (const [ruleId, options] of Object.entries(raw)) {
    if (isPlainObject(options)) {
      rules[ruleId] = options;
    } else {
      log.warning(`ignoring options for ${ruleId}: expected an object`);
    }
  }
  return rules;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const raw = await fs.readFile(filePath, "utf8");
    return JSON.parse(raw);
  } catch (err) {
    log.warning(`could not read ${filePath}; using defaults`, err);
    return null;
  }
}

export function configCandidatePaths(projectDir: string): string[] {
  const envPath = process.env.HOOKWARDEN_CONFIG_PATH;
  const candidates = [
    envPath && envPath.trim() ? envPath : null,
    path.join(projectDir, ".hookwarden", "config.json"),
    path.join(projectDir, CONFIG_FILE_NAME),
  ];
  return candidates.filter((p): p is string => p !== null);
}

export async function findConfigFile(projectDir: string): Promise<string | null> {
  for (const p of configCandidatePaths(projectDir)) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // continue
    }
  }
  return null;
}

export function parseConfig(value: unknown, sourcePath: string | null = null): HookwardenConfig {
  const base = defaultConfig();
  if (!isPlainObject(value)) {
    if (value !== null) log.warning("configuration is not a JSON object; using defaults");
    return { ...base, sourcePath };
  }

  const parsed = ConfigFileSchema.safeParse(value);
  if (!parsed.success) {
    log.warning("configuration is invalid; using defaults", parsed.error.message);
    return { ...base, sourcePath };
  }

  return {
    severity: parsed.data.severity,
    packs: parsed.data.packs,
    rules: toRulesConfig(parsed.data.rules),
    customRulesDir: parsed.data.custom_rules_dir,
    sourcePath,
  };
}

export async function loadConfig(projectDir: string): Promise<HookwardenConfig> {
  const filePath = await findConfigFile(projectDir);
  if (!filePath) return defaultConfig();
  return parseConfig(await readJsonFile(filePath), filePath);
}

/** Contents written by `hookwarden init`. */
export function initialConfigFile(): Record<string, unknown> {
  return {
    severity: "standard",
    packs: ["universal"],
    rules: {},
  };
}

export function resolveProjectDir(fromArg: string | null, payloadCwd?: string): string {
  const candidates = [fromArg, process.env.CLAUDE_PROJECT_DIR, payloadCwd];
  for (const c of candidates) {
    if (c && c.trim()) return path.resolve(c);
  }
  return process.cwd();
}
