import path from "node:path";
import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { createFileSessionStore, defaultCacheDir, isJsonObject, latestSessionKey, summarizeBreakers } from "hookwarden-core";
import { CONFIG_FILE_NAME, findConfigFile, initialConfigFile, loadConfig } from "./config.js";
import { BUILTIN_PACKS, builtinPackNames, loadBuiltinRules } from "./packs/index.js";
import { loadRules, type CommandResult } from "./pipeline.js";
import {
  hasHookwardenHooks,
  installHooks,
  readSettings,
  settingsPath,
  uninstallHooks,
  type SettingsScope,
} from "./setup.js";

const MIN_NODE_MAJOR = 20;

export async function readVersion(): Promise<string> {
  try {
    const raw = await fs.readFile(new URL("../package.json", import.meta.url), "utf8");
    const pkg: unknown = JSON.parse(raw);
    if (isJsonObject(pkg) && typeof pkg.version === "string") return pkg.version;
  } catch {
    // fall through
  }
  return "dev";
}

function done(lines: string[], exitCode = 0): CommandResult {
  return { stdout: lines.join("\n") + "\n", exitCode };
}

export function listRules(pack: string | null): CommandResult {
  const packs = pack ? [pack] : builtinPackNames();
  const rules = loadBuiltinRules(packs);

  if (rules.length === 0) {
    return done([pack ? `No rules found for pack '${pack}'.` : "No rules found."]);
  }

  const sorted = [...rules].sort(
    (a, b) =>
      a.pack.localeCompare(b.pack) ||
      (a.events[0] ?? "").localeCompare(b.events[0] ?? "") ||
      a.id.localeCompare(b.id),
  );

  const lines = [
    `${"Rule ID".padEnd(30)} ${"Pack".padEnd(12)} ${"Event".padEnd(14)} ${"Severity".padEnd(10)} Description`,
    "-".repeat(100),
  ];
  for (const r of sorted) {
    lines.push(
      `${r.id.padEnd(30)} ${r.pack.padEnd(12)} ${(r.events[0] ?? "-").padEnd(14)} ${r.severity.padEnd(10)} ${r.description}`,
    );
  }
  lines.push("", `${sorted.length} rules total.`);
  return done(lines);
}

/**
 * The session shown is `--session`, then `CLAUDE_SESSION_ID`, then the most
 * recently written session file.
 */
export async function status(projectDir: string, sessionKey: string | null = null): Promise<CommandResult> {
  const version = await readVersion();
  const config = await loadConfig(projectDir);
  const rules = await loadRules(config, projectDir);

  const key = sessionKey ?? (process.env.CLAUDE_SESSION_ID?.trim() || (await latestSessionKey()));
  const state = key ? await createFileSessionStore().load(key) : {};
  const budget = state.token_budget;
  const totalCalls = isJsonObject(budget) && typeof budget.total_calls === "number" ? budget.total_calls : 0;

  const lines = [
    `hookwarden v${version} | Severity: ${config.severity} | Packs: ${config.packs.join(", ")}`,
    `Rules: ${rules.length} active | Session: ${totalCalls} tool calls tracked`,
  ];

  const breakers = summarizeBreakers(state);
  if (breakers.length > 0) {
    lines.push("Circuit breakers:");
    for (const b of breakers) lines.push(`  ${b.ruleId}: ${b.state} (fired ${b.fireCount}x)`);
  }
  return done(lines);
}

export async function init(projectDir: string, force: boolean): Promise<CommandResult> {
  const configPath = path.join(projectDir, CONFIG_FILE_NAME);
  try {
    await fs.access(configPath);
    if (!force) return done([`${configPath} already exists; use --force to overwrite.`]);
  } catch {
    // does not exist yet
  }

  await fs.writeFile(configPath, JSON.stringify(initialConfigFile(), null, 2) + "\n", "utf8");
  return done([`Created ${configPath}`, `Available packs: ${Object.keys(BUILTIN_PACKS).join(", ")}`]);
}

export async function setup(scope: SettingsScope, projectDir: string, command: string): Promise<CommandResult> {
  const target = settingsPath(scope, projectDir);
  const change = await installHooks(target, command);

  const lines = [`Installed hookwarden hooks in ${change.settingsPath}`];
  if (change.backupPath) lines.push(`Backup written to ${change.backupPath}`);

  if (scope === "project" && !(await findConfigFile(projectDir))) {
    const created = await init(projectDir, false);
    if (created.stdout) lines.push(created.stdout.trimEnd());
  }
  return done(lines);
}

export async function uninstall(scope: SettingsScope, projectDir: string): Promise<CommandResult> {
  const change = await uninstallHooks(settingsPath(scope, projectDir));
  if (!change.changed) return done([`No hookwarden hooks found in ${change.settingsPath}`]);
  const lines = [`Removed hookwarden hooks from ${change.settingsPath}`];
  if (change.backupPath) lines.push(`Backup written to ${change.backupPath}`);
  return done(lines);
}

async function cacheDirCheck(dir: string): Promise<{ ok: boolean; message: string }> {
  try {
    await fs.access(dir);
  } catch {
    return { ok: true, message: `Session cache: ${dir} (will be created)` };
  }
  try {
    await fs.access(dir, fsConstants.W_OK);
    return { ok: true, message: `Session cache: ${dir} (writable)` };
  } catch {
    return { ok: false, message: `Session cache: ${dir} is not writable` };
  }
}

export async function doctor(projectDir: string, nodeVersion = process.versions.node): Promise<CommandResult> {
  const ok: string[] = [];
  const issues: string[] = [];

  const configPath = await findConfigFile(projectDir);
  if (configPath) ok.push(`Config file: ${configPath} found`);
  else issues.push(`Config file: not found. Run 'hookwarden init' to create ${CONFIG_FILE_NAME}.`);

  const settings = await readSettings(settingsPath("project", projectDir));
  if (hasHookwardenHooks(settings)) ok.push("Hooks: installed in .claude/settings.json");
  else issues.push("Hooks: not installed. Run 'hookwarden setup' to install.");

  const major = Number(nodeVersion.split(".")[0]);
  if (major >= MIN_NODE_MAJOR) ok.push(`Node.js: ${nodeVersion} (OK)`);
  else issues.push(`Node.js: ${nodeVersion} (requires >=${MIN_NODE_MAJOR})`);

  const cache = await cacheDirCheck(defaultCacheDir());
  (cache.ok ? ok : issues).push(cache.message);

  const lines = [...ok.map((m) => `  OK  ${m}`), ...issues.map((m) => `  !!  ${m}`), ""];
  lines.push(issues.length > 0 ? `${issues.length} issue(s) found.` : "All checks passed.");
  return done(lines, issues.length > 0 ? 1 : 0);
}
