import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";

/**
 * Installs and removes hookwarden's entries in the agent's settings.json.
 * Entries that belong to other tools are left as they are.
 */

export type SettingsScope = "project" | "user";

type HookCommand = { type: "command"; command: string; timeout: number };
type HookEntry = { matcher?: string; hooks: HookCommand[] };

type JsonRecord = Record<string, unknown>;

export type SettingsChange = {
  settingsPath: string;
  backupPath: string | null;
  changed: boolean;
};

export function hookEntries(command = "hookwarden"): Record<string, HookEntry[]> {
  return {
    PreToolUse: [
      {
        matcher: "Bash|Edit|Write",
        hooks: [{ type: "command", command: `${command} check --event PreToolUse`, timeout: 5 }],
      },
    ],
    PostToolUse: [
      {
        matcher: "Bash|Edit|Write",
        hooks: [{ type: "command", command: `${command} check --event PostToolUse`, timeout: 10 }],
      },
    ],
    Stop: [{ hooks: [{ type: "command", command: `${command} report`, timeout: 30 }] }],
  };
}

export function settingsPath(scope: SettingsScope, projectDir: string): string {
  const base = scope === "user" ? os.homedir() : projectDir;
  return path.join(base, ".claude", "settings.json");
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function backupIfExists(filePath: string): Promise<string | null> {
  if (!(await fileExists(filePath))) return null;
  const backupPath = `${filePath}.bak-${Date.now()}`;
  await fs.copyFile(filePath, backupPath);
  return backupPath;
}

export async function readSettings(filePath: string): Promise<JsonRecord> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

async function writeSettings(filePath: string, data: JsonRecord): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

export function isHookwardenCommand(command: string): boolean {
  return /\bhookwarden\b/.test(command);
}

export function isHookwardenEntry(entry: unknown): boolean {
  if (!isRecord(entry) || !Array.isArray(entry.hooks)) return false;
  return entry.hooks.some((h) => isRecord(h) && typeof h.command === "string" && isHookwardenCommand(h.command));
}

function hooksOf(settings: JsonRecord): JsonRecord {
  return isRecord(settings.hooks) ? { ...settings.hooks } : {};
}

/** Replaces any previous hookwarden entries with the current ones. Idempotent. */
export function mergeHooks(existing: JsonRecord, command = "hookwarden"): JsonRecord {
  const hooks = hooksOf(existing);
  for (const [event, ours] of Object.entries(hookEntries(command))) {
    const current = hooks[event];
    const kept = Array.isArray(current) ? current.filter((e) => !isHookwardenEntry(e)) : [];
    hooks[event] = [...kept, ...ours];
  }
  return { ...existing, hooks };
}

/** Drops hookwarden entries, then any event list and hooks block left empty. */
export function removeHooks(existing: JsonRecord): JsonRecord {
  const hooks = hooksOf(existing);
  for (const [event, entries] of Object.entries(hooks)) {
    if (!Array.isArray(entries)) continue;
    const kept = entries.filter((e) => !isHookwardenEntry(e));
    if (kept.length > 0) hooks[event] = kept;
    else delete hooks[event];
  }

  const settings = { ...existing };
  if (Object.keys(hooks).length > 0) settings.hooks = hooks;
  else delete settings.hooks;
  return settings;
}

export function hasHookwardenHooks(settings: JsonRecord): boolean {
  const hooks = hooksOf(settings);
  return ["PreToolUse", "PostToolUse", "Stop"].some((event) => {
    const entries = hooks[event];
    return Array.isArray(entries) && entries.some(isHookwardenEntry);
  });
}

export async function installHooks(filePath: string, command = "hookwarden"): Promise<SettingsChange> {
  const existing = await readSettings(filePath);
  const updated = mergeHooks(existing, command);
  const backupPath = await backupIfExists(filePath);
  await writeSettings(filePath, updated);
  return { settingsPath: filePath, backupPath, changed: true };
}

export async function uninstallHooks(filePath: string): Promise<SettingsChange> {
  if (!(await fileExists(filePath))) return { settingsPath: filePath, backupPath: null, changed: false };

  const existing = await readSettings(filePath);
  const updated = removeHooks(existing);
  if (JSON.stringify(updated) === JSON.stringify(existing)) {
    return { settingsPath: filePath, backupPath: null, changed: false };
  }

  const backupPath = await backupIfExists(filePath);
  if (Object.keys(updated).length > 0) {
    await writeSettings(filePath, updated);
  } else {
    await fs.rm(filePath, { force: true });
  }
  return { settingsPath: filePath, backupPath, changed: true };
}
