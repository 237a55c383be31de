import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { createLogger } from "./logger.js";
import { isJsonObject, type SessionState } from "./models.js";

/**
 * Session Store
 *
 * Each hook invocation is a fresh process, so anything that must survive
 * between invocations (breaker records, file snapshots, rule bookkeeping)
 * lives in one JSON file per agent session.
 *
 * No lock is taken: two invocations on the same session race and the last
 * write wins.
 */

const log = createLogger("session");

export type SessionStore = {
  load(key?: string): Promise<SessionState>;
  save(state: SessionState, key?: string): Promise<void>;
  cleanup(key?: string): Promise<void>;
  pathFor(key?: string): string;
};

export type FileSessionStoreOptions = {
  cacheDir?: string;
  /** Usually the payload's session_id. */
  defaultKey?: string;
};

export function defaultCacheDir(): string {
  const fromEnv = process.env.HOOKWARDEN_CACHE_DIR;
  if (fromEnv && fromEnv.trim()) return fromEnv;
  return path.join(os.homedir(), ".cache", "hookwarden", "sessions");
}

export function sanitizeSessionKey(key: string): string {
  return key.replace(/[/\\]/g, "_");
}

export function resolveSessionKey(explicit?: string, defaultKey?: string): string {
  const candidates = [explicit, defaultKey, process.env.CLAUDE_SESSION_ID];
  for (const c of candidates) {
    if (c && c.trim()) return sanitizeSessionKey(c.trim());
  }
  return `pid-${process.ppid}`;
}

async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(
    dir,
    `.${path.basename(filePath)}.tmp-${crypto.randomBytes(6).toString("hex")}`,
  );
  try {
    await fs.writeFile(tmp, JSON.stringify(value, null, 2), "utf8");
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Key of the most recently written session in `cacheDir`, or null when there
 * is none. Used where no session id is at hand, such as `status` run from a
 * plain shell.
 */
export async function latestSessionKey(cacheDir: string = defaultCacheDir()): Promise<string | null> {
  let names: string[];
  try {
    names = await fs.readdir(cacheDir);
  } catch {
    return null;
  }

  let latest: { key: string; mtimeMs: number } | null = null;
  for (const name of names) {
    if (name.startsWith(".") || path.extname(name) !== ".json") continue;
    try {
      const { mtimeMs } = await fs.stat(path.join(cacheDir, name));
      if (!latest || mtimeMs > latest.mtimeMs) latest = { key: path.basename(name, ".json"), mtimeMs };
    } catch {
      // removed by a concurrent SessionEnd
    }
  }
  return latest?.key ?? null;
}

export function createFileSessionStore(options: FileSessionStoreOptions = {}): SessionStore {
  const cacheDir = options.cacheDir ?? defaultCacheDir();

  const pathFor = (key?: string) =>
    path.join(cacheDir, `${resolveSessionKey(key, options.defaultKey)}.json`);

  return {
    pathFor,

    async load(key) {
      const filePath = pathFor(key);
      let raw: string;
      try {
        raw = await fs.readFile(filePath, "utf8");
      } catch {
        return {};
      }
      try {
        const parsed: unknown = JSON.parse(raw);
        if (isJsonObject(parsed)) return parsed;
        log.warning(`session file ${filePath} is not a JSON object; starting fresh`);
      } catch {
        log.warning(`session file ${filePath} is corrupt; starting fresh`);
      }
      return {};
    },

    async save(state, key) {
      await writeJsonAtomic(pathFor(key), state);
    },

    async cleanup(key) {
      await fs.rm(pathFor(key), { force: true });
    },
  };
}
