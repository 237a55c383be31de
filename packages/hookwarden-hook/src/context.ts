import path from "node:path";
import fs from "node:fs/promises";
import {
  createLogger,
  isJsonObject,
  type EventContext,
  type HookEvent,
  type JsonObject,
  type SessionState,
} from "hookwarden-core";
import type { HookwardenConfig } from "./config.js";
import { compactSource, subagentOutput, type HookPayload } from "./payload.js";

const log = createLogger("context");

const FILE_WRITE_TOOLS = new Set(["Write", "Edit"]);

export const MAX_FILE_CACHE_ENTRIES = 50;

export type ContextInput = {
  event: HookEvent;
  payload: HookPayload;
  projectDir: string;
  config: HookwardenConfig;
  sessionState: SessionState;
};

function fileCache(state: SessionState): JsonObject {
  const existing = state.file_cache;
  if (isJsonObject(existing)) return existing;
  const created: JsonObject = {};
  state.file_cache = created;
  return created;
}

// Rebuilt through Object.fromEntries so a path such as "__proto__" stays a key.
export function rememberSnapshot(state: SessionState, filePath: string, content: string): void {
  const entries = Object.entries(fileCache(state)).filter(([key]) => key !== filePath);
  entries.push([filePath, content]);
  state.file_cache = Object.fromEntries(entries.slice(-MAX_FILE_CACHE_ENTRIES));
}

/** Removes and returns the snapshot taken before an edit, if any. */
export function takeSnapshot(state: SessionState, filePath: string): string | null {
  const cache = fileCache(state);
  const entries = Object.entries(cache);
  const hit = entries.find(([key]) => key === filePath);
  if (!hit) return null;
  state.file_cache = Object.fromEntries(entries.filter(([key]) => key !== filePath));
  return typeof hit[1] === "string" ? hit[1] : null;
}

function isInside(child: string, parent: string): boolean {
  return child === parent || child.startsWith(parent + path.sep);
}

/**
 * Reads a file the agent touched, refusing anything that resolves (through
 * symlinks too) outside the project directory. Returns null when the file is
 * missing, unreadable or outside.
 */
export async function readProjectFile(projectDir: string, filePath: string): Promise<string | null> {
  const absolute = path.resolve(projectDir, filePath);
  let resolved: string;
  let projectReal: string;
  try {
    resolved = await fs.realpath(absolute);
    projectReal = await fs.realpath(projectDir);
  } catch {
    return null;
  }
  if (!isInside(resolved, projectReal)) {
    log.warning(`path traversal blocked: ${filePath}`);
    return null;
  }
  try {
    return await fs.readFile(resolved, "utf8");
  } catch {
    return null;
  }
}

export async function buildContext(input: ContextInput): Promise<EventContext> {
  const { event, payload, projectDir, config, sessionState } = input;
  const toolInput = payload.tool_input ?? {};

  const ctx: EventContext = {
    event,
    toolName: payload.tool_name ?? "",
    toolInput,
    projectDir,
    config: config.rules,
    sessionState,
    prompt: payload.prompt,
    subagentOutput: subagentOutput(payload),
    notificationType: payload.notification_type,
    compactSource: compactSource(payload),
  };

  const filePath = typeof toolInput.file_path === "string" && toolInput.file_path ? toolInput.file_path : null;
  if (!filePath) return ctx;

  if (event === "PreToolUse" && FILE_WRITE_TOOLS.has(ctx.toolName)) {
    // Snapshot the file before the edit so PostToolUse rules can diff against it.
    const before = await readProjectFile(projectDir, filePath);
    if (before !== null) {
      rememberSnapshot(sessionState, filePath, before);
      ctx.fileContentBefore = before;
    }
    const content = toolInput.content;
    if (typeof content === "string" && content) {
      ctx.fileContent = content;
    }
    return ctx;
  }

  if (event === "PostToolUse") {
    const before = takeSnapshot(sessionState, filePath);

    const after = await readProjectFile(projectDir, filePath);
    if (after !== null) {
      ctx.fileContent = after;
      if (before !== null) ctx.fileContentBefore = before;
    }
  }

  return ctx;
}
