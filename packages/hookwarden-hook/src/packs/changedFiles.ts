import path from "node:path";
import fs from "node:fs/promises";
import type { EventContext } from "hookwarden-core";

/** Files recorded in session state by `hookwarden report` before Stop rules run. */
export function sessionChangedFiles(ctx: EventContext): string[] {
  const v = ctx.sessionState.changed_files;
  return Array.isArray(v) ? v.filter((f): f is string => typeof f === "string" && f.length > 0) : [];
}

export async function readChangedFile(ctx: EventContext, filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(path.resolve(ctx.projectDir, filePath), "utf8");
  } catch {
    return null;
  }
}

export function isTestPath(filePath: string): boolean {
  const name = path.basename(filePath).toLowerCase();
  if (name.includes("test")) return true;
  return filePath
    .split(/[/\\]/)
    .some((part) => ["tests", "test", "__tests__"].includes(part.toLowerCase()));
}
