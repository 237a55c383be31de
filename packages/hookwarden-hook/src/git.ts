import path from "node:path";
import { spawnSync } from "node:child_process";
import { createLogger } from "hookwarden-core";

/**
 * Thin wrappers over the git CLI. Every helper degrades to an empty or false
 * result when git is missing, times out, or the directory is not a repo.
 */

const log = createLogger("git");

type GitResult = { ok: boolean; stdout: string };

function runGit(projectDir: string, args: string[], timeoutMs = 5_000): GitResult {
  const res = spawnSync("git", args, {
    cwd: projectDir,
    encoding: "utf8",
    timeout: timeoutMs,
    stdio: ["ignore", "pipe", "pipe"],
  });
  if (res.error) {
    log.debug(`git ${args.join(" ")} failed`, res.error);
    return { ok: false, stdout: "" };
  }
  return { ok: res.status === 0, stdout: res.stdout ?? "" };
}

function lines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
}

/** Staged and unstaged changes against HEAD plus untracked files, as absolute paths. */
export function getChangedFiles(projectDir: string): string[] {
  const files = new Set<string>();

  const diff = runGit(projectDir, ["diff", "--name-only", "HEAD"], 10_000);
  if (diff.ok) for (const f of lines(diff.stdout)) files.add(path.join(projectDir, f));

  const untracked = runGit(projectDir, ["ls-files", "--others", "--exclude-standard"], 10_000);
  if (untracked.ok) for (const f of lines(untracked.stdout)) files.add(path.join(projectDir, f));

  return [...files].sort();
}

export function isGitRepo(projectDir: string): boolean {
  return runGit(projectDir, ["rev-parse", "--is-inside-work-tree"]).ok;
}

export function gitHasChanges(projectDir: string): boolean {
  const res = runGit(projectDir, ["status", "--porcelain"]);
  return res.ok && res.stdout.trim().length > 0;
}

export function gitStashPush(projectDir: string, message: string): boolean {
  const res = runGit(projectDir, ["stash", "push", "-m", message]);
  return res.ok && !res.stdout.includes("No local changes");
}

/** Drops stashes whose message contains `prefix` and that are older than `maxAgeHours`. */
export function gitCleanStashes(projectDir: string, prefix: string, maxAgeHours: number, now = Date.now()): number {
  const list = runGit(projectDir, ["stash", "list"]);
  if (!list.ok) return 0;

  const cutoffSeconds = now / 1000 - maxAgeHours * 3600;
  const indices: number[] = [];
  for (const line of lines(list.stdout)) {
    if (!line.includes(prefix)) continue;
    const m = /stash@\{(\d+)\}/.exec(line);
    if (m?.[1]) indices.push(Number(m[1]));
  }

  let removed = 0;
  // Highest index first so earlier drops do not shift the rest.
  for (const idx of indices.sort((a, b) => b - a)) {
    const ts = runGit(projectDir, ["log", "-1", "--format=%ct", `stash@{${idx}}`]);
    if (!ts.ok) continue;
    const created = Number(ts.stdout.trim());
    if (!Number.isFinite(created) || created >= cutoffSeconds) continue;
    if (runGit(projectDir, ["stash", "drop", `stash@{${idx}}`]).ok) removed += 1;
  }
  return removed;
}
