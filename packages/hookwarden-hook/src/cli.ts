#!/usr/bin/env tsx
import { HOOK_EVENTS, createLogger, parseHookEvent } from "hookwarden-core";
import { doctor, init, listRules, readVersion, setup, status, uninstall } from "./commands.js";
import { resolveProjectDir } from "./config.js";
import { readAllStdin } from "./payload.js";
import { runCheck, runReport, type CommandResult } from "./pipeline.js";

/**
 * hookwarden hook entry point.
 *
 * The agent supervisor pipes one JSON event to `check` / `report` and reads
 * the decision back from stdout.
 *
 * IMPORTANT:
 *  - Do NOT write anything to stdout except the JSON response the supervisor expects.
 *  - Use stderr for logs.
 */

const log = createLogger("cli");

const USAGE = `Usage: hookwarden <command> [options]

Commands:
  check --event <Event> [--project-dir <dir>]   Evaluate rules against one event read from stdin
  report [--project-dir <dir>]                  Session summary for the Stop hook
  list-rules [--pack <name>]                    List built-in rules
  status [--session <id>] [--project-dir <dir>] Show configuration and session status
  init [--project-dir <dir>] [--force]          Write hookwarden.json with defaults
  setup [--global] [--project-dir <dir>]        Install hooks into .claude/settings.json
  uninstall [--global] [--project-dir <dir>]    Remove hooks from .claude/settings.json
  doctor [--project-dir <dir>]                  Diagnose common misconfigurations
  version                                       Print the version`;

function getArgValue(flag: string): string | null {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return null;
  const next = process.argv[idx + 1];
  if (!next || next.startsWith("--")) return null;
  return next;
}

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

function usageError(message: string): CommandResult {
  console.error(`hookwarden: ${message}\n\n${USAGE}`);
  return { stdout: null, exitCode: 1 };
}

async function runCheckCommand(): Promise<CommandResult> {
  const eventArg = getArgValue("--event");
  if (!eventArg) return usageError("check requires --event");
  const event = parseHookEvent(eventArg);
  if (!event) return usageError(`unknown event '${eventArg}' (expected one of: ${HOOK_EVENTS.join(", ")})`);

  // Fail open.
  try {
    return await runCheck({ event, rawInput: await readAllStdin(), projectDirArg: getArgValue("--project-dir") });
  } catch (err) {
    log.error("check failed; allowing", err);
    return { stdout: null, exitCode: 0 };
  }
}

async function runReportCommand(): Promise<CommandResult> {
  try {
    return await runReport({ rawInput: await readAllStdin(), projectDirArg: getArgValue("--project-dir") });
  } catch (err) {
    log.error("report failed", err);
    return { stdout: null, exitCode: 0 };
  }
}

async function dispatch(command: string | undefined): Promise<CommandResult> {
  const projectDir = () => resolveProjectDir(getArgValue("--project-dir"));
  const scope = hasFlag("--global") ? "user" : "project";

  switch (command) {
    case "check":
      return runCheckCommand();
    case "report":
      return runReportCommand();
    case "list-rules":
      return listRules(getArgValue("--pack"));
    case "status":
      return status(projectDir(), getArgValue("--session"));
    case "init":
      return init(projectDir(), hasFlag("--force"));
    case "setup":
      return setup(scope, projectDir(), getArgValue("--command") ?? "hookwarden");
    case "uninstall":
      return uninstall(scope, projectDir());
    case "doctor":
      return doctor(projectDir());
    case "version":
    case "--version":
      return { stdout: `${await readVersion()}\n`, exitCode: 0 };
    case "help":
    case "--help":
    case undefined:
      return { stdout: `${USAGE}\n`, exitCode: 0 };
    default:
      return usageError(`unknown command '${command}'`);
  }
}

async function main(): Promise<void> {
  const result = await dispatch(process.argv[2]);
  if (result.stdout) process.stdout.write(result.stdout);
  process.exitCode = result.exitCode;
}

main().catch((err) => {
  console.error("hookwarden fatal:", err);
  process.exitCode = 0;
});
