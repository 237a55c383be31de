import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import path from "node:path";
import fs from "node:fs/promises";
import { doctor, init, listRules, readVersion, setup, status, uninstall } from "../src/commands.js";
import { initialConfigFile } from "../src/config.js";
import { runCheck } from "../src/pipeline.js";
import { settingsPath } from "../src/setup.js";
import { makeTempWorkspace } from "./helpers.js";

function lines(stdout: string | null): string[] {
  return (stdout ?? "").trimEnd().split("\n");
}

describe("CLI commands", () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await makeTempWorkspace();
    vi.stubEnv("HOOKWARDEN_CONFIG_PATH", "");
    vi.stubEnv("HOOKWARDEN_CACHE_DIR", path.join(cacheDir, "sessions"));
    vi.stubEnv("CLAUDE_SESSION_ID", "commands-test");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("reads the package version", async () => {
    expect(await readVersion()).toBe("0.1.0");
  });

  it("lists the rules of one pack", () => {
    const res = listRules("security");
    expect(res.exitCode).toBe(0);
    expect(lines(res.stdout)).toEqual([
      `${"Rule ID".padEnd(30)} ${"Pack".padEnd(12)} ${"Event".padEnd(14)} ${"Severity".padEnd(10)} Description`,
      "-".repeat(100),
      `${"no-bash-file-write".padEnd(30)} ${"security".padEnd(12)} ${"PreToolUse".padEnd(14)} ${"error".padEnd(10)} Blocks file writes via Bash (cat >, tee, sed -i, cp, heredocs, etc.)`,
      `${"no-network-exfil".padEnd(30)} ${"security".padEnd(12)} ${"PreToolUse".padEnd(14)} ${"error".padEnd(10)} Blocks potential data exfiltration via curl, nc, scp, etc.`,
      "",
      "2 rules total.",
    ]);
  });

  it("lists every built-in rule by default", () => {
    expect(lines(listRules(null).stdout).at(-1)).toBe("17 rules total.");
    expect(listRules("nope").stdout).toBe("No rules found for pack 'nope'.\n");
  });

  it("writes a starter config and refuses to overwrite it", async () => {
    const project = await makeTempWorkspace();
    const configPath = path.join(project, "hookwarden.json");

    expect((await init(project, false)).stdout).toBe(
      `Created ${configPath}\nAvailable packs: universal, security\n`,
    );
    expect(JSON.parse(await fs.readFile(configPath, "utf8"))).toEqual(initialConfigFile());

    expect((await init(project, false)).stdout).toBe(`${configPath} already exists; use --force to overwrite.\n`);
    expect(lines((await init(project, true)).stdout)[0]).toBe(`Created ${configPath}`);
  });

  it("shows configuration and breaker status", async () => {
    const project = await makeTempWorkspace({ severity: "strict", packs: ["universal", "security"] });
    await fs.mkdir(path.join(cacheDir, "sessions"));
    await fs.writeFile(
      path.join(cacheDir, "sessions", "commands-test.json"),
      JSON.stringify({
        token_budget: { total_calls: 7 },
        circuit_breaker: { "no-force-push": { fire_count: 4, state: "degraded" } },
      }),
      "utf8",
    );

    expect(lines((await status(project)).stdout)).toEqual([
      "hookwarden v0.1.0 | Severity: strict | Packs: universal, security",
      "Rules: 17 active | Session: 7 tool calls tracked",
      "Circuit breakers:",
      "  no-force-push: degraded (fired 4x)",
    ]);
  });

  it("shows the session a check wrote when no session id is set", async () => {
    vi.stubEnv("CLAUDE_SESSION_ID", "");
    vi.spyOn(console, "error").mockImplementation(() => {});
    const project = await makeTempWorkspace();
    const sessions = path.join(cacheDir, "sessions");
    await fs.mkdir(sessions);
    const stale = path.join(sessions, "stale.json");
    await fs.writeFile(stale, JSON.stringify({ token_budget: { total_calls: 99 } }), "utf8");
    await fs.utimes(stale, new Date(1_000_000), new Date(1_000_000));

    const event = (command: string) =>
      JSON.stringify({ session_id: "sess-1", tool_name: "Bash", tool_input: { command } });
    for (let i = 0; i < 3; i++) {
      await runCheck({ event: "PreToolUse", rawInput: event("git push --force origin main"), projectDirArg: project });
    }
    for (let i = 0; i < 2; i++) {
      await runCheck({ event: "PostToolUse", rawInput: event("ls"), projectDirArg: project });
    }

    const shown = lines((await status(project)).stdout);
    expect(shown.slice(0, 3)).toEqual([
      "hookwarden v0.1.0 | Severity: standard | Packs: universal",
      "Rules: 15 active | Session: 2 tool calls tracked",
      "Circuit breakers:",
    ]);
    expect(shown).toContain("  no-force-push: degraded (fired 3x)");

    expect(lines((await status(project, "stale")).stdout)[1]).toBe("Rules: 15 active | Session: 99 tool calls tracked");
  });

  it("sets up hooks and config, then doctor passes", async () => {
    const project = await makeTempWorkspace();

    const before = await doctor(project, "18.19.0");
    expect(before.exitCode).toBe(1);
    expect(lines(before.stdout)).toEqual([
      `  OK  Session cache: ${path.join(cacheDir, "sessions")} (will be created)`,
      "  !!  Config file: not found. Run 'hookwarden init' to create hookwarden.json.",
      "  !!  Hooks: not installed. Run 'hookwarden setup' to install.",
      "  !!  Node.js: 18.19.0 (requires >=20)",
      "",
      "3 issue(s) found.",
    ]);

    const installed = await setup("project", project, "hookwarden");
    expect(lines(installed.stdout)).toEqual([
      `Installed hookwarden hooks in ${settingsPath("project", project)}`,
      `Created ${path.join(project, "hookwarden.json")}`,
      "Available packs: universal, security",
    ]);

    const after = await doctor(project, "20.11.0");
    expect(after.exitCode).toBe(0);
    expect(lines(after.stdout).at(-1)).toBe("All checks passed.");
  });

  it("uninstalls hooks", async () => {
    const project = await makeTempWorkspace();
    expect((await uninstall("project", project)).stdout).toBe(
      `No hookwarden hooks found in ${settingsPath("project", project)}\n`,
    );

    await setup("project", project, "hookwarden");
    expect(lines((await uninstall("project", project)).stdout)[0]).toBe(
      `Removed hookwarden hooks from ${settingsPath("project", project)}`,
    );
  });
});
