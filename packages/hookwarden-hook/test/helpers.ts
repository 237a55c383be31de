import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import type { EventContext, SessionState, SessionStore } from "hookwarden-core";

export async function makeTempWorkspace(config?: Record<string, unknown>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "hookwarden-hook-"));
  if (config) {
    await fs.writeFile(path.join(dir, "hookwarden.json"), JSON.stringify(config, null, 2), "utf8");
  }
  return dir;
}

export function makeContext(overrides: Partial<EventContext> = {}): EventContext {
  return {
    event: "PreToolUse",
    toolName: "Bash",
    toolInput: {},
    projectDir: "/tmp/project",
    config: {},
    sessionState: {},
    ...overrides,
  };
}

export function bash(command: string, overrides: Partial<EventContext> = {}): EventContext {
  return makeContext({ toolName: "Bash", toolInput: { command }, ...overrides });
}

export function write(filePath: string, content: string, overrides: Partial<EventContext> = {}): EventContext {
  return makeContext({ toolName: "Write", toolInput: { file_path: filePath, content }, ...overrides });
}

/** In-process store keyed like the file store, for pipeline tests. */
export function memoryStore(initial: SessionState = {}): SessionStore & { states: Map<string, SessionState> } {
  const states = new Map<string, SessionState>([["default", initial]]);
  return {
    states,
    pathFor: (key) => `memory://${key ?? "default"}`,
    async load(key) {
      return structuredClone(states.get(key ?? "default") ?? {});
    },
    async save(state, key) {
      states.set(key ?? "default", structuredClone(state));
    },
    async cleanup(key) {
      states.delete(key ?? "default");
    },
  };
}

const POLICY_MODULE = `
export default {
  id: "no-foo",
  description: "Blocks commands mentioning foo",
  severity: "error",
  events: ["PreToolUse"],
  pack: "custom",
  evaluate(ctx) {
    const command = String(ctx.toolInput.command ?? "");
    return command.includes("foo") ? [{ ruleId: this.id, message: "foo is not allowed", severity: this.severity }] : [];
  },
};

export const rules = [
  { id: "extra", description: "Stop-time check", severity: "info", events: ["Stop"], pack: "custom", evaluate: () => [] },
];

export const notARule = { id: 3 };
`;

export async function writeRulesDir(projectDir: string): Promise<string> {
  const dir = path.join(projectDir, "rules");
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, "policy.mjs"), POLICY_MODULE, "utf8");
  await fs.writeFile(path.join(dir, "_helper.mjs"), POLICY_MODULE, "utf8");
  await fs.writeFile(path.join(dir, "broken.mjs"), "export default {", "utf8");
  await fs.writeFile(path.join(dir, "notes.txt"), "not a module", "utf8");
  return dir;
}
