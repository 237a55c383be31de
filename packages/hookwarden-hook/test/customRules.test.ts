import { describe, it, expect, vi, afterEach } from "vitest";
import type { Rule } from "hookwarden-core";
import { isRuleFile, loadCustomRules, rulesFromModule } from "../src/customRules.js";
import { makeContext, makeTempWorkspace, writeRulesDir } from "./helpers.js";

function makeRule(id: string): Rule {
  return { id, description: id, severity: "warning", events: ["Stop"], pack: "custom", evaluate: () => [] };
}

describe("custom rules", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("only loads public .js and .mjs files", () => {
    expect(isRuleFile("policy.mjs")).toBe(true);
    expect(isRuleFile("policy.js")).toBe(true);
    expect(isRuleFile("_shared.js")).toBe(false);
    expect(isRuleFile("policy.ts")).toBe(false);
  });

  it("collects default, array and named rule exports once each", () => {
    const a = makeRule("a");
    const b = makeRule("b");
    expect(rulesFromModule({ default: a, rules: [a, b], other: 5, half: { id: "x" } })).toEqual([a, b]);
    expect(rulesFromModule(null)).toEqual([]);
  });

  it("loads rule modules from the configured directory and skips broken ones", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const project = await makeTempWorkspace();
    await writeRulesDir(project);

    const rules = await loadCustomRules("rules", project);
    expect(rules.map((r) => r.id).sort()).toEqual(["extra", "no-foo"]);

    const noFoo = rules.find((r) => r.id === "no-foo");
    expect(await noFoo?.evaluate(makeContext({ toolInput: { command: "echo foo" } }))).toEqual([
      { ruleId: "no-foo", message: "foo is not allowed", severity: "error" },
    ]);
  });

  it("returns nothing for a missing directory", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const project = await makeTempWorkspace();
    expect(await loadCustomRules("nowhere", project)).toEqual([]);
  });
});
