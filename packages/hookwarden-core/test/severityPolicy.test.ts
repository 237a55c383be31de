import { describe, it, expect } from "vitest";
import { effectiveSeverity, parseSeverityMode } from "../src/severityPolicy.js";
import { compareSeverity, isBlockingSeverity } from "../src/models.js";

describe("severity policy", () => {
  it("leaves severities unchanged in standard mode", () => {
    expect(effectiveSeverity("error", "standard")).toBe("error");
    expect(effectiveSeverity("warning", "standard")).toBe("warning");
    expect(effectiveSeverity("info", "standard")).toBe("info");
  });

  it("promotes one step in strict mode", () => {
    expect(effectiveSeverity("error", "strict")).toBe("error");
    expect(effectiveSeverity("warning", "strict")).toBe("error");
    expect(effectiveSeverity("info", "strict")).toBe("warning");
  });

  it("only softens warnings in relaxed mode", () => {
    expect(effectiveSeverity("error", "relaxed")).toBe("error");
    expect(effectiveSeverity("warning", "relaxed")).toBe("info");
    expect(effectiveSeverity("info", "relaxed")).toBe("info");
  });

  it("parses unknown modes as standard", () => {
    expect(parseSeverityMode("strict")).toBe("strict");
    expect(parseSeverityMode("relaxed")).toBe("relaxed");
    expect(parseSeverityMode("paranoid")).toBe("standard");
    expect(parseSeverityMode(undefined)).toBe("standard");
  });

  it("ranks error above warning above info", () => {
    expect(compareSeverity("error", "warning")).toBeGreaterThan(0);
    expect(compareSeverity("info", "warning")).toBeLessThan(0);
    expect(isBlockingSeverity("error")).toBe(true);
    expect(isBlockingSeverity("warning")).toBe(false);
  });
});
