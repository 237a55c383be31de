import { contextFilePath, type Finding, type Rule } from "hookwarden-core";

const WRITE_TOOLS = new Set(["Write", "Edit"]);

const TEST_FILE_RE = /(?:^|\/)(?:test_|tests?\/|spec_|__tests__\/|.*\.test\.|.*\.spec\.)/i;

type Pattern = { re: RegExp; message: string; suggestion: string };

const WEAKENING_PATTERNS: Pattern[] = [
  {
    re: /@pytest\.mark\.skip\b/,
    message: "Test skip marker detected: @pytest.mark.skip",
    suggestion: "Fix the test instead of skipping it, or use @pytest.mark.xfail with a reason.",
  },
  {
    re: /@unittest\.skip\b/,
    message: "Test skip marker detected: @unittest.skip",
    suggestion: "Fix the test instead of skipping it.",
  },
  {
    re: /\b(?:it|test|describe)\.skip\b/,
    message: "Test skip detected: .skip()",
    suggestion: "Fix the test instead of skipping it.",
  },
  {
    re: /\bassert\s+True\b/,
    message: "Trivially passing assertion: assert True",
    suggestion: "Replace 'assert True' with a meaningful assertion.",
  },
  {
    re: /\bself\.assertTrue\s*\(\s*True\s*\)/,
    message: "Trivially passing assertion: self.assertTrue(True)",
    suggestion: "Replace 'assertTrue(True)' with a meaningful assertion.",
  },
  {
    re: /\bexpect\s*\(\s*true\s*\)\s*\.toBe\s*\(\s*true\s*\)/i,
    message: "Trivially passing assertion: expect(true).toBe(true)",
    suggestion: "Replace with a meaningful expectation.",
  },
  {
    re: /^\s*#\s*assert\b/m,
    message: "Commented-out assertion detected",
    suggestion: "Remove or restore commented-out assertions instead of leaving dead test code.",
  },
  {
    re: /^\s*\/\/\s*expect\b/m,
    message: "Commented-out expectation detected",
    suggestion: "Remove or restore commented-out expectations instead of leaving dead test code.",
  },
  {
    re: /@pytest\.mark\.xfail\s*(?:\(\s*\))?$/m,
    message: "@pytest.mark.xfail without reason",
    suggestion: "Add a reason parameter: @pytest.mark.xfail(reason='...')",
  },
  {
    re: /def\s+test_\w+\s*\([^)]*\)\s*:\s*\n\s+pass\b/m,
    message: "Empty test function detected (pass only)",
    suggestion: "Implement the test or remove the empty placeholder.",
  },
];

export const noTestWeakening: Rule = {
  id: "no-test-weakening",
  description: "Warns when tests are skipped, trivialized, or commented out",
  severity: "warning",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    if (!WRITE_TOOLS.has(ctx.toolName)) return [];
    const filePath = contextFilePath(ctx);
    if (!filePath || !TEST_FILE_RE.test(filePath)) return [];

    const content = ctx.toolInput.content;
    if (typeof content !== "string" || !content) return [];

    const findings: Finding[] = [];
    for (const p of WEAKENING_PATTERNS) {
      if (!p.re.test(content)) continue;
      findings.push({
        ruleId: this.id,
        message: p.message,
        severity: this.severity,
        filePath,
        suggestion: p.suggestion,
      });
    }
    return findings;
  },
};
