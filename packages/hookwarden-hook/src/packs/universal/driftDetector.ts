import { contextCommand, type Rule } from "hookwarden-core";
import { numberOption, sessionBoolean, sessionNumber } from "../options.js";

const WRITE_TOOLS = new Set(["Write", "Edit", "write", "edit"]);
const BASH_TOOLS = new Set(["Bash", "bash"]);
const TEST_RUNNERS = ["pytest", "vitest", "jest", "npm test", "make test"];
const DEFAULT_THRESHOLD = 10;

/**
 * Counts edits in session state and resets the count whenever a test runner
 * is seen in a shell command.
 */
export const driftDetector: Rule = {
  id: "drift-detector",
  description: "Warns when many edits happen without running tests",
  severity: "warning",
  events: ["PostToolUse"],
  pack: "universal",

  evaluate(ctx) {
    const state = ctx.sessionState;
    const threshold = numberOption(ctx, this.id, "threshold", DEFAULT_THRESHOLD);

    if (BASH_TOOLS.has(ctx.toolName)) {
      const command = contextCommand(ctx) ?? "";
      if (TEST_RUNNERS.some((runner) => command.includes(runner))) {
        state.files_edited = 0;
        state.last_test_run = true;
        return [];
      }
    }

    if (WRITE_TOOLS.has(ctx.toolName)) {
      state.files_edited = sessionNumber(state.files_edited) + 1;
      state.last_test_run = false;
    }

    const filesEdited = sessionNumber(state.files_edited);
    const lastTestRun = sessionBoolean(state.last_test_run, true);
    if (filesEdited <= threshold || lastTestRun) return [];

    return [
      {
        ruleId: this.id,
        message: `Edited ${filesEdited} files without running tests`,
        severity: this.severity,
        suggestion: "Consider running your test suite to catch regressions early.",
      },
    ];
  },
};
