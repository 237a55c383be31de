import type { Rule } from "hookwarden-core";
import { dependencyHygiene } from "./dependencyHygiene.js";
import { driftDetector } from "./driftDetector.js";
import { gitCheckpoint } from "./gitCheckpoint.js";
import { maxFileSize } from "./maxFileSize.js";
import { noDebugArtifacts } from "./noDebugArtifacts.js";
import { noDestructiveCommands } from "./noDestructiveCommands.js";
import { noEnvCommit } from "./noEnvCommit.js";
import { noForcePush } from "./noForcePush.js";
import { noPushToMain } from "./noPushToMain.js";
import { noSecrets } from "./noSecrets.js";
import { noSkipHooks } from "./noSkipHooks.js";
import { noTestWeakening } from "./noTestWeakening.js";
import { noTodoLeft } from "./noTodoLeft.js";
import { testWithChanges } from "./testWithChanges.js";
import { tokenBudget } from "./tokenBudget.js";

export const universalRules: readonly Rule[] = [
  // PreToolUse
  noSecrets,
  noEnvCommit,
  noForcePush,
  noPushToMain,
  noDestructiveCommands,
  noSkipHooks,
  dependencyHygiene,
  noTestWeakening,
  gitCheckpoint,
  // PostToolUse
  maxFileSize,
  driftDetector,
  tokenBudget,
  // Stop
  noDebugArtifacts,
  noTodoLeft,
  testWithChanges,
];
