export * from "./config.js";
export * from "./payload.js";
export * from "./context.js";
export * from "./reporter.js";
export * from "./git.js";
export * from "./customRules.js";
export * from "./setup.js";
export * from "./pipeline.js";
export * from "./commands.js";
export { BUILTIN_PACKS, builtinPackNames, loadBuiltinRules } from "./packs/index.js";
export { universalRules } from "./packs/universal/index.js";
export { securityRules } from "./packs/security/index.js";
