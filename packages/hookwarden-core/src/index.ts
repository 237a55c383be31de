export * from "./models.js";
export * from "./logger.js";
export * from "./severityPolicy.js";
export * from "./engine.js";
export * from "./circuitBreaker.js";
export * from "./sessionStore.js";
