export * from "./agent/index.js";
export { loadConfig, parseConfig, resolveCredential, type SwitchyardConfig } from "./config.js";
export { createLogger, silentLogger, type Logger } from "./log.js";
export { FileSessionStore, type SessionSnapshot, type SessionStore } from "./runtime/session-store.js";
export { buildProviders, createEngineRuntime, type EngineRuntime } from "./runtime/engine-factory.js";
