export { loadConfig, parseConfig, type MemoryServiceConfig } from "./config.js";
export * from "./errors.js";
export { createLogger, createSilentLogger, type Logger } from "./log.js";
export * from "./memory/index.js";
export { createRuntime, VERSION, type HealthReport, type MemoryRuntime, type RuntimeOverrides } from "./runtime.js";
export { createApp, startServer, type RunningServer } from "./server/app.js";
