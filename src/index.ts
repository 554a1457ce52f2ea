/**
 * Content-plan documentation renderer.
 *
 * Turns a structured content plan into Markdown or DocBook documents
 * through a small templating language. See templates/index.ts for the
 * template syntax and generator/ for the end-to-end entry point.
 */

export * from "./templates/index.js";
export * from "./plan/index.js";
export * from "./adapters/index.js";
export * from "./generator/index.js";
export {
  config,
  loadConfig,
  validateConfig,
  configuredLogLevel,
  ConfigError,
  BUILTIN_TEMPLATES_DIR,
  type AppConfig,
} from "./config/index.js";
export {
  createLogger,
  createSilentLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
} from "./logging/index.js";
