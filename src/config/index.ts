/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";
import { isOutputFormat, listFormats } from "../adapters/index.js";

export { ConfigError, type EnvSource } from "./env.js";

/** Templates shipped with the package (`<package root>/templates`). */
export const BUILTIN_TEMPLATES_DIR = fileURLToPath(
  new URL("../../templates", import.meta.url)
);

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Debug mode: logs at debug level whatever LOG_LEVEL says */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Directory of the built-in document templates */
  readonly templatesDir: string;
  /** Per-user configuration directory */
  readonly homeDir: string;
  /** User templates; these override built-ins with the same name */
  readonly userTemplatesDir: string;
  /** Output format used when none is requested */
  readonly defaultOutputFormat: string;
  /** Directory for log files */
  readonly logDir: string;
}

/**
 * Read configuration from the environment. Values are not validated here;
 * call validateConfig() for that.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const homeDir = optionalEnv("DOCPLAN_HOME", join(homedir(), ".docplan"), env);

  return {
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    templatesDir: optionalEnv("DOCPLAN_TEMPLATES_DIR", BUILTIN_TEMPLATES_DIR, env),
    homeDir,
    userTemplatesDir: join(homeDir, "templates"),
    defaultOutputFormat: optionalEnv("DOCPLAN_OUTPUT_FORMAT", "markdown", env),
    logDir: optionalEnv("DOCPLAN_LOG_DIR", "output/logs", env),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate a configuration. Call this at application startup to fail fast.
 */
export function validateConfig(target: AppConfig = config): void {
  if (!["development", "production", "test"].includes(target.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${target.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(target.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${target.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (!isOutputFormat(target.defaultOutputFormat)) {
    throw new ConfigError(
      `Invalid DOCPLAN_OUTPUT_FORMAT: ${target.defaultOutputFormat}. ` +
        `Must be one of: ${listFormats().join(", ")}.`
    );
  }
}

/**
 * Log level of a validated configuration. DEBUG forces "debug".
 */
export function configuredLogLevel(target: AppConfig = config): LogLevel {
  if (target.debug) {
    return "debug";
  }
  return isLogLevel(target.logLevel) ? target.logLevel : "info";
}
