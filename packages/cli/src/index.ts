export {
  ConfigError,
  cliConfigSchema,
  getConfigPath,
  loadConfig,
  parseConfig,
  toMcpServerConfigs,
  toSessionConfig,
} from "./config.js";
export type { CLIConfig } from "./config.js";
export { createDefaultEnvironment, createLoggerFactory } from "./environment.js";
export type { CLIEnvironment, CLILoggerConfig, ProviderSettings } from "./environment.js";
export { createProgram, runCLI } from "./program.js";
export type { RunCLIOptions } from "./program.js";
export { createEventPrinter, formatOutcome, formatToolResult } from "./render.js";
