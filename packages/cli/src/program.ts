import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import * as z from "zod";
import { type CLIConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  LOG_LEVELS,
  type LogLevelName,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import { type CLIEnvironment, type CLILoggerConfig, createDefaultEnvironment } from "./environment.js";
import { registerRunCommand } from "./run-command.js";

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const file = new URL("../package.json", import.meta.url);
  return packageJsonSchema.parse(JSON.parse(readFileSync(file, "utf-8"))).version;
}

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parses and validates the log level option value.
 */
function parseLogLevelOption(value: string): LogLevelName {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return normalized;
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  config?: string;
  logLevel?: LogLevelName;
}

/**
 * Creates and configures the CLI program.
 */
export function createProgram(env: CLIEnvironment, config?: CLIConfig): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(readVersion())
    .option(OPTION_FLAGS.config, OPTION_DESCRIPTIONS.config)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerRunCommand(program, env, config);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  const envOverrides = opts.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // First pass: global options only (help stays with the real program)
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.config, OPTION_DESCRIPTIONS.config)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);

  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  // Config errors fail fast, before any command runs
  const config = opts.config ?? loadConfig(globalOpts.config);

  // Priority: CLI flags > config file > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: globalOpts.logLevel ?? config["log-level"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(argv);
}
