import {
  type ILogObj,
  type Logger,
  type LoggerOptions,
  OpenAIReasoningProvider,
  type ReasoningProvider,
  createLogger,
  parseLogLevel,
} from "halyard";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * What the `run` command needs to build a reasoning provider.
 */
export interface ProviderSettings {
  model: string;
  apiKey?: string;
  baseURL?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Directory used when --project is not given */
  cwd: string;
  /** Environment variables, for API keys */
  env: Record<string, string | undefined>;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  createProvider: (settings: ProviderSettings) => ReasoningProvider;
  /**
   * Registers a Ctrl-C handler. Returns a function that removes it.
   */
  onInterrupt: (handler: () => void) => () => void;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > config file > HALYARD_LOG_LEVEL > default
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name, type: "pretty" };
    const level = parseLogLevel(config?.logLevel);
    if (level !== undefined) {
      options.minLevel = level;
    }
    return createLogger(options);
  };
}

/**
 * First Ctrl-C calls `handler`; a second one exits at once.
 */
function onProcessInterrupt(handler: () => void): () => void {
  let interrupted = false;
  const listener = () => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    handler();
  };
  process.on("SIGINT", listener);
  return () => {
    process.off("SIGINT", listener);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    createProvider: (settings) => new OpenAIReasoningProvider(settings),
    onInterrupt: onProcessInterrupt,
  };
}
