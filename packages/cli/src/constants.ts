/** CLI program name */
export const CLI_NAME = "halyard";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION = "Run an autonomous coding agent against a project directory.";

/** Prefix for summary lines written to stderr */
export const SUMMARY_PREFIX = "[halyard]";

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

/** Model used when neither --model nor the config file names one */
export const DEFAULT_MODEL = "gpt-4.1-mini";

/** Environment variable holding the API key unless the config names another */
export const DEFAULT_API_KEY_ENV = "OPENAI_API_KEY";

/** Command-line option flags */
export const OPTION_FLAGS = {
  config: "-c, --config <path>",
  logLevel: "--log-level <level>",
  project: "-p, --project <dir>",
  model: "-m, --model <identifier>",
  maxCycles: "--max-cycles <count>",
  noBuiltins: "--no-builtins",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  config: "Path to the TOML config file (default: ~/.halyard/config.toml).",
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  project: "Project root the tools operate on (default: current directory).",
  model: "Chat completions model identifier.",
  maxCycles: "Maximum number of reasoning cycles before the session fails.",
  noBuiltins: "Disable the built-in tools; only MCP server tools are available.",
} as const;

/** Process exit codes for `run` */
export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  // 128 + SIGINT
  cancelled: 130,
} as const;
