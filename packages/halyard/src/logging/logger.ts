import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Parses a level name ("debug") or number ("2") into a tslog level id.
 */
export function parseLogLevel(value?: string): number | undefined {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();

  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for production
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   */
  name?: string;
}

// All loggers writing to HALYARD_LOG_FILE share one stream
let sharedLogFilePath: string | undefined;
let sharedLogFileStream: WriteStream | undefined;
let writeErrorReported = false;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Resets the shared file logging state. Used for testing.
 * @internal
 */
export function _resetFileLoggingState(): void {
  if (sharedLogFileStream) {
    sharedLogFileStream.end();
    sharedLogFileStream = undefined;
  }
  sharedLogFilePath = undefined;
  writeErrorReported = false;
}

function openLogFile(path: string): void {
  if (sharedLogFileStream && sharedLogFilePath === path) {
    return;
  }
  try {
    sharedLogFileStream?.end();
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: "a" });
    stream.on("error", (error) => {
      if (!writeErrorReported) {
        console.error(`[halyard] Log file write error: ${error.message}`);
        writeErrorReported = true;
      }
      stream.end();
      if (sharedLogFileStream === stream) {
        sharedLogFileStream = undefined;
      }
    });
    sharedLogFileStream = stream;
    sharedLogFilePath = path;
  } catch (error) {
    console.error("Failed to initialize HALYARD_LOG_FILE output:", error);
  }
}

/**
 * Create a new logger instance.
 *
 * `HALYARD_LOG_LEVEL` sets the level when `minLevel` is not given;
 * `HALYARD_LOG_FILE` redirects every logger to one file with colors stripped.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "halyard:loop", minLevel: 2 });
 *
 * // Silent logger for tests
 * const silent = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.HALYARD_LOG_LEVEL);
  const envLogFile = process.env.HALYARD_LOG_FILE?.trim() ?? "";

  const minLevel = options.minLevel ?? envMinLevel ?? 4;
  const defaultType = options.type ?? "pretty";
  const name = options.name ?? "halyard";

  if (envLogFile) {
    openLogFile(envLogFile);
  }

  const useFileLogging = Boolean(sharedLogFileStream) && defaultType !== "hidden";

  return new Logger<ILogObj>({
    name,
    minLevel,
    type: useFileLogging ? "pretty" : defaultType,
    hideLogPositionForProduction: useFileLogging || defaultType !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: useFileLogging
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
            if (!sharedLogFileStream) return;
            const meta = stripAnsi(logMetaMarkup);
            const args = logArgs.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            sharedLogFileStream.write(`${meta}${args.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

