import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { McpServerConfig, SessionConfigInput } from "halyard";
import { load as parseToml } from "js-toml";
import * as z from "zod";
import { LOG_LEVELS } from "./constants.js";

const positiveInt = z.number().int().positive();

const providerSchema = z.strictObject({
  model: z.string().min(1).optional(),
  "base-url": z.url().optional(),
  /** Name of the environment variable holding the API key */
  "api-key-env": z.string().min(1).optional(),
  system: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  "max-tokens": positiveInt.optional(),
});

const sessionSchema = z.strictObject({
  "max-cycles": positiveInt.optional(),
  "max-malformed-responses": positiveInt.optional(),
  "context-budget": positiveInt.optional(),
  "preserve-recent-turns": positiveInt.optional(),
  "trigger-ratio": z.number().gt(0).max(1).optional(),
  "tool-timeout-ms": positiveInt.optional(),
  "max-output-chars": positiveInt.optional(),
  /** Provider call retries; 0 disables retrying */
  retries: z.number().int().nonnegative().optional(),
  /** Extra ignore globs for the listing and search tools */
  ignore: z.array(z.string().min(1)).optional(),
  "builtin-tools": z.boolean().optional(),
});

const stdioServerSchema = z.strictObject({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().optional(),
  "tool-prefix": z.string().optional(),
});

const httpServerSchema = z.strictObject({
  name: z.string().min(1),
  url: z.url(),
  headers: z.record(z.string(), z.string()).optional(),
  "tool-prefix": z.string().optional(),
});

export const cliConfigSchema = z.strictObject({
  "log-level": z.enum(LOG_LEVELS).optional(),
  provider: providerSchema.optional(),
  session: sessionSchema.optional(),
  "mcp-servers": z.array(z.union([stdioServerSchema, httpServerSchema])).optional(),
});

/**
 * Contents of the TOML config file.
 *
 * @example
 * ```toml
 * log-level = "info"
 *
 * [provider]
 * model = "gpt-4.1-mini"
 *
 * [session]
 * max-cycles = 30
 * ignore = ["fixtures/**"]
 *
 * [[mcp-servers]]
 * name = "docs"
 * command = "docs-mcp"
 * args = ["--stdio"]
 * ```
 */
export type CLIConfig = z.infer<typeof cliConfigSchema>;
export type ProviderSection = NonNullable<CLIConfig["provider"]>;
export type SessionSection = NonNullable<CLIConfig["session"]>;

/**
 * Returns the default config file path: ~/.halyard/config.toml
 */
export function getConfigPath(): string {
  return join(homedir(), ".halyard", "config.toml");
}

/**
 * Expands a leading `~` to the user's home directory.
 */
export function expandTildePath(path: string): string {
  return path.startsWith("~") ? path.replace(/^~/, homedir()) : path;
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

function issueLocation(path: readonly PropertyKey[]): string {
  const [section, ...rest] = path.map(String);
  if (section === undefined) {
    return "";
  }
  return rest.length === 0 ? `[${section}] ` : `[${section}].${rest.join(".")} `;
}

/**
 * Parses and validates TOML config text. `path` only labels errors.
 *
 * @throws ConfigError on invalid TOML or an invalid section
 */
export function parseConfig(content: string, path?: string): CLIConfig {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      path,
    );
  }

  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issueLocation(issue.path)}${issue.message}`);
    throw new ConfigError(problems.join("; "), path);
  }
  return parsed.data;
}

/**
 * Loads the config file. A missing default file yields `{}`; a missing file
 * given explicitly is an error.
 *
 * @throws ConfigError
 */
export function loadConfig(explicitPath?: string): CLIConfig {
  const configPath = explicitPath ? expandTildePath(explicitPath) : getConfigPath();

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new ConfigError("Config file not found", configPath);
    }
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }
  return parseConfig(content, configPath);
}

/**
 * Maps the `[session]` section onto session options.
 */
export function toSessionConfig(section: SessionSection = {}): SessionConfigInput {
  return {
    maxCycles: section["max-cycles"],
    maxMalformedResponses: section["max-malformed-responses"],
    contextBudget: section["context-budget"],
    preserveRecentTurns: section["preserve-recent-turns"],
    triggerRatio: section["trigger-ratio"],
    toolTimeoutMs: section["tool-timeout-ms"],
    maxOutputChars: section["max-output-chars"],
    retry:
      section.retries === undefined
        ? undefined
        : { enabled: section.retries > 0, retries: section.retries },
  };
}

/**
 * Maps `[[mcp-servers]]` entries: `command` means stdio, `url` streamable HTTP.
 */
export function toMcpServerConfigs(entries: CLIConfig["mcp-servers"] = []): McpServerConfig[] {
  return entries.map((entry): McpServerConfig =>
    "command" in entry
      ? {
          name: entry.name,
          type: "stdio",
          command: entry.command,
          args: entry.args,
          env: entry.env,
          cwd: entry.cwd,
          toolPrefix: entry["tool-prefix"],
        }
      : {
          name: entry.name,
          type: "streamableHttp",
          url: entry.url,
          headers: entry.headers,
          toolPrefix: entry["tool-prefix"],
        },
  );
}
