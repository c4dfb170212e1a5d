import path from "node:path";
import { type Command, InvalidArgumentError } from "commander";
import { Session } from "halyard";
import { type CLIConfig, toMcpServerConfigs, toSessionConfig } from "./config.js";
import {
  DEFAULT_API_KEY_ENV,
  DEFAULT_MODEL,
  EXIT_CODES,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { createEventPrinter, formatOutcome } from "./render.js";

export interface RunCommandOptions {
  project?: string;
  model?: string;
  maxCycles?: number;
  /** false when --no-builtins is given */
  builtins: boolean;
}

/**
 * Parses a strictly positive integer option value.
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Runs one session to completion and sets the exit code:
 * 0 when done, 1 when failed, 130 when interrupted.
 */
export async function executeRun(
  instruction: string,
  options: RunCommandOptions,
  env: CLIEnvironment,
  config: CLIConfig = {},
): Promise<void> {
  const providerSection = config.provider ?? {};
  const sessionSection = config.session ?? {};
  const sessionConfig = toSessionConfig(sessionSection);

  const provider = env.createProvider({
    model: options.model ?? providerSection.model ?? DEFAULT_MODEL,
    apiKey: env.env[providerSection["api-key-env"] ?? DEFAULT_API_KEY_ENV],
    baseURL: providerSection["base-url"],
    systemPrompt: providerSection.system,
    temperature: providerSection.temperature,
    maxTokens: providerSection["max-tokens"],
  });

  const session = new Session({
    instruction,
    projectRoot: path.resolve(env.cwd, options.project ?? "."),
    provider,
    config: { ...sessionConfig, maxCycles: options.maxCycles ?? sessionConfig.maxCycles },
    builtinTools: options.builtins && (sessionSection["builtin-tools"] ?? true),
    ignorePatterns: sessionSection.ignore,
    mcpServers: toMcpServerConfigs(config["mcp-servers"]),
    observers: createEventPrinter(env.stderr),
    logger: env.createLogger("halyard"),
  });

  const dispose = env.onInterrupt(() => session.cancel("Interrupted"));
  let outcome: Awaited<ReturnType<Session["start"]>>;
  try {
    outcome = await session.start();
  } finally {
    dispose();
  }

  if (outcome.state === "DONE" && outcome.answer !== undefined) {
    env.stdout.write(`${outcome.answer}\n`);
  }
  env.stderr.write(`${formatOutcome(outcome)}\n`);

  const exitCode =
    outcome.state === "DONE"
      ? EXIT_CODES.completed
      : outcome.state === "CANCELLED"
        ? EXIT_CODES.cancelled
        : EXIT_CODES.failed;
  env.setExitCode(exitCode);
}

/**
 * Registers `run <instruction>`.
 */
export function registerRunCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command("run")
    .description("Run a session until the agent answers, fails or is interrupted.")
    .argument("<instruction>", "What the agent should do.")
    .option(OPTION_FLAGS.project, OPTION_DESCRIPTIONS.project)
    .option(OPTION_FLAGS.model, OPTION_DESCRIPTIONS.model)
    .option(OPTION_FLAGS.maxCycles, OPTION_DESCRIPTIONS.maxCycles, parsePositiveInteger)
    .option(OPTION_FLAGS.noBuiltins, OPTION_DESCRIPTIONS.noBuiltins)
    .action((instruction: string, options: RunCommandOptions) => executeRun(instruction, options, env, config));
}
