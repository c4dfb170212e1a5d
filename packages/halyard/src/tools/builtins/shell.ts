import { spawn } from "node:child_process";
import { stat } from "node:fs/promises";
import { constants } from "node:os";
import * as z from "zod";
import { DEFAULT_STREAM_CAP_CHARS } from "../../core/constants.js";
import { AbortException, ToolExecutionError } from "../exceptions.js";
import { truncationMarker } from "../output-limit.js";
import { createTool } from "../tool.js";
import { resolveInProject } from "./paths.js";

interface CommandOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Keeps the first `cap` characters of a stream and counts the rest.
 */
class CappedCollector {
  private text = "";
  private overflow = 0;

  constructor(private readonly cap: number) {}

  push(chunk: string): void {
    const room = this.cap - this.text.length;
    if (room >= chunk.length) {
      this.text += chunk;
      return;
    }
    this.text += chunk.slice(0, Math.max(0, room));
    this.overflow += chunk.length - Math.max(0, room);
  }

  toString(): string {
    return this.overflow > 0 ? `${this.text}\n${truncationMarker(this.overflow)}` : this.text;
  }
}

/**
 * Shell convention for a process killed by a signal: 128 + signal number.
 */
function signalExitCode(exitSignal: NodeJS.Signals | null): number {
  if (!exitSignal) return 1;
  const signo = Object.entries(constants.signals).find(([name]) => name === exitSignal)?.[1];
  return 128 + (signo ?? 0);
}

/**
 * Runs `bash -c command` in its own process group so the whole tree can
 * be killed on abort.
 */
export function runBashCommand(
  command: string,
  cwd: string,
  signal: AbortSignal,
  streamCap: number,
): Promise<CommandOutcome> {
  return new Promise((resolvePromise, reject) => {
    if (signal.aborted) {
      reject(new AbortException("Command aborted before start"));
      return;
    }

    const child = spawn("bash", ["-c", command], {
      cwd,
      detached: true,
      stdio: ["ignore", "pipe", "pipe"],
    });
    const stdout = new CappedCollector(streamCap);
    const stderr = new CappedCollector(streamCap);
    child.stdout.setEncoding("utf-8").on("data", (chunk: string) => stdout.push(chunk));
    child.stderr.setEncoding("utf-8").on("data", (chunk: string) => stderr.push(chunk));

    const kill = () => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, "SIGKILL");
      } catch {
        child.kill("SIGKILL");
      }
    };
    signal.addEventListener("abort", kill, { once: true });

    child.on("error", (error) => {
      signal.removeEventListener("abort", kill);
      reject(error);
    });
    child.on("close", (code, exitSignal) => {
      signal.removeEventListener("abort", kill);
      if (signal.aborted) {
        reject(new AbortException("Command aborted"));
        return;
      }
      resolvePromise({
        exitCode: code ?? signalExitCode(exitSignal),
        stdout: stdout.toString(),
        stderr: stderr.toString(),
      });
    });
  });
}

async function requireDirectory(dir: string, shown: string): Promise<void> {
  const info = await stat(dir).catch(() => undefined);
  if (!info) {
    throw new ToolExecutionError(`the directory ${shown} does not exist`);
  }
  if (!info.isDirectory()) {
    throw new ToolExecutionError(`the path ${shown} is not a directory`);
  }
}

export interface BashToolOptions {
  /** Per-stream character cap. @default 16000 */
  streamCap?: number;
  timeoutMs?: number;
}

/**
 * `bash` tool. Output follows `status=N\n\n<output>`, stdout first, then stderr.
 * Every call starts in the project root; no shell state carries over.
 */
export function createBashTool(options: BashToolOptions = {}) {
  const streamCap = options.streamCap ?? DEFAULT_STREAM_CAP_CHARS;

  return createTool({
    name: "bash",
    description:
      "Execute a bash command in the project root (or a sub-directory given by cwd) and return its exit status and output. " +
      "Use it to install dependencies, run tests and linters, and for git operations. " +
      "Use the ls, grep and tree tools to explore files and text_editor to change them.",
    schema: z.strictObject({
      command: z.string().min(1).describe("The command to execute"),
      cwd: z
        .string()
        .optional()
        .describe("Working directory relative to the project root (default: project root)"),
    }),
    timeoutMs: options.timeoutMs,
    execute: async ({ command, cwd }, ctx) => {
      const workingDir = resolveInProject(ctx.projectRoot, cwd);
      await requireDirectory(workingDir, cwd ?? ".");
      ctx.logger.debug("Running command", { command, cwd: workingDir });

      const { exitCode, stdout, stderr } = await runBashCommand(
        command,
        workingDir,
        ctx.signal,
        streamCap,
      );
      const output = [stdout, stderr].filter(Boolean).join("\n").trim();
      return `status=${exitCode}\n\n${output || "(no output)"}`;
    },
  });
}
