import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ILogObj, Logger } from "tslog";
import { errorMessage } from "../../core/errors.js";
import { createLogger } from "../../logging/logger.js";
import { ToolExecutionError } from "../exceptions.js";
import type { ToolRegistry } from "../registry.js";
import { type AbstractTool, createTool } from "../tool.js";
import { toolArgumentsSchema } from "./json-schema.js";

export type McpServerConfig =
  | {
      name: string;
      type: "stdio";
      command: string;
      args?: string[];
      env?: Record<string, string>;
      cwd?: string;
      /** Prepended to every tool name from this server */
      toolPrefix?: string;
    }
  | {
      name: string;
      type: "streamableHttp";
      url: string;
      headers?: Record<string, string>;
      toolPrefix?: string;
    }
  | {
      /** An already constructed transport, e.g. an in-memory pair */
      name: string;
      type: "transport";
      transport: Transport;
      toolPrefix?: string;
    };

export interface McpConnection {
  name: string;
  /** Registered tool names */
  tools: string[];
  close(): Promise<void>;
}

const HTTP_PROTOCOLS = new Set(["http:", "https:"]);

function createTransport(config: McpServerConfig): Transport {
  switch (config.type) {
    case "stdio":
      if (!config.command) {
        throw new Error(`MCP server '${config.name}': stdio transport requires a command`);
      }
      return new StdioClientTransport({
        command: config.command,
        args: config.args,
        env: config.env,
        cwd: config.cwd,
        stderr: "pipe",
      });
    case "streamableHttp": {
      const url = new URL(config.url);
      if (!HTTP_PROTOCOLS.has(url.protocol)) {
        throw new Error(`MCP server '${config.name}': streamableHttp requires an http(s) URL`);
      }
      return new StreamableHTTPClientTransport(url, {
        requestInit: config.headers ? { headers: config.headers } : undefined,
      });
    }
    case "transport":
      return config.transport;
    default: {
      const exhaustive: never = config;
      return exhaustive;
    }
  }
}

function toolName(prefix: string | undefined, remoteName: string): string {
  const name = `${prefix ?? ""}${remoteName}`.replace(/[^A-Za-z0-9_-]/g, "_");
  return name.slice(0, 64);
}

function renderContent(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.safeParse(result);
  if (!parsed.success) {
    return { text: JSON.stringify(result), isError: false };
  }
  const parts = parsed.data.content.map((item) => (item.type === "text" ? item.text : `[${item.type} content]`));
  return { text: parts.join("\n"), isError: parsed.data.isError === true };
}

/**
 * Wraps one remote tool so the dispatcher can run it like a built-in.
 */
function remoteTool(
  client: Client,
  serverName: string,
  name: string,
  remote: { name: string; description?: string; inputSchema: Record<string, unknown> },
): AbstractTool {
  return createTool({
    name,
    description: remote.description ?? `Tool '${remote.name}' from MCP server '${serverName}'`,
    schema: toolArgumentsSchema(remote.inputSchema),
    jsonSchema: remote.inputSchema,
    execute: async (args, ctx) => {
      const result = await client.callTool({ name: remote.name, arguments: args }, undefined, {
        signal: ctx.signal,
      });
      const { text, isError } = renderContent(result);
      if (isError) {
        throw new ToolExecutionError(text || `Tool '${remote.name}' reported an error`);
      }
      return text || "(no output)";
    },
  });
}

/**
 * Connects to one MCP server, lists its tools and registers each of them.
 */
export async function connectMcpServer(
  config: McpServerConfig,
  registry: ToolRegistry,
  logger: Logger<ILogObj> = createLogger({ name: "halyard:mcp" }),
): Promise<McpConnection> {
  const client = new Client({ name: "halyard", version: "0.1.0" });
  await client.connect(createTransport(config));

  const { tools } = await client.listTools();
  const registered: string[] = [];
  for (const tool of tools) {
    const name = toolName(config.toolPrefix, tool.name);
    registry.register(remoteTool(client, config.name, name, tool));
    registered.push(name);
  }
  logger.info(`Connected MCP server '${config.name}'`, { tools: registered });

  return {
    name: config.name,
    tools: registered,
    close: () => client.close(),
  };
}

/**
 * Connects every configured server. A server that fails to connect is
 * logged and skipped; the session still runs with the remaining tools.
 */
export async function connectMcpServers(
  configs: readonly McpServerConfig[],
  registry: ToolRegistry,
  logger: Logger<ILogObj> = createLogger({ name: "halyard:mcp" }),
): Promise<McpConnection[]> {
  const connections: McpConnection[] = [];
  for (const config of configs) {
    try {
      connections.push(await connectMcpServer(config, registry, logger));
    } catch (error) {
      logger.error(`Failed to connect MCP server '${config.name}'`, { error: errorMessage(error) });
    }
  }
  return connections;
}
