import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

export interface InMemoryToolDefinition {
  name: string;
  description?: string;
  /** JSON Schema `properties` of the argument object */
  properties?: Record<string, object>;
  required?: string[];
  /** Returns the text content; set `isError` to report a tool-level failure */
  handler(args: Record<string, unknown>): { text: string; isError?: boolean } | Promise<{ text: string; isError?: boolean }>;
}

export interface InMemoryMcpServer {
  /** Client end of the linked pair, for a `{ type: "transport" }` server config */
  clientTransport: Transport;
  /** Every tools/call request received, in order */
  calls: { name: string; args: Record<string, unknown> }[];
  close(): Promise<void>;
}

/**
 * Starts an MCP server in process that publishes `tools`, connected to the
 * returned client transport.
 */
export async function createInMemoryMcpServer(tools: InMemoryToolDefinition[]): Promise<InMemoryMcpServer> {
  const server = new Server({ name: "in-memory-test-server", version: "1.0.0" }, { capabilities: { tools: {} } });
  const calls: InMemoryMcpServer["calls"] = [];

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { type: "object" as const, properties: tool.properties ?? {}, required: tool.required },
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const args = request.params.arguments ?? {};
    calls.push({ name: request.params.name, args });
    const tool = tools.find((candidate) => candidate.name === request.params.name);
    if (!tool) {
      return { content: [{ type: "text" as const, text: `unknown tool ${request.params.name}` }], isError: true };
    }
    const { text, isError } = await tool.handler(args);
    return { content: [{ type: "text" as const, text }], isError: isError ?? false };
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  return {
    clientTransport,
    calls,
    close: () => server.close(),
  };
}
