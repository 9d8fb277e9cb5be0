import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ToolDispatcher } from "../tools/ToolDispatcher";

export function createMcpServer(dispatcher: ToolDispatcher, info: { name: string; version: string }): Server {
  const server = new Server(info, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async request => ({
    content: await dispatcher.callText(request.params.name, request.params.arguments ?? {}),
  }));

  return server;
}

export async function serveStdio(server: Server): Promise<StdioServerTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return transport;
}
