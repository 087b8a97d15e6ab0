import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createServerContext, type ServerContext } from "./context.js";
import { ToolRegistry } from "./tool-registry.js";
import * as schemeTools from "./scheme-tools.js";
import * as conversationTools from "./conversation-tools.js";
import * as financeTools from "./finance-tools.js";
import * as systemTools from "./system-tools.js";
import { SERVER_NAME, SERVER_VERSION } from "./system-tools.js";
import { getErrorMessage, logError, logInfo } from "../core/logging.js";

export function createRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(schemeTools.getToolDefinitions());
  registry.register(conversationTools.getToolDefinitions());
  registry.register(financeTools.getToolDefinitions());
  registry.register(systemTools.getToolDefinitions());
  return registry;
}

export function createMcpServer(ctx: ServerContext, registry: ToolRegistry): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await registry.callTool(name, args, ctx);
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      logError(`Tool ${name} failed:`, errorMessage);
      return {
        content: [{ type: "text" as const, text: `Error: ${errorMessage}` }],
        isError: true,
      };
    }
  });

  return server;
}

function registerShutdown(ctx: ServerContext): void {
  const shutdown = (signal: string) => {
    logInfo(`Received ${signal}, shutting down...`);
    ctx.sessionStore?.close();
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

export async function startServer(): Promise<void> {
  const ctx = await createServerContext();
  const server = createMcpServer(ctx, createRegistry());
  registerShutdown(ctx);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}
