import type { ToolDefinition } from "./tool-registry.js";
import { formatToolResponse } from "./tool-registry.js";

export const SERVER_NAME = "sahayak-mcp";
export const SERVER_VERSION = "1.0.0";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "health",
      description: "Server status: version, catalog size, model and session store state.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, ctx) =>
        formatToolResponse({
          success: true,
          data: {
            name: SERVER_NAME,
            version: SERVER_VERSION,
            schemes: ctx.catalog.size,
            model: ctx.config.llm.model,
            model_configured: ctx.config.llm.apiKey !== undefined,
            session_store: ctx.sessionStore?.isReady() ?? false,
            active_sessions: ctx.sessionStore?.count() ?? 0,
            default_language: ctx.config.languages.defaultLanguage,
          },
          attribution: "",
        }),
    },
  ];
}
