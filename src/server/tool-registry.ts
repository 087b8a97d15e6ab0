import type { ServerContext } from "./context.js";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
}

export type ToolArgs = Record<string, unknown> | undefined;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  handler: (args: ToolArgs, ctx: ServerContext) => Promise<ToolResponse>;
}

/** Body of every tool reply, serialized as the text content. */
export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
  attribution: string;
}

// ============================================================================
// Arg-parsing helpers
// ============================================================================

export function argString(args: ToolArgs, key: string): string {
  const val = args?.[key];
  return typeof val === "string" ? val : "";
}

export function argStringOpt(args: ToolArgs, key: string): string | undefined {
  const val = args?.[key];
  return typeof val === "string" ? val : undefined;
}

/** Finite numbers only; numeric strings are accepted as well. */
export function argNumber(args: ToolArgs, key: string): number | undefined {
  const val = args?.[key];
  if (typeof val === "number") return Number.isFinite(val) ? val : undefined;
  if (typeof val === "string" && val.trim() !== "") {
    const parsed = Number(val);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** A nested JSON object argument (e.g. a citizen profile). */
export function argRecord(
  args: ToolArgs,
  key: string,
): Record<string, unknown> | undefined {
  const val = args?.[key];
  if (typeof val !== "object" || val === null || Array.isArray(val)) {
    return undefined;
  }
  return { ...val };
}

export function formatToolResponse(result: ToolResult): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

export function toolError(error: string): ToolResponse {
  return formatToolResponse({ success: false, error, attribution: "" });
}

/**
 * Collects tool definitions from the tool modules and dispatches calls.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(defs: ToolDefinition[]): void {
    for (const def of defs) {
      if (this.tools.has(def.name)) {
        throw new Error(`Duplicate tool name: ${def.name}`);
      }
      this.tools.set(def.name, def);
    }
  }

  listTools(): Array<{
    name: string;
    description: string;
    inputSchema: Record<string, unknown>;
  }> {
    return [...this.tools.values()].map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
  }

  async callTool(
    name: string,
    args: ToolArgs,
    ctx: ServerContext,
  ): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return tool.handler(args, ctx);
  }
}
