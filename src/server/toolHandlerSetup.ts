/**
 * Tool Handler Setup Module
 * Manages MCP tool registration and request handling logic
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

import { TOOL_SCHEMAS } from "../schema/toolSchemas.js";
import type { ToolInvocationResult } from "../types/index.js";
import { logWarn } from "../utils/logging.js";
import { CONFIG } from "./config.js";

/** The slice of ToolInvoker the protocol handlers call. */
export interface ToolDispatcher {
  /** Names of the tools to advertise; catalog entries outside this list are not listed. */
  readonly toolNames: readonly string[];
  invoke(name: string, args: unknown): Promise<ToolInvocationResult>;
}

/**
 * Sets up MCP tool handlers for the server
 * @param server - The MCP Server instance
 * @param dispatcher - Routes each tools/call to its tool
 */
export function setupToolHandlers(server: Server, dispatcher: ToolDispatcher): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOL_SCHEMAS.filter((tool) => dispatcher.toolNames.includes(tool.name)),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const slowCallWarning = setTimeout(() => {
      logWarn(`Tool ${name} is taking too long, the client may time out`);
    }, CONFIG.SLOW_TOOL_WARNING);

    try {
      const result = await dispatcher.invoke(name, args ?? {});
      return {
        content: [{ type: "text", text: result.text }],
        isError: result.isError,
      };
    } finally {
      clearTimeout(slowCallWarning);
    }
  });
}
