import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CONFIG } from "./config.js";
import { type ToolDispatcher, setupToolHandlers } from "./toolHandlerSetup.js";

/**
 * Builds one MCP protocol server. A Server drives a single transport, so HTTP mode
 * makes one per SSE session while every instance shares the same dispatcher.
 */
export function createProtocolServer(dispatcher: ToolDispatcher): Server {
  const server = new Server(
    { name: CONFIG.SERVER_NAME, version: CONFIG.SERVER_VERSION },
    {
      capabilities: {
        tools: {},
      },
    },
  );
  setupToolHandlers(server, dispatcher);
  return server;
}
