import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerTools } from "./tools/registry.js";
import { AppContext } from "./context.js";
import type { AppConfig } from "./config/types.js";

export const SERVER_NAME = "sql-insight-mcp";
export const SERVER_VERSION = "1.0.0";

export function createMcpServerInstance(context: AppContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  registerTools(server, context);
  return server;
}

export function createServer(config: AppConfig) {
  const context = new AppContext(config);
  const server = createMcpServerInstance(context);
  return { server, context };
}
