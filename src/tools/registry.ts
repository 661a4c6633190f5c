import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppContext } from "../context.js";
import { analyzeHandler, createAnalyzeParams } from "./analyze.js";
import { createTestConnectionParams, testConnectionHandler } from "./test-connection.js";
import { createGetSchemaParams, getSchemaHandler } from "./get-schema.js";

export function registerTools(server: McpServer, context: AppContext) {
  server.tool(
    "analyze",
    "Answer a question about a database: generates SQL with a local Ollama model, runs it, and summarizes the rows",
    createAnalyzeParams(),
    analyzeHandler(context),
  );

  server.tool(
    "test_connection",
    "Check that a database connection string can be opened",
    createTestConnectionParams(),
    testConnectionHandler(context),
  );

  server.tool(
    "get_schema",
    "List the base tables and columns of a database",
    createGetSchemaParams(),
    getSchemaHandler(context),
  );
}
