import { z } from "zod";
import type { AppContext } from "../context.js";
import { formatSuccess, formatError } from "../utils/response.js";

export function createTestConnectionParams() {
  return {
    connectionString: z
      .string()
      .optional()
      .describe("Database connection string (default: analyzer.connectionString from config)"),
  };
}

export function testConnectionHandler(context: AppContext) {
  return async (params: { connectionString?: string }) => {
    const outcome = await context.testConnection(params.connectionString);
    if (!outcome.ok) return formatError(outcome.error, "INVALID_REQUEST");
    if (!outcome.value) return formatError("Connection failed", "CONNECTION_FAILED");
    return formatSuccess({ message: "Connection successful" });
  };
}
