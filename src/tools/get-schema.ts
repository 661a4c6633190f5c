import { z } from "zod";
import type { AppContext } from "../context.js";
import { formatSuccess, formatError } from "../utils/response.js";

export function createGetSchemaParams() {
  return {
    connectionString: z
      .string()
      .optional()
      .describe("Database connection string (default: analyzer.connectionString from config)"),
  };
}

export function getSchemaHandler(context: AppContext) {
  return async (params: { connectionString?: string }) => {
    try {
      const outcome = await context.getSchema(params.connectionString);
      if (!outcome.ok) return formatError(outcome.error, "INVALID_REQUEST");
      return formatSuccess({ data: outcome.value });
    } catch (err) {
      return formatError(String(err));
    }
  };
}
