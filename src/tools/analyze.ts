import { z } from "zod";
import type { AppContext } from "../context.js";
import type { AnalyzeInput } from "../analysis/request.js";
import { formatAnalysis, formatError } from "../utils/response.js";

export function createAnalyzeParams() {
  return {
    prompt: z.string().describe("Question about the data, in plain language"),
    connectionString: z
      .string()
      .optional()
      .describe("Database connection string (default: analyzer.connectionString from config)"),
    ollamaUrl: z.string().optional().describe("Ollama endpoint (default: ollama.url from config)"),
    model: z.string().optional().describe("Ollama model (default: ollama.model from config)"),
  };
}

export function analyzeHandler(context: AppContext) {
  return async (params: AnalyzeInput) => {
    try {
      const outcome = await context.analyze(params);
      if (!outcome.ok) return formatError(outcome.error, "INVALID_REQUEST");
      return formatAnalysis(outcome.value);
    } catch (err) {
      return formatError(String(err));
    }
  };
}
