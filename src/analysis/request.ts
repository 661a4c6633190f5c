import { z } from "zod";
import type { AnalyzerConfig, OllamaConfig } from "../config/types.js";
import type { AnalysisRequest } from "./types.js";

export const AnalyzeInputSchema = z.object({
  prompt: z.string().optional(),
  connectionString: z.string().optional(),
  ollamaUrl: z.string().optional(),
  model: z.string().optional(),
});

export type AnalyzeInput = z.infer<typeof AnalyzeInputSchema>;

export type ResolvedRequest = { ok: true; request: AnalysisRequest } | { ok: false; error: string };

function nonBlank(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

/**
 * Fill a caller's input from config and apply the endpoint/model defaults.
 * This is the only place defaults are applied; the analyzer receives complete requests.
 */
export function resolveAnalysisRequest(
  input: AnalyzeInput,
  analyzer: AnalyzerConfig,
  ollama: OllamaConfig,
): ResolvedRequest {
  const connectionString = nonBlank(input.connectionString) ?? nonBlank(analyzer.connectionString);
  if (!connectionString) return { ok: false, error: "Connection string is required" };

  const prompt = nonBlank(input.prompt);
  if (!prompt) return { ok: false, error: "Prompt is required" };

  return {
    ok: true,
    request: {
      connectionString,
      prompt,
      ollamaUrl: nonBlank(input.ollamaUrl) ?? ollama.url,
      model: nonBlank(input.model) ?? ollama.model,
    },
  };
}

/** Connection string for the schema and connectivity operations, falling back to config. */
export function resolveConnectionString(input: string | undefined, analyzer: AnalyzerConfig): string | undefined {
  return nonBlank(input) ?? nonBlank(analyzer.connectionString);
}
