import { z } from "zod";
import type { CompletionClient } from "./interface.js";
import { CompletionError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
}

const OllamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string().optional(),
  done: z.boolean().optional(),
});

export interface OllamaClientOptions {
  /** Abort a request after this many ms. Unset means wait for the server. */
  requestTimeout?: number;
}

/** Non-streaming client for Ollama's `/api/generate` endpoint. */
export class OllamaClient implements CompletionClient {
  private requestTimeout?: number;

  constructor(options: OllamaClientOptions = {}) {
    this.requestTimeout = options.requestTimeout;
  }

  async generate(endpoint: string, model: string, prompt: string): Promise<string> {
    const url = `${endpoint.replace(/\/+$/, "")}/api/generate`;
    const body: OllamaGenerateRequest = { model, prompt, stream: false };
    const start = Date.now();

    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(body),
        signal: this.requestTimeout ? AbortSignal.timeout(this.requestTimeout) : undefined,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Response status code does not indicate success: ${response.status} ${errorText}`.trim());
      }

      const data = OllamaGenerateResponseSchema.parse(await response.json());
      getLogger().debug("Ollama completion received", { model, latencyMs: Date.now() - start });
      return data.response ?? "";
    } catch (err) {
      getLogger().error("Error calling Ollama API", { url, model, error: String(err) });
      throw new CompletionError(err);
    }
  }
}
