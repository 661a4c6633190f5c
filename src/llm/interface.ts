export interface CompletionClient {
  /** One request per call; resolves with the completion text only. */
  generate(endpoint: string, model: string, prompt: string): Promise<string>;
}
