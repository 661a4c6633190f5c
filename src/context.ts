import type { AppConfig } from "./config/types.js";
import type { CompletionClient } from "./llm/interface.js";
import type { DatabaseExecutor } from "./connectors/interface.js";
import type { AnalysisResult, Schema } from "./analysis/types.js";
import { ConnectorManager } from "./connectors/manager.js";
import { OllamaClient } from "./llm/ollama.js";
import { QueryAnalyzer } from "./analysis/analyzer.js";
import { resolveAnalysisRequest, resolveConnectionString, type AnalyzeInput } from "./analysis/request.js";
import { getLogger } from "./utils/logger.js";

export type ContextResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface ContextDependencies {
  executor?: DatabaseExecutor;
  completions?: CompletionClient;
}

/**
 * Everything the transports share: current config, the database executor and
 * the completion client. Holds no per-request state.
 */
export class AppContext {
  private config: AppConfig;
  private executor: DatabaseExecutor;
  private completions: CompletionClient;
  private analyzer: QueryAnalyzer;

  constructor(config: AppConfig, deps: ContextDependencies = {}) {
    this.config = config;
    this.executor = deps.executor ?? new ConnectorManager(config.defaults);
    this.completions = deps.completions ?? new OllamaClient({ requestTimeout: config.ollama.requestTimeout });
    this.analyzer = new QueryAnalyzer(this.executor, this.completions);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /** Later requests see the new settings; requests already running keep theirs. */
  reload(config: AppConfig): void {
    this.config = config;
    if (this.executor instanceof ConnectorManager) {
      this.executor.updateDefaults(config.defaults);
    }
    if (this.completions instanceof OllamaClient) {
      this.completions = new OllamaClient({ requestTimeout: config.ollama.requestTimeout });
      this.analyzer = new QueryAnalyzer(this.executor, this.completions);
    }
  }

  async analyze(input: AnalyzeInput): Promise<ContextResult<AnalysisResult>> {
    const resolved = resolveAnalysisRequest(input, this.config.analyzer, this.config.ollama);
    if (!resolved.ok) return resolved;

    getLogger().info("Analyzing question", { prompt: resolved.request.prompt, model: resolved.request.model });
    return { ok: true, value: await this.analyzer.analyze(resolved.request) };
  }

  async testConnection(connectionString?: string): Promise<ContextResult<boolean>> {
    const target = resolveConnectionString(connectionString, this.config.analyzer);
    if (!target) return { ok: false, error: "Connection string is required" };
    return { ok: true, value: await this.executor.testConnection(target) };
  }

  async getSchema(connectionString?: string): Promise<ContextResult<Schema>> {
    const target = resolveConnectionString(connectionString, this.config.analyzer);
    if (!target) return { ok: false, error: "Connection string is required" };
    return { ok: true, value: await this.executor.fetchSchema(target) };
  }
}
