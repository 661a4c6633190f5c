import type { CompletionClient } from "../llm/interface.js";
import type { DatabaseExecutor } from "../connectors/interface.js";
import type { AnalysisRequest, AnalysisResult } from "./types.js";
import { generateQuery } from "./generator.js";
import { summarizeResults } from "./summarizer.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export const CONNECTION_FAILED_MESSAGE = "Failed to connect to database. Check your connection string.";

/**
 * Runs one analysis end to end: connectivity probe, schema fetch, query
 * generation, execution and narrative. Steps run strictly in sequence and the
 * first unrecovered failure ends the run with `success: false`.
 */
export class QueryAnalyzer {
  constructor(
    private executor: DatabaseExecutor,
    private completions: CompletionClient,
  ) {}

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const logger = getLogger().child({ model: request.model });
    const result: AnalysisResult = { success: false };

    const isConnected = await this.executor.testConnection(request.connectionString);
    if (!isConnected) {
      result.error = CONNECTION_FAILED_MESSAGE;
      return result;
    }

    try {
      const schema = await this.executor.fetchSchema(request.connectionString);
      result.schema = schema;
      logger.debug("Schema fetched", { tables: schema.tables.length });

      const sql = await generateQuery(
        this.completions,
        {
          ollamaUrl: request.ollamaUrl,
          model: request.model,
          dialect: this.executor.dialectFor(request.connectionString),
        },
        request.prompt,
        schema,
      );
      result.generatedQuery = sql;
      logger.info("Generated query", { query: sql });

      const data = await this.executor.execute(request.connectionString, sql);
      result.data = data;

      result.analysis = await summarizeResults(
        this.completions,
        { ollamaUrl: request.ollamaUrl, model: request.model },
        request.prompt,
        sql,
        data,
      );
      result.success = true;
      logger.info("Analysis completed", { rows: data.length });
    } catch (err) {
      logger.error("Error during analysis", { error: errorMessage(err) });
      result.error = errorMessage(err);
      result.success = false;
    }

    return result;
  }
}
