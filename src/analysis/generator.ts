import type { CompletionClient } from "../llm/interface.js";
import type { Schema, SqlDialect } from "./types.js";
import { describeSchema } from "./schema-description.js";
import { buildGenerationPrompt, buildRetryPrompt } from "./prompts.js";
import { cleanSqlText } from "../utils/sql-sanitizer.js";
import { isAcceptableSql } from "../utils/sql-validator.js";
import { getLogger } from "../utils/logger.js";

export interface GenerationContext {
  ollamaUrl: string;
  model: string;
  dialect: SqlDialect;
}

/**
 * Ask the model for a statement answering `question`. A rejected first answer
 * earns exactly one retry with a terser prompt; the retry's cleaned output is
 * returned as-is, and a bad statement then fails at execution.
 */
export async function generateQuery(
  client: CompletionClient,
  context: GenerationContext,
  question: string,
  schema: Schema,
): Promise<string> {
  const schemaDescription = describeSchema(schema);

  const firstPrompt = buildGenerationPrompt(context.dialect, schemaDescription, question);
  const firstAttempt = cleanSqlText(await client.generate(context.ollamaUrl, context.model, firstPrompt));

  if (isAcceptableSql(firstAttempt)) return firstAttempt;

  getLogger().warn("Generated invalid query, retrying", { query: firstAttempt });

  const retryPrompt = buildRetryPrompt(schemaDescription, question);
  return cleanSqlText(await client.generate(context.ollamaUrl, context.model, retryPrompt));
}
