export interface Column {
  name: string;
  dataType: string;
  isNullable: boolean;
  isPrimaryKey: boolean;
}

export interface Table {
  name: string;
  columns: Column[];
}

export interface Schema {
  tables: Table[];
}

/** Scalar cell value after driver normalization. Nested structures are flattened to text. */
export type RowValue = string | number | boolean | Date | null;

export type Row = Record<string, RowValue>;

export type SqlDialect = "sqlserver" | "postgresql" | "clickhouse";

export interface AnalysisRequest {
  connectionString: string;
  prompt: string;
  ollamaUrl: string;
  model: string;
}

export interface AnalysisResult {
  success: boolean;
  generatedQuery?: string;
  data?: Row[];
  analysis?: string;
  error?: string;
  schema?: Schema;
}

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_MODEL = "llama3";
