import type { Column, Row, Schema, SqlDialect } from "../analysis/types.js";

export type ConnectorType = "postgresql" | "clickhouse" | "mssql";

export interface QueryResult {
  rows: Row[];
  rowCount: number;
}

export interface TableInfo {
  schema: string;
  name: string;
}

export interface Connector {
  readonly type: ConnectorType;
  /** Schema whose tables are reported unqualified (public, dbo, the current ClickHouse database). */
  readonly defaultSchema: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  query(sql: string): Promise<QueryResult>;

  /** Base tables only, ordered by schema then name. */
  listTables(): Promise<TableInfo[]>;
  describeTable(table: string, schema: string): Promise<Column[]>;
}

/** Database collaborator of the analyzer. Each call holds a connection only for its own duration. */
export interface DatabaseExecutor {
  testConnection(connectionString: string): Promise<boolean>;
  fetchSchema(connectionString: string): Promise<Schema>;
  execute(connectionString: string, sql: string): Promise<Row[]>;
  dialectFor(connectionString: string): SqlDialect;
}
