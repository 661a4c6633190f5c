import pg from "pg";
import type { Column } from "../analysis/types.js";
import type { Connector, QueryResult, TableInfo } from "./interface.js";
import { normalizeRow } from "./normalize.js";

// int8, numeric: node-postgres hands these back as strings
const NUMERIC_TYPE_IDS = new Set([20, 1700]);

export class PostgresConnector implements Connector {
  readonly type = "postgresql" as const;
  readonly defaultSchema = "public";
  private client: pg.Client | null = null;
  private connectionString: string;
  private queryTimeout: number;

  constructor(connectionString: string, queryTimeout: number) {
    this.connectionString = connectionString;
    this.queryTimeout = queryTimeout;
  }

  async connect(): Promise<void> {
    const client = new pg.Client({
      connectionString: this.connectionString,
      query_timeout: this.queryTimeout,
      connectionTimeoutMillis: this.queryTimeout,
    });
    await client.connect();
    this.client = client;
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.end();
      this.client = null;
    }
  }

  private getClient(): pg.Client {
    if (!this.client) throw new Error("Not connected");
    return this.client;
  }

  async query(sql: string): Promise<QueryResult> {
    const result = await this.getClient().query<Record<string, unknown>>(sql);
    const numeric = new Set(
      (result.fields ?? []).filter((f) => NUMERIC_TYPE_IDS.has(f.dataTypeID)).map((f) => f.name),
    );
    const rows = (result.rows ?? []).map((r) => normalizeRow(r, numeric));
    return { rows, rowCount: rows.length };
  }

  async listTables(): Promise<TableInfo[]> {
    const result = await this.getClient().query<{ table_schema: string; table_name: string }>(
      `SELECT table_schema, table_name
       FROM information_schema.tables
       WHERE table_type = 'BASE TABLE'
         AND table_schema NOT IN ('pg_catalog', 'information_schema')
       ORDER BY table_schema, table_name`,
    );
    return result.rows.map((r) => ({ schema: r.table_schema, name: r.table_name }));
  }

  async describeTable(table: string, schema: string): Promise<Column[]> {
    const result = await this.getClient().query<{
      column_name: string;
      data_type: string;
      is_nullable: string;
      is_primary_key: boolean;
    }>(
      `SELECT
         c.column_name,
         c.data_type,
         c.is_nullable,
         CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END as is_primary_key
       FROM information_schema.columns c
       LEFT JOIN (
         SELECT ku.column_name
         FROM information_schema.table_constraints tc
         JOIN information_schema.key_column_usage ku
           ON tc.constraint_name = ku.constraint_name
           AND tc.table_schema = ku.table_schema
         WHERE tc.constraint_type = 'PRIMARY KEY'
           AND tc.table_name = $1
           AND tc.table_schema = $2
       ) pk ON c.column_name = pk.column_name
       WHERE c.table_name = $1 AND c.table_schema = $2
       ORDER BY c.ordinal_position`,
      [table, schema],
    );
    return result.rows.map((r) => ({
      name: r.column_name,
      dataType: r.data_type,
      isNullable: r.is_nullable === "YES",
      isPrimaryKey: r.is_primary_key,
    }));
  }
}
