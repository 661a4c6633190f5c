import sql from "mssql";
import type { Column } from "../analysis/types.js";
import type { Connector, QueryResult, TableInfo } from "./interface.js";
import { normalizeRow } from "./normalize.js";

// tedious hands BIGINT back as a string
const NUMERIC_COLUMN_TYPES: ReadonlySet<unknown> = new Set<unknown>([sql.BigInt, sql.Decimal, sql.Numeric]);

export class MssqlConnector implements Connector {
  readonly type = "mssql" as const;
  readonly defaultSchema = "dbo";
  private pool: sql.ConnectionPool | null = null;
  private connectionString: string;

  // Timeouts come from the connection string ("Request Timeout", "Connect Timeout")
  constructor(connectionString: string) {
    this.connectionString = connectionString;
  }

  async connect(): Promise<void> {
    // Accepts both ADO-style strings and mssql:// URIs
    const pool = new sql.ConnectionPool(this.connectionString);
    await pool.connect();
    this.pool = pool;
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.close();
      this.pool = null;
    }
  }

  private request(): sql.Request {
    if (!this.pool) throw new Error("Not connected");
    return this.pool.request();
  }

  async query(statement: string): Promise<QueryResult> {
    const result = await this.request().query<Record<string, unknown>>(statement);
    const recordset = result.recordset;
    if (!recordset) return { rows: [], rowCount: 0 };

    const numeric = new Set(
      Object.values(recordset.columns ?? {})
        .filter((c) => NUMERIC_COLUMN_TYPES.has(c.type))
        .map((c) => c.name),
    );
    const rows = recordset.map((r) => normalizeRow(r, numeric));
    return { rows, rowCount: rows.length };
  }

  async listTables(): Promise<TableInfo[]> {
    const result = await this.request().query<{ TABLE_SCHEMA: string; TABLE_NAME: string }>(`
      SELECT TABLE_SCHEMA, TABLE_NAME
      FROM INFORMATION_SCHEMA.TABLES
      WHERE TABLE_TYPE = 'BASE TABLE'
      ORDER BY TABLE_SCHEMA, TABLE_NAME`);
    return result.recordset.map((r) => ({ schema: r.TABLE_SCHEMA, name: r.TABLE_NAME }));
  }

  async describeTable(table: string, schema: string): Promise<Column[]> {
    const request = this.request();
    request.input("tableName", sql.NVarChar, table);
    request.input("schemaName", sql.NVarChar, schema);
    const result = await request.query<{
      COLUMN_NAME: string;
      DATA_TYPE: string;
      IS_NULLABLE: string;
      IsPrimaryKey: number;
    }>(`
      SELECT
        c.COLUMN_NAME,
        c.DATA_TYPE,
        c.IS_NULLABLE,
        CASE WHEN pk.COLUMN_NAME IS NOT NULL THEN 1 ELSE 0 END AS IsPrimaryKey
      FROM INFORMATION_SCHEMA.COLUMNS c
      LEFT JOIN (
        SELECT ku.TABLE_SCHEMA, ku.TABLE_NAME, ku.COLUMN_NAME
        FROM INFORMATION_SCHEMA.TABLE_CONSTRAINTS tc
        JOIN INFORMATION_SCHEMA.KEY_COLUMN_USAGE ku
          ON tc.CONSTRAINT_NAME = ku.CONSTRAINT_NAME
          AND tc.TABLE_SCHEMA = ku.TABLE_SCHEMA
        WHERE tc.CONSTRAINT_TYPE = 'PRIMARY KEY'
      ) pk ON c.TABLE_SCHEMA = pk.TABLE_SCHEMA
        AND c.TABLE_NAME = pk.TABLE_NAME
        AND c.COLUMN_NAME = pk.COLUMN_NAME
      WHERE c.TABLE_NAME = @tableName AND c.TABLE_SCHEMA = @schemaName
      ORDER BY c.ORDINAL_POSITION`);
    return result.recordset.map((r) => ({
      name: r.COLUMN_NAME,
      dataType: r.DATA_TYPE,
      isNullable: r.IS_NULLABLE === "YES",
      isPrimaryKey: r.IsPrimaryKey === 1,
    }));
  }
}
