import { createClient, type ClickHouseClient } from "@clickhouse/client";
import type { Column } from "../analysis/types.js";
import type { Connector, QueryResult, TableInfo } from "./interface.js";
import { normalizeRow } from "./normalize.js";

// Int64 and wider arrive as quoted strings in JSON output
const WIDE_NUMERIC_TYPE = /^(?:LowCardinality\()?(?:Nullable\()?(?:U?Int(?:64|128|256)\b|Decimal)/;

/** Names of the columns whose values must go through numeric conversion. */
export function wideNumericColumns(meta: { name: string; type: string }[]): Set<string> {
  return new Set(meta.filter((m) => WIDE_NUMERIC_TYPE.test(m.type)).map((m) => m.name));
}

interface ClickHouseTarget {
  url: string;
  database: string;
  username: string;
  password: string;
}

/** Split a ClickHouse URL into the client's options; `clickhouse://` maps to the plain HTTP interface. */
export function parseClickHouseUrl(connectionString: string): ClickHouseTarget {
  const parsed = new URL(connectionString);
  const protocol = parsed.protocol === "clickhouse:" ? "http:" : parsed.protocol;
  const port = parsed.port || "8123";
  const database = decodeURIComponent(parsed.pathname.replace(/^\//, "")) || "default";
  return {
    url: `${protocol}//${parsed.hostname}:${port}`,
    database,
    username: decodeURIComponent(parsed.username) || "default",
    password: decodeURIComponent(parsed.password),
  };
}

export class ClickHouseConnector implements Connector {
  readonly type = "clickhouse" as const;
  readonly defaultSchema: string;
  private client: ClickHouseClient | null = null;
  private target: ClickHouseTarget;
  private queryTimeout: number;

  constructor(connectionString: string, queryTimeout: number) {
    this.target = parseClickHouseUrl(connectionString);
    this.defaultSchema = this.target.database;
    this.queryTimeout = queryTimeout;
  }

  async connect(): Promise<void> {
    const client = createClient({
      url: this.target.url,
      database: this.target.database,
      username: this.target.username,
      password: this.target.password,
      request_timeout: this.queryTimeout,
    });
    const ping = await client.ping();
    if (!ping.success) {
      await client.close();
      throw ping.error;
    }
    this.client = client;
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
    }
  }

  private getClient(): ClickHouseClient {
    if (!this.client) throw new Error("Not connected");
    return this.client;
  }

  async query(sql: string): Promise<QueryResult> {
    const result = await this.getClient().query({ query: sql, format: "JSON" });
    const body = await result.json<Record<string, unknown>>();
    const numeric = wideNumericColumns(body.meta ?? []);
    const rows = body.data.map((r) => normalizeRow(r, numeric));
    return { rows, rowCount: rows.length };
  }

  async listTables(): Promise<TableInfo[]> {
    const result = await this.getClient().query({
      query: `SELECT name, engine FROM system.tables
              WHERE database = currentDatabase() AND is_temporary = 0
              ORDER BY name`,
      format: "JSONEachRow",
    });
    const rows = await result.json<{ name: string; engine: string }>();
    return rows
      .filter((r) => !r.engine.includes("View"))
      .map((r) => ({ schema: this.target.database, name: r.name }));
  }

  async describeTable(table: string, _schema: string): Promise<Column[]> {
    const result = await this.getClient().query({
      query: `SELECT name, type, is_in_primary_key
              FROM system.columns
              WHERE database = currentDatabase() AND table = {table:String}
              ORDER BY position`,
      format: "JSONEachRow",
      query_params: { table },
    });
    const rows = await result.json<{ name: string; type: string; is_in_primary_key: number }>();
    return rows.map((r) => ({
      name: r.name,
      dataType: r.type,
      isNullable: r.type.startsWith("Nullable"),
      isPrimaryKey: r.is_in_primary_key === 1,
    }));
  }
}
