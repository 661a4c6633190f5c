import type { Column } from "../analysis/types.js";
import type { Connector, ConnectorType, QueryResult, TableInfo } from "./interface.js";
import type { Logger } from "../utils/logger.js";

/** Times every statement: debug-logs each one, warns about the ones over the slow threshold. */
export class InstrumentedConnector implements Connector {
  readonly type: ConnectorType;
  readonly defaultSchema: string;

  constructor(
    private inner: Connector,
    private logger: Logger,
    private slowQueryMs: number,
  ) {
    this.type = inner.type;
    this.defaultSchema = inner.defaultSchema;
  }

  connect(): Promise<void> {
    return this.timed("connect", () => this.inner.connect());
  }

  disconnect(): Promise<void> {
    return this.inner.disconnect();
  }

  query(sql: string): Promise<QueryResult> {
    return this.timed(sql, () => this.inner.query(sql));
  }

  listTables(): Promise<TableInfo[]> {
    return this.timed("listTables", () => this.inner.listTables());
  }

  describeTable(table: string, schema: string): Promise<Column[]> {
    return this.timed(`describeTable ${schema}.${table}`, () => this.inner.describeTable(table, schema));
  }

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      const durationMs = Math.round(performance.now() - start);
      if (durationMs >= this.slowQueryMs) {
        this.logger.warn("Slow database operation", { operation, durationMs, database: this.type });
      } else {
        this.logger.debug("Database operation", { operation, durationMs, database: this.type });
      }
    }
  }
}
