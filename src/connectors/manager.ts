import type { Row, Schema, SqlDialect, Table } from "../analysis/types.js";
import type { Defaults } from "../config/types.js";
import type { Connector, ConnectorType, DatabaseExecutor } from "./interface.js";
import { PostgresConnector } from "./postgresql.js";
import { ClickHouseConnector } from "./clickhouse.js";
import { MssqlConnector } from "./mssql.js";
import { InstrumentedConnector } from "./instrumented.js";
import { QueryExecutionError, UnsupportedDescriptorError, errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

const DIALECTS: Record<ConnectorType, SqlDialect> = {
  postgresql: "postgresql",
  clickhouse: "clickhouse",
  mssql: "sqlserver",
};

// ADO-style "Server=...;Database=..." strings
const ADO_SERVER_KEY = /(^|;)\s*(server|data source|address|addr)\s*=/i;

export type ConnectorFactory = (type: ConnectorType, connectionString: string, defaults: Defaults) => Connector;

export function detectConnectorType(connectionString: string): ConnectorType {
  const value = connectionString.trim();
  if (/^postgres(ql)?:\/\//i.test(value)) return "postgresql";
  if (/^(mssql|sqlserver):\/\//i.test(value)) return "mssql";
  if (/^(clickhouse|https?):\/\//i.test(value)) return "clickhouse";
  if (ADO_SERVER_KEY.test(value)) return "mssql";
  throw new UnsupportedDescriptorError();
}

export const createConnector: ConnectorFactory = (type, connectionString, defaults) => {
  switch (type) {
    case "postgresql":
      return new PostgresConnector(connectionString, defaults.queryTimeout);
    case "clickhouse":
      return new ClickHouseConnector(connectionString, defaults.queryTimeout);
    case "mssql":
      return new MssqlConnector(connectionString.replace(/^sqlserver:\/\//i, "mssql://"));
  }
};

/**
 * Database executor backed by short-lived connectors: every operation opens
 * its own connection and closes it before returning, whatever the outcome.
 */
export class ConnectorManager implements DatabaseExecutor {
  private defaults: Defaults;
  private factory: ConnectorFactory;

  constructor(defaults: Defaults, factory: ConnectorFactory = createConnector) {
    this.defaults = defaults;
    this.factory = factory;
  }

  updateDefaults(defaults: Defaults): void {
    this.defaults = defaults;
  }

  dialectFor(connectionString: string): SqlDialect {
    return DIALECTS[detectConnectorType(connectionString)];
  }

  async withConnector<T>(connectionString: string, fn: (connector: Connector) => Promise<T>): Promise<T> {
    const type = detectConnectorType(connectionString);
    const logger = getLogger().child({ database: type });
    const connector = new InstrumentedConnector(
      this.factory(type, connectionString, this.defaults),
      logger,
      this.defaults.slowQueryMs,
    );

    await connector.connect();
    try {
      return await fn(connector);
    } finally {
      await connector.disconnect().catch((err: unknown) => {
        logger.warn("Failed to close database connection", { error: errorMessage(err) });
      });
    }
  }

  async testConnection(connectionString: string): Promise<boolean> {
    try {
      return await this.withConnector(connectionString, async () => true);
    } catch (err) {
      getLogger().warn("Database connection test failed", { error: errorMessage(err) });
      return false;
    }
  }

  async fetchSchema(connectionString: string): Promise<Schema> {
    return this.withConnector(connectionString, async (connector) => {
      const tables: Table[] = [];
      for (const info of await connector.listTables()) {
        const columns = await connector.describeTable(info.name, info.schema);
        const name = info.schema === connector.defaultSchema ? info.name : `${info.schema}.${info.name}`;
        tables.push({ name, columns });
      }
      return { tables };
    });
  }

  async execute(connectionString: string, sql: string): Promise<Row[]> {
    try {
      return await this.withConnector(connectionString, async (connector) => {
        const result = await connector.query(sql);
        return result.rows;
      });
    } catch (err) {
      throw err instanceof QueryExecutionError || err instanceof UnsupportedDescriptorError
        ? err
        : new QueryExecutionError(err);
    }
  }
}
