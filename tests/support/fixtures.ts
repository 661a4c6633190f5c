import { vi } from "vitest";
import type { Row, Schema, SqlDialect } from "../../src/analysis/types.js";
import type { DatabaseExecutor } from "../../src/connectors/interface.js";
import type { CompletionClient } from "../../src/llm/interface.js";

export const ordersSchema: Schema = {
  tables: [
    {
      name: "Orders",
      columns: [
        { name: "OrderId", dataType: "int", isNullable: false, isPrimaryKey: true },
        { name: "Total", dataType: "decimal", isNullable: true, isPrimaryKey: false },
        { name: "CreatedAt", dataType: "datetime", isNullable: false, isPrimaryKey: false },
      ],
    },
  ],
};

export interface StubExecutorOptions {
  connected?: boolean;
  schema?: Schema;
  rows?: Row[];
  dialect?: SqlDialect;
}

export function createStubExecutor(options: StubExecutorOptions = {}) {
  return {
    testConnection: vi.fn(async (_connectionString: string) => options.connected ?? true),
    fetchSchema: vi.fn(async (_connectionString: string) => options.schema ?? ordersSchema),
    execute: vi.fn(async (_connectionString: string, _sql: string) => options.rows ?? []),
    dialectFor: vi.fn((_connectionString: string) => options.dialect ?? "sqlserver"),
  } satisfies DatabaseExecutor;
}

/** Answers each call with the next reply in order. */
export function createScriptedCompletions(...replies: string[]) {
  let call = 0;
  return {
    generate: vi.fn(async (_endpoint: string, _model: string, _prompt: string) => {
      const reply = replies[call];
      call++;
      if (reply === undefined) throw new Error(`Unexpected completion call #${call}`);
      return reply;
    }),
  } satisfies CompletionClient;
}
