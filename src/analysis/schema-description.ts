import type { Schema } from "./types.js";

/**
 * Render a schema as prompt text. The output is embedded verbatim in model
 * prompts, so the format must stay byte-stable for a given schema.
 */
export function describeSchema(schema: Schema): string {
  const lines: string[] = [];

  for (const table of schema.tables) {
    lines.push(`\nTable: ${table.name}`);
    lines.push("Columns:");

    for (const column of table.columns) {
      const pk = column.isPrimaryKey ? " [PRIMARY KEY]" : "";
      const nullable = column.isNullable ? "NULL" : "NOT NULL";
      lines.push(`  - ${column.name} (${column.dataType}, ${nullable})${pk}`);
    }
  }

  return lines.map((line) => line + "\n").join("");
}
