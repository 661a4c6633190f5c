import type { CompletionClient } from "../llm/interface.js";
import type { Row, RowValue } from "./types.js";
import { buildSummaryPrompt } from "./prompts.js";

const SAMPLE_SIZE = 5;

export interface ColumnStats {
  column: string;
  min: number;
  max: number;
  avg: number;
}

const statFormat = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatStat(value: number): string {
  return statFormat.format(value);
}

function asNumber(value: RowValue): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/**
 * Min/max/avg for numeric columns. A column counts as numeric when its first
 * non-null value is a number; later values that do not convert are skipped.
 */
export function computeColumnStats(rows: Row[]): ColumnStats[] {
  if (rows.length === 0) return [];

  const stats: ColumnStats[] = [];
  for (const column of Object.keys(rows[0])) {
    const present = rows.map((r) => r[column]).filter((v) => v !== null && v !== undefined);
    if (present.length === 0 || typeof present[0] !== "number") continue;

    const numbers = present.map(asNumber).filter((n): n is number => n !== undefined);
    let min = numbers[0];
    let max = numbers[0];
    let sum = 0;
    for (const n of numbers) {
      if (n < min) min = n;
      if (n > max) max = n;
      sum += n;
    }
    stats.push({ column, min, max, avg: sum / numbers.length });
  }
  return stats;
}

export function formatStatistics(rowCount: number, stats: ColumnStats[]): string {
  const lines = [`Total Rows: ${rowCount}`];
  for (const s of stats) {
    lines.push(`- ${s.column}: Min=${formatStat(s.min)}, Max=${formatStat(s.max)}, Avg=${formatStat(s.avg)}`);
  }
  return lines.join("\n");
}

export interface SummaryContext {
  ollamaUrl: string;
  model: string;
}

export async function summarizeResults(
  client: CompletionClient,
  context: SummaryContext,
  question: string,
  sql: string,
  rows: Row[],
): Promise<string> {
  const prompt = buildSummaryPrompt({
    question,
    sql,
    rowCount: rows.length,
    statistics: formatStatistics(rows.length, computeColumnStats(rows)),
    sample: JSON.stringify(rows.slice(0, SAMPLE_SIZE), null, 2),
  });

  const analysis = await client.generate(context.ollamaUrl, context.model, prompt);
  return analysis.trim();
}
