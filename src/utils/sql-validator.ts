import { STATEMENT_KEYWORDS } from "./sql-sanitizer.js";

// Phrases a model uses when it answers in prose instead of SQL
const PROSE_MARKERS = ["here is", "this query", "explanation", "note that", "this will"];

/**
 * Heuristic gate for a cleaned completion. Text matching is case-insensitive;
 * the caller keeps the original casing for execution.
 */
export function isAcceptableSql(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) return false;

  const upper = trimmed.toUpperCase();

  if (!STATEMENT_KEYWORDS.some((keyword) => upper.startsWith(keyword))) return false;

  if (upper.startsWith("SELECT") && !upper.includes("FROM")) return false;

  if (PROSE_MARKERS.some((marker) => upper.includes(marker.toUpperCase()))) return false;

  return true;
}
