export const STATEMENT_KEYWORDS = ["SELECT", "INSERT", "UPDATE", "DELETE", "WITH"] as const;

const OPENING_FENCE = /```sql\s*/gi;
const BARE_FENCE = /```\s*/g;
const ANY_KEYWORD = new RegExp(`\\b(${STATEMENT_KEYWORDS.join("|")})\\b`, "gi");
// "WITH name AS (" or "WITH RECURSIVE name(cols) AS ("; a bare "with" is prose
const CTE_HEAD = /^WITH\s+(?:RECURSIVE\s+)?[\w"`[\].]+\s*(?:\([^)]*\)\s*)?AS\s*\(/i;

function stripCodeFences(text: string): string {
  return text.replace(OPENING_FENCE, "").replace(BARE_FENCE, "");
}

function statementStart(text: string): number | undefined {
  for (const match of text.matchAll(ANY_KEYWORD)) {
    const index = match.index ?? 0;
    if (match[1].toUpperCase() === "WITH" && !CTE_HEAD.test(text.slice(index))) continue;
    return index;
  }
  return undefined;
}

/**
 * Isolate the SQL statement in a raw model completion: drops markdown fences
 * and any conversational preamble before the first statement keyword.
 * Text without a statement keyword comes back trimmed but otherwise as-is.
 */
export function cleanSqlText(raw: string): string {
  const text = stripCodeFences(raw).trim();
  const start = statementStart(text);
  return start === undefined ? text : text.slice(start);
}
