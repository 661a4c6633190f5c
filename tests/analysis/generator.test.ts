import { describe, it, expect } from "vitest";
import { generateQuery } from "../../src/analysis/generator.js";
import { createScriptedCompletions, ordersSchema } from "../support/fixtures.js";

const context = { ollamaUrl: "http://localhost:11434", model: "llama3", dialect: "sqlserver" as const };

describe("generateQuery", () => {
  it("returns an acceptable first answer without retrying", async () => {
    const completions = createScriptedCompletions("```sql\nSELECT TOP 5 * FROM Orders ORDER BY Total DESC\n```");
    const sql = await generateQuery(completions, context, "Five biggest orders", ordersSchema);
    expect(sql).toBe("SELECT TOP 5 * FROM Orders ORDER BY Total DESC");
    expect(completions.generate).toHaveBeenCalledOnce();
  });

  it("builds the first prompt from dialect, schema and question", async () => {
    const completions = createScriptedCompletions("SELECT * FROM Orders");
    await generateQuery(completions, { ...context, dialect: "postgresql" }, "All orders", ordersSchema);
    const prompt = completions.generate.mock.calls[0][2];
    expect(prompt.startsWith("You are an expert PostgreSQL database assistant.")).toBe(true);
    expect(prompt).toContain("  - OrderId (int, NOT NULL) [PRIMARY KEY]");
    expect(prompt).toContain("USER QUESTION: All orders");
    expect(prompt).toContain("4. Use PostgreSQL syntax (LIMIT instead of TOP");
  });

  it("retries once with the stricter prompt when the first answer is rejected", async () => {
    const completions = createScriptedCompletions(
      "```sql\nSELECT COUNT(*) -- this will count orders\n```",
      "SELECT COUNT(*) AS N FROM Orders",
    );
    const sql = await generateQuery(completions, context, "How many orders?", ordersSchema);

    expect(sql).toBe("SELECT COUNT(*) AS N FROM Orders");
    expect(completions.generate).toHaveBeenCalledTimes(2);
    const retryPrompt = completions.generate.mock.calls[1][2];
    expect(retryPrompt.startsWith("GENERATE ONLY A VALID SQL QUERY. NO EXPLANATIONS.")).toBe(true);
    expect(retryPrompt).toContain("Question: How many orders?");
    expect(retryPrompt).toContain("Start your response with SELECT:");
  });

  it("uses the cleaned retry answer even when it is still unacceptable", async () => {
    const completions = createScriptedCompletions("I would need more details.", "```\nSorry, I cannot help.\n```");
    const sql = await generateQuery(completions, context, "Who?", ordersSchema);
    expect(sql).toBe("Sorry, I cannot help.");
    expect(completions.generate).toHaveBeenCalledTimes(2);
  });

  it("sends both attempts to the requested endpoint and model", async () => {
    const completions = createScriptedCompletions("nope", "SELECT 1 FROM Orders");
    await generateQuery(completions, { ...context, ollamaUrl: "http://gpu:11434", model: "sqlcoder" }, "q", ordersSchema);
    for (const call of completions.generate.mock.calls) {
      expect(call[0]).toBe("http://gpu:11434");
      expect(call[1]).toBe("sqlcoder");
    }
  });
});
