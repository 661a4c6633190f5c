import { describe, it, expect } from "vitest";
import { AppContext } from "../src/context.js";
import { AppConfigSchema } from "../src/config/types.js";
import { createScriptedCompletions, createStubExecutor, ordersSchema } from "./support/fixtures.js";

const config = AppConfigSchema.parse({
  ollama: { url: "http://gpu:11434", model: "sqlcoder" },
  analyzer: { connectionString: "postgres://config/shop" },
});

describe("AppContext", () => {
  it("runs an analysis with the configured connection string, endpoint and model", async () => {
    const executor = createStubExecutor({ rows: [{ n: 3 }] });
    const completions = createScriptedCompletions("SELECT COUNT(*) AS n FROM Orders", "Three orders.");
    const context = new AppContext(config, { executor, completions });

    const outcome = await context.analyze({ prompt: "How many orders?" });

    expect(outcome.ok && outcome.value.analysis).toBe("Three orders.");
    expect(executor.testConnection).toHaveBeenCalledWith("postgres://config/shop");
    expect(completions.generate.mock.calls[0][0]).toBe("http://gpu:11434");
    expect(completions.generate.mock.calls[0][1]).toBe("sqlcoder");
  });

  it("rejects an analysis without a prompt", async () => {
    const context = new AppContext(config, { executor: createStubExecutor(), completions: createScriptedCompletions() });
    await expect(context.analyze({})).resolves.toEqual({ ok: false, error: "Prompt is required" });
  });

  it("needs a connection string for schema and connectivity checks", async () => {
    const context = new AppContext(AppConfigSchema.parse({}), {
      executor: createStubExecutor(),
      completions: createScriptedCompletions(),
    });
    await expect(context.testConnection()).resolves.toEqual({ ok: false, error: "Connection string is required" });
    await expect(context.getSchema(" ")).resolves.toEqual({ ok: false, error: "Connection string is required" });
  });

  it("returns the schema of the requested database", async () => {
    const executor = createStubExecutor();
    const context = new AppContext(config, { executor, completions: createScriptedCompletions() });

    await expect(context.getSchema("postgres://other/db")).resolves.toEqual({ ok: true, value: ordersSchema });
    expect(executor.fetchSchema).toHaveBeenCalledWith("postgres://other/db");
  });

  it("uses reloaded settings for later requests", async () => {
    const executor = createStubExecutor();
    const context = new AppContext(config, { executor, completions: createScriptedCompletions() });
    const next = AppConfigSchema.parse({ analyzer: { connectionString: "postgres://reloaded/shop" } });

    context.reload(next);
    await context.testConnection();

    expect(context.getConfig()).toBe(next);
    expect(executor.testConnection).toHaveBeenCalledWith("postgres://reloaded/shop");
  });
});
