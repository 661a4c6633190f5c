import { describe, it, expect } from "vitest";
import { AppConfigSchema } from "../../src/config/types.js";

describe("AppConfigSchema", () => {
  it("parses empty config with defaults", () => {
    const result = AppConfigSchema.parse({});
    expect(result.transport.type).toBe("stdio");
    expect(result.defaults.logLevel).toBe("info");
    expect(result.defaults.queryTimeout).toBe(30000);
    expect(result.defaults.slowQueryMs).toBe(1000);
    expect(result.ollama.url).toBe("http://localhost:11434");
    expect(result.ollama.model).toBe("llama3");
    expect(result.ollama.requestTimeout).toBeUndefined();
    expect(result.analyzer.connectionString).toBeUndefined();
  });

  it("fills missing fields inside a partial defaults block", () => {
    const result = AppConfigSchema.parse({ defaults: { logLevel: "debug" } });
    expect(result.defaults.logLevel).toBe("debug");
    expect(result.defaults.queryTimeout).toBe(30000);
  });

  it("parses ollama settings", () => {
    const result = AppConfigSchema.parse({
      ollama: { url: "http://gpu-box:11434", model: "sqlcoder", requestTimeout: 120000 },
    });
    expect(result.ollama).toEqual({ url: "http://gpu-box:11434", model: "sqlcoder", requestTimeout: 120000 });
  });

  it("keeps the default model when only the url is given", () => {
    const result = AppConfigSchema.parse({ ollama: { url: "http://gpu-box:11434" } });
    expect(result.ollama.model).toBe("llama3");
  });

  it("rejects an ollama url that is not a URL", () => {
    expect(() => AppConfigSchema.parse({ ollama: { url: "not a url" } })).toThrow();
  });

  it("rejects an empty model name", () => {
    expect(() => AppConfigSchema.parse({ ollama: { model: "" } })).toThrow();
  });

  it("parses analyzer connection string", () => {
    const result = AppConfigSchema.parse({
      analyzer: { connectionString: "Server=localhost;Database=Sales;User Id=sa;Password=test-secret" },
    });
    expect(result.analyzer.connectionString).toBe("Server=localhost;Database=Sales;User Id=sa;Password=test-secret");
  });

  it("parses http transport", () => {
    const result = AppConfigSchema.parse({
      transport: { type: "http", port: 8080 },
    });
    expect(result.transport.type).toBe("http");
    if (result.transport.type === "http") {
      expect(result.transport.port).toBe(8080);
      expect(result.transport.host).toBe("127.0.0.1");
      expect(result.transport.sessionTimeout).toBe(30 * 60 * 1000);
    }
  });

  it("parses http transport with bearer auth", () => {
    const result = AppConfigSchema.parse({
      transport: { type: "http", auth: { type: "bearer", token: "test-token" } },
    });
    if (result.transport.type === "http") {
      expect(result.transport.auth?.token).toBe("test-token");
    }
  });

  it("rejects unknown transport type", () => {
    expect(() => AppConfigSchema.parse({ transport: { type: "websocket" } })).toThrow();
  });

  it("rejects unknown log level", () => {
    expect(() => AppConfigSchema.parse({ defaults: { logLevel: "trace" } })).toThrow();
  });
});
