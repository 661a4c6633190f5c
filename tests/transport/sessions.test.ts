import { describe, it, expect, vi } from "vitest";
import type { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SessionRegistry } from "../../src/transport/sessions.js";

function fakeSession() {
  const transport = { close: vi.fn(async () => {}) };
  const server = { close: vi.fn(async () => {}) };
  return {
    transport,
    server,
    asTransport: transport as unknown as StreamableHTTPServerTransport,
    asServer: server as unknown as McpServer,
  };
}

describe("SessionRegistry", () => {
  it("finds sessions by id and refreshes their last use", () => {
    let clock = 1_000;
    const registry = new SessionRegistry(60_000, () => clock);
    const s = fakeSession();
    registry.add("a", s.asTransport, s.asServer);

    clock = 5_000;
    expect(registry.touch("a")?.lastSeen).toBe(5_000);
    expect(registry.touch("missing")).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  it("closes only sessions idle past the timeout", async () => {
    let clock = 0;
    const registry = new SessionRegistry(1_000, () => clock);
    const idle = fakeSession();
    const active = fakeSession();
    registry.add("idle", idle.asTransport, idle.asServer);
    clock = 900;
    registry.add("active", active.asTransport, active.asServer);

    clock = 1_500;
    await expect(registry.expire()).resolves.toBe(1);

    expect(idle.transport.close).toHaveBeenCalledOnce();
    expect(idle.server.close).toHaveBeenCalledOnce();
    expect(active.transport.close).not.toHaveBeenCalled();
    expect(registry.size).toBe(1);
  });

  it("closes every session on shutdown even when one fails to close", async () => {
    const registry = new SessionRegistry(1_000);
    const broken = fakeSession();
    broken.transport.close.mockRejectedValueOnce(new Error("already closed"));
    const healthy = fakeSession();
    registry.add("broken", broken.asTransport, broken.asServer);
    registry.add("healthy", healthy.asTransport, healthy.asServer);

    await registry.closeAll();

    expect(healthy.transport.close).toHaveBeenCalledOnce();
    expect(registry.size).toBe(0);
  });

  it("forgets a session closed by the client", () => {
    const registry = new SessionRegistry(1_000);
    const s = fakeSession();
    registry.add("a", s.asTransport, s.asServer);
    registry.forget("a");
    expect(registry.touch("a")).toBeUndefined();
  });
});
