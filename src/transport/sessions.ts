import type { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export interface McpSession {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  lastSeen: number;
}

/** Live MCP sessions of the HTTP transport, keyed by `mcp-session-id`. */
export class SessionRegistry {
  private sessions = new Map<string, McpSession>();
  private sweeper: ReturnType<typeof setInterval> | undefined;

  constructor(
    private idleTimeout: number,
    private now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  add(id: string, transport: StreamableHTTPServerTransport, server: McpServer): void {
    this.sessions.set(id, { transport, server, lastSeen: this.now() });
  }

  /** Session for `id`, marked as used now. */
  touch(id: string): McpSession | undefined {
    const session = this.sessions.get(id);
    if (session) session.lastSeen = this.now();
    return session;
  }

  forget(id: string): void {
    this.sessions.delete(id);
  }

  /** Close sessions idle for longer than the timeout. Returns how many were closed. */
  async expire(): Promise<number> {
    const cutoff = this.now() - this.idleTimeout;
    const stale = [...this.sessions].filter(([, session]) => session.lastSeen < cutoff);
    for (const [id, session] of stale) {
      getLogger().info("Closing idle MCP session", { sessionId: id });
      this.sessions.delete(id);
      await closeSession(session);
    }
    return stale.length;
  }

  startSweeping(intervalMs = 60_000): void {
    this.sweeper = setInterval(() => {
      this.expire().catch((err: unknown) => getLogger().warn("Session sweep failed", { error: errorMessage(err) }));
    }, intervalMs);
    this.sweeper.unref();
  }

  async closeAll(): Promise<void> {
    if (this.sweeper) clearInterval(this.sweeper);
    const open = [...this.sessions.values()];
    this.sessions.clear();
    for (const session of open) {
      await closeSession(session);
    }
  }
}

async function closeSession(session: McpSession): Promise<void> {
  try {
    await session.transport.close();
    await session.server.close();
  } catch (err) {
    getLogger().warn("Failed to close MCP session", { error: errorMessage(err) });
  }
}
