import { randomUUID, timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import type { Request, Response, NextFunction } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import { createMcpServerInstance } from "../server.js";
import { AppContext } from "../context.js";
import type { AppConfig, HttpTransportConfig } from "../config/types.js";
import { createAnalyzerRouter } from "./rest.js";
import { SessionRegistry } from "./sessions.js";
import { getLogger } from "../utils/logger.js";

type App = ReturnType<typeof createMcpExpressApp>;

export interface HttpTransportHandle {
  httpServer: Server;
  context: AppContext;
  sessions: SessionRegistry;
  close(): Promise<void>;
}

function bearerAuth(token: string) {
  const expected = Buffer.from(`Bearer ${token}`);
  return (req: Request, res: Response, next: NextFunction) => {
    const presented = Buffer.from(req.headers.authorization ?? "");
    if (presented.length !== expected.length || !timingSafeEqual(presented, expected)) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  };
}

/**
 * Serve MCP on `/mcp` and the JSON analyzer routes on `/api/analyzer`.
 * Both share one AppContext, so a config reload reaches them together.
 */
export async function startHttpTransport(
  config: AppConfig,
  transportConfig: HttpTransportConfig,
): Promise<HttpTransportHandle> {
  const logger = getLogger();
  const context = new AppContext(config);
  const sessions = new SessionRegistry(transportConfig.sessionTimeout);
  const { host, port, stateless } = transportConfig;

  const app = createMcpExpressApp({ host });
  if (transportConfig.auth) {
    const auth = bearerAuth(transportConfig.auth.token);
    app.use(["/mcp", "/api"], auth);
  }

  if (stateless) {
    mountStatelessMcp(app, context);
  } else {
    mountSessionMcp(app, context, sessions);
    sessions.startSweeping();
  }

  app.use("/api/analyzer", createAnalyzerRouter(context));
  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", model: context.getConfig().ollama.model, activeSessions: sessions.size });
  });

  const httpServer = await new Promise<Server>((resolve) => {
    const server = app.listen(port, host, () => resolve(server));
  });
  logger.info("HTTP transport listening", {
    mcp: `http://${host}:${port}/mcp`,
    rest: `http://${host}:${port}/api/analyzer`,
    mode: stateless ? "stateless" : "session",
  });

  return {
    httpServer,
    context,
    sessions,
    close: async () => {
      await new Promise<void>((resolve, reject) => httpServer.close((err) => (err ? reject(err) : resolve())));
      await sessions.closeAll();
    },
  };
}

function mountStatelessMcp(app: App, context: AppContext) {
  app.all("/mcp", async (req: Request, res: Response) => {
    const server = createMcpServerInstance(context);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    await server.connect(transport);
    try {
      await transport.handleRequest(req, res, req.body);
    } finally {
      await transport.close();
      await server.close();
    }
  });
}

function mountSessionMcp(app: App, context: AppContext, sessions: SessionRegistry) {
  app.all("/mcp", async (req: Request, res: Response) => {
    const header = req.headers["mcp-session-id"];
    if (typeof header === "string") {
      const session = sessions.touch(header);
      if (!session) {
        res.status(404).json({ error: "Session not found" });
        return;
      }
      await session.transport.handleRequest(req, res, req.body);
      return;
    }

    const server = createMcpServerInstance(context);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => sessions.add(id, transport, server),
    });
    transport.onclose = () => {
      if (transport.sessionId) sessions.forget(transport.sessionId);
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  });
}
