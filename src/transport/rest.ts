import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context.js";
import { AnalyzeInputSchema } from "../analysis/request.js";
import { errorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

const ConnectionBodySchema = z.object({
  connectionString: z.string().optional(),
});

export function analyzeRoute(context: AppContext) {
  return async (req: Request, res: Response) => {
    const body = AnalyzeInputSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ success: false, error: "Invalid request body" });
      return;
    }

    const outcome = await context.analyze(body.data);
    if (!outcome.ok) {
      res.status(400).json({ success: false, error: outcome.error });
      return;
    }
    res.status(outcome.value.success ? 200 : 400).json(outcome.value);
  };
}

export function testConnectionRoute(context: AppContext) {
  return async (req: Request, res: Response) => {
    const body = ConnectionBodySchema.safeParse(req.body ?? {});
    const outcome = await context.testConnection(body.success ? body.data.connectionString : undefined);
    if (!outcome.ok) {
      res.status(400).json({ success: false, message: outcome.error });
      return;
    }
    res.json({
      success: outcome.value,
      message: outcome.value ? "Connection successful" : "Connection failed",
    });
  };
}

export function getSchemaRoute(context: AppContext) {
  return async (req: Request, res: Response) => {
    const body = ConnectionBodySchema.safeParse(req.body ?? {});
    try {
      const outcome = await context.getSchema(body.success ? body.data.connectionString : undefined);
      if (!outcome.ok) {
        res.status(400).json({ error: outcome.error });
        return;
      }
      res.json(outcome.value);
    } catch (err) {
      getLogger().error("Error getting schema", { error: errorMessage(err) });
      res.status(400).json({ error: errorMessage(err) });
    }
  };
}

/** Plain JSON routes for callers that do not speak MCP. */
export function createAnalyzerRouter(context: AppContext): Router {
  const router = Router();
  router.post("/analyze", analyzeRoute(context));
  router.post("/test-connection", testConnectionRoute(context));
  router.post("/get-schema", getSchemaRoute(context));
  return router;
}
