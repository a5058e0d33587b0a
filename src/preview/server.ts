// ===========================================================================
//  src/preview/server.ts   (local stand-in for the edge rewrite rule)
// ===========================================================================

import express from "express";
import helmet from "helmet";
import compression from "compression";
import { createServer, type Server } from "node:http";
import path from "node:path";
import pinoHttp from "pino-http";

import type { LayoutReport } from "../core/edge-rules";
import type { RequestSimulator } from "../core/request-simulator";
import { serializeBucket } from "../storage/bucket-store";
import { previewLogger, logFailure, logElapsed } from "../utils/logger";

export interface EdgeResponse {
  status: number;
  /** Serialized bucket, or a JSON error object. */
  body: string;
  /** Bucket path the request was rewritten to. */
  rewrittenTo?: string;
}

/**
 * What the edge rule does with `GET /`: no `c` → random full-set bucket,
 * `c=<key>` → random bucket of that category.
 */
export async function handleEdgeRequest(
  simulator: RequestSimulator,
  query: Record<string, unknown>,
): Promise<EdgeResponse> {
  const c = query.c;
  if (c !== undefined && typeof c !== "string") {
    return { status: 400, body: JSON.stringify({ error: "Invalid category" }) };
  }

  const resolved = await simulator.resolve(c);
  if (!resolved) {
    return { status: 404, body: JSON.stringify({ error: `Unknown category: ${c}` }) };
  }
  if (resolved.item === undefined) {
    return {
      status: 404,
      body: JSON.stringify({ error: "Bucket missing" }),
      rewrittenTo: resolved.url,
    };
  }
  return { status: 200, body: serializeBucket(resolved.item), rewrittenTo: resolved.url };
}

export function createPreviewApp(report: LayoutReport, simulator: RequestSimulator): express.Express {
  const app = express();

  app.use(pinoHttp({
    logger: previewLogger,
    customLogLevel: (_req, res, err) => {
      if (res.statusCode >= 400 && res.statusCode < 500) return 'warn';
      if (res.statusCode >= 500 || err) return 'error';
      return 'debug';
    },
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app
    .use(helmet())
    .use(compression())
    .use(report.full.publicPath, express.static(path.resolve(report.full.outputDir)))
    .use(report.categories.publicPath, express.static(path.resolve(report.categories.outputDir)));

  app.get("/", async (req, res) => {
    try {
      const out = await handleEdgeRequest(simulator, req.query);
      if (out.rewrittenTo) res.set("X-Rewritten-To", out.rewrittenTo);
      res.status(out.status).type("application/json").send(out.body);
    } catch (error) {
      logFailure(previewLogger, error, { query: req.query });
      res.status(500).json({ error: "Failed to resolve bucket" });
    }
  });

  return app;
}

export function startPreviewServer(
  report: LayoutReport,
  simulator: RequestSimulator,
  port: number,
): Server {
  const startTime = Date.now();
  const http = createServer(createPreviewApp(report, simulator));

  http.listen(port, () => {
    logElapsed(previewLogger, 'preview-startup', startTime);
    previewLogger.info({
      port,
      full: report.full.publicPath,
      categories: report.categories.publicPath,
    }, `Preview listening on http://localhost:${port}/`);
  });

  process.on('SIGTERM', () => {
    previewLogger.info('SIGTERM received, shutting down');
    http.close(() => process.exit(0));
  });

  return http;
}
