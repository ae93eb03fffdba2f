/**
 * HTTP surface: the SSE stream, its correlated message endpoint and a health probe
 */
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { errorMeta } from "../utils/errors.js";
import { logError, logInfo, logWarn } from "../utils/logging.js";
import { CONFIG } from "./config.js";
import type { SessionRegistry } from "./modules/SessionRegistry.js";
import { SseSessionTransport } from "./modules/SseSessionTransport.js";

export interface HttpAppOptions {
  registry: SessionRegistry<SseSessionTransport>;
  /** Called once per SSE session; each session gets its own protocol server. */
  createServer: () => Server;
  keepAliveMs: number;
  maxBodySize: string;
}

function httpStatusOf(error: unknown): number {
  if (error && typeof error === "object" && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}

function messageEndpoint(sessionId: string): string {
  return `${CONFIG.PATHS.messages}?session_id=${encodeURIComponent(sessionId)}`;
}

export function createHttpApp(options: HttpAppOptions): Express {
  const { registry, createServer, keepAliveMs, maxBodySize } = options;
  const app = express();

  app.get(CONFIG.PATHS.sse, async (_req: Request, res: Response) => {
    const session = registry.create(
      (id) => new SseSessionTransport(messageEndpoint(id), res, { sessionId: id, keepAliveMs }),
    );
    const transport = session.handle;

    try {
      // connect() starts the transport, which writes the SSE headers and the endpoint event
      await createServer().connect(transport);
      await transport.closed;
    } catch (error) {
      logError(`SSE session ${session.id} failed`, errorMeta(error));
      await transport.close();
    } finally {
      registry.remove(session.id);
    }
  });

  app.post(
    CONFIG.PATHS.messages,
    express.json({ limit: maxBodySize }),
    (req: Request, res: Response) => {
      const sessionId = req.query["session_id"];
      if (typeof sessionId !== "string" || sessionId.length === 0) {
        res.status(400).json({ error: "Missing session_id" });
        return;
      }

      const transport = registry.get(sessionId);
      if (!transport) {
        logWarn(`Message for unknown session ${sessionId}`);
        res.status(404).json({ error: "Session not found or expired" });
        return;
      }

      const outcome = transport.handlePostMessage(req.body);
      switch (outcome.status) {
        case "accepted":
          res.json({ status: "ok" });
          return;
        case "closed":
          res.status(404).json({ error: "Session not found or expired" });
          return;
        case "invalid":
          res.status(400).json({ error: `Invalid message: ${outcome.reason}` });
          return;
      }
    },
  );

  app.get(CONFIG.PATHS.health, (_req: Request, res: Response) => {
    res.json({ status: "ok", active_sessions: registry.size });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err);

    if (res.headersSent) {
      logError(`Error after response started on ${req.method} ${req.path}`, errorMeta(err));
      if (!res.writableEnded) {
        res.end();
      }
      return;
    }

    if (status === 413) {
      res.status(413).json({ error: "Request body too large", max_size: maxBodySize });
      return;
    }
    if (status >= 400 && status < 500) {
      logInfo(`Rejected ${req.method} ${req.path} (${status})`);
      res.status(status).json({ error: "Malformed request body" });
      return;
    }

    logError(`Unhandled error on ${req.method} ${req.path}`, errorMeta(err));
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
