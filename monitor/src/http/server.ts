import { Logger } from "@marketwatch/shared-utils";
import cors from "cors";
import express, { NextFunction, Request, Response } from "express";
import helmet from "helmet";
import { Server } from "http";
import path from "path";
import { z } from "zod";
import { SearchCycleReport } from "../core/dto";
import { GateStatus } from "../core/gate";
import { PersistencePort } from "../core/ports";
import { SchedulerState, SchedulerStatus } from "../core/scheduler";
import { SseHub } from "./sse";

export interface OperatorScheduler {
  getState(): SchedulerState;
  getStatus(): SchedulerStatus;
  triggerNow(): boolean;
  getLastSearchReport(savedSearchId: string): SearchCycleReport | undefined;
}

export interface ServerDeps {
  scheduler: OperatorScheduler;
  persistence: PersistencePort;
  gates: () => GateStatus[];
  sse: SseHub;
  logger: Logger;
  corsOrigins?: string[];
}

const STATIC_DIR = path.join(__dirname, "static");

export const schemas = {
  feedQuery: z.object({
    unread: z
      .enum(["true", "false"])
      .optional()
      .transform((value) => value === "true"),
    limit: z.coerce.number().int().min(1).max(500).default(50),
    savedSearchId: z.string().min(1).optional(),
  }),
  idParam: z.object({ id: z.string().min(1) }),
};

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = Date.now();
    res.on("finish", () => {
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`;
      if (res.statusCode >= 400) {
        logger.warn(line);
      } else {
        logger.debug(line);
      }
    });
    next();
  };
}

function parseOr400<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  res: Response
): T | undefined {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  res.status(400).json({
    error: "Validation error",
    errors: result.error.errors.map((e) => ({
      path: e.path.join("."),
      message: e.message,
    })),
  });
  return undefined;
}

/**
 * Operator surface: health, status, manual trigger, last per-search
 * report, listing feed and the desktop notification stream.
 */
export function createApp(deps: ServerDeps): express.Express {
  const { scheduler, persistence, sse } = deps;
  const logger = deps.logger.child("http");
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'"],
          imgSrc: ["'self'", "data:", "https:"],
        },
      },
    })
  );
  const origins = deps.corsOrigins ?? [];
  if (origins.length > 0) {
    app.use(cors({ origin: origins, methods: ["GET", "POST"] }));
  }
  app.use(requestLogger(logger));

  app.get("/healthz", (_req, res) => {
    const state = scheduler.getState();
    res.status(state === "stopped" ? 503 : 200).json({ ok: state !== "stopped", state });
  });

  app.get("/status", (_req, res) => {
    res.json({
      scheduler: scheduler.getStatus(),
      gates: deps.gates(),
      sseClients: sse.clientCount(),
    });
  });

  app.post("/cycles", (_req, res) => {
    if (scheduler.triggerNow()) {
      res.status(202).json({ accepted: true });
      return;
    }
    res.status(409).json({
      accepted: false,
      error: `Cycle not started: scheduler is ${scheduler.getState()}`,
    });
  });

  app.get("/searches/:id/last-cycle", (req, res) => {
    const params = parseOr400(schemas.idParam, req.params, res);
    if (!params) return;

    const report = scheduler.getLastSearchReport(params.id);
    if (!report) {
      res.status(404).json({ error: `No cycle recorded for saved search ${params.id}` });
      return;
    }
    res.json(report);
  });

  app.get(
    "/feed",
    asyncRoute(async (req, res) => {
      const query = parseOr400(schemas.feedQuery, req.query, res);
      if (!query) return;

      const entries = await persistence.listFeed({
        unreadOnly: query.unread,
        limit: query.limit,
        savedSearchId: query.savedSearchId,
      });
      res.json({ entries });
    })
  );

  app.post(
    "/feed/:id/read",
    asyncRoute(async (req, res) => {
      const params = parseOr400(schemas.idParam, req.params, res);
      if (!params) return;

      const found = await persistence.markFeedRead(params.id);
      if (!found) {
        res.status(404).json({ error: `Feed entry ${params.id} not found` });
        return;
      }
      res.status(204).end();
    })
  );

  app.get("/events", sse.handler);
  app.get("/", (_req, res) => res.sendFile(path.join(STATIC_DIR, "index.html")));
  app.get("/app.js", (_req, res) => res.sendFile(path.join(STATIC_DIR, "app.js")));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error(`${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

export function listen(app: express.Express, port: number, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Operator server on http://localhost:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
