import express, { Express, Request, Response, NextFunction } from "express";
import compression from "compression";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { randomUUID } from "crypto";
import type { AppConfig } from "./config";
import { HttpError, notFound, parserError } from "./errors";
import { logger } from "./logger";
import { createRouter } from "./routes";

export type AppOptions = Pick<AppConfig, "dbPath" | "jsonLimit" | "rateLimit">;

export function createApp(options: AppOptions): Express {
  const app = express();

  // Attach request ID so log lines can be tied to a response
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get("x-request-id") || randomUUID();
    res.setHeader("x-request-id", requestId);
    res.locals.requestId = requestId;
    next();
  });

  // Any origin, method and header
  app.use(cors());
  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(compression());
  app.use(express.json({ limit: options.jsonLimit }));

  app.use(
    rateLimit({
      windowMs: options.rateLimit.windowMs,
      limit: options.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - start,
        requestId: res.locals.requestId,
      });
    });
    next();
  });

  app.use(createRouter(options.dbPath));

  app.use((_req: Request, _res: Response, next: NextFunction) => next(notFound()));

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const httpErr = err instanceof HttpError ? err : parserError(err);
    if (httpErr) {
      res.status(httpErr.status).json(httpErr.toJSON());
      return;
    }
    logger.error({ err, requestId: res.locals.requestId }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
