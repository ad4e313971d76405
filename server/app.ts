import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors, { type CorsOptions } from "cors";
import type { Server } from "http";
import { randomUUID } from "crypto";
import { registerRoutes, type RouteOptions } from "./routes";
import { config } from "./config";
import { metrics } from "./metrics";
import { storage, type IStorage } from "./storage";
import { withSource } from "./logger";
import { handleApiError } from "./types/errors";

const httpLog = withSource("http");

function isJsonParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

function routeLabel(req: Request): string {
  // Route patterns keep metric labels bounded; unmatched paths share one label
  const route: unknown = req.route;
  if (typeof route === "object" && route !== null && "path" in route && typeof route.path === "string") {
    return `${req.baseUrl}${route.path}`;
  }
  return "unmatched";
}

/**
 * Build the express app and its HTTP server without listening.
 * Tests pass their own storage; the entry point uses the configured one.
 */
export function createApp(
  store: IStorage = storage,
  options: RouteOptions = {}
): { app: Express; server: Server } {
  const app = express();
  app.use(express.json());

  // Attach a per-request ID early for structured logging and tracing
  app.use((req, res, next) => {
    const id = randomUUID();
    req.id = id;
    res.locals.requestId = id;
    res.setHeader("X-Request-Id", id);
    next();
  });

  // CORS: allowlist origins and credentials based on config
  const allowed = new Set<string>(config.cors.allowedOrigins);
  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      // Allow same-origin or curl/postman (no origin header)
      if (!origin) return callback(null, true);
      return callback(null, allowed.has(origin));
    },
    credentials: config.cors.credentials,
  };
  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  app.use((req, res, next) => {
    const start = performance.now();
    res.on("finish", () => {
      const duration = performance.now() - start;
      metrics.observeApiRequest(routeLabel(req), req.method, res.statusCode, duration);
      if (req.path.startsWith("/api")) {
        httpLog.info(
          {
            requestId: req.id,
            method: req.method,
            path: req.path,
            status: res.statusCode,
            duration_ms: Math.round(duration),
          },
          "request completed"
        );
      }
    });
    next();
  });

  const server = registerRoutes(app, store, options);

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    if (isJsonParseError(err)) {
      httpLog.warn({ requestId: req.id, path: req.path }, "invalid JSON body");
      return res.status(400).json({ error: "Invalid JSON in request body" });
    }
    return handleApiError(httpLog, err, res, "unhandled", { method: req.method, path: req.path });
  });

  return { app, server };
}
