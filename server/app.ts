import express, { type Express, type Request, type Response, type NextFunction } from "express";
import type { ObjectEngine } from "../platform/objectdb";
import { log, logError } from "@shared/log";
import { registerRoutes } from "./routes";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status: unknown = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

export function createApp(engine: ObjectEngine): Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined && res.statusCode >= 400) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }
        log(logLine);
      }
    });

    next();
  });

  registerRoutes(app, engine);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    logError("Internal Server Error", err);

    if (res.headersSent) {
      return next(err);
    }

    return res.status(status).json({ message });
  });

  return app;
}
