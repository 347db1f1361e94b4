import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import { registerRoutes } from "./routes";
import type { ServerConfig } from "./config";
import { log, logError } from "./logger";

const LOG_LINE_LIMIT = 80;

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number") return candidate;
  }
  return 500;
}

export async function createApp(config: ServerConfig) {
  const app = express();

  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }

        if (logLine.length > LOG_LINE_LIMIT) {
          logLine = logLine.slice(0, LOG_LINE_LIMIT - 1) + "…";
        }

        log(logLine);
      }
    });

    next();
  });

  const server = await registerRoutes(app, config);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = status < 500 && err instanceof Error ? err.message : "Internal Server Error";

    if (status >= 500) {
      logError("Unhandled error", err);
    }
    res.status(status).json({ error: message });
  });

  return { app, server };
}
