import express from "express";
import type { Request, Response, NextFunction } from "express";
import { registerRoutes } from "./routes";
import type { AppConfig } from "./config";
import { AppError } from "./errors";
import type { Services } from "./services";

const log = console.log;

function setupCors(app: express.Application, config: AppConfig) {
  app.use((req, res, next) => {
    const origins = new Set<string>([
      "http://localhost:8081",
      "http://localhost:8082",
      "http://127.0.0.1:8081",
      "http://127.0.0.1:8082",
    ]);

    const origin = req.header("origin");

    // In development any origin is accepted
    if (origin && (origins.has(origin) || config.env === "development")) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
      res.header("Access-Control-Allow-Headers", "Content-Type");
      res.header("Access-Control-Allow-Credentials", "true");
    } else if (!origin) {
      res.header("Access-Control-Allow-Origin", "*");
      res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
      res.header("Access-Control-Allow-Headers", "Content-Type");
    }

    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }

    next();
  });
}

function setupBodyParsing(app: express.Application) {
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));
}

function setupRequestLogging(app: express.Application) {
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
      if (!path.startsWith("/api")) return;

      const duration = Date.now() - start;

      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + "…";
      }

      log(logLine);
    });

    next();
  });
}

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

function setupErrorHandler(app: express.Application) {
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    // Malformed JSON bodies come from body-parser with a 400 status
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION_FAILED" });
      return;
    }

    if (err instanceof AppError) {
      if (err.status >= 500) {
        console.error(`[Server] ❌ ${err.name}: ${err.message}`);
      }
      res.status(err.status).json({
        error: err.message,
        code: err.code,
        ...(err.details !== undefined ? { details: err.details } : {}),
      });
      return;
    }

    // Other body-parser rejections such as 413 keep their status
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      res.status(clientStatus).json({
        error: err instanceof Error ? err.message : "Bad request",
        code: clientStatus === 413 ? "PAYLOAD_TOO_LARGE" : "VALIDATION_FAILED",
      });
      return;
    }

    console.error("[Server] ❌ Unhandled error:", err);
    res.status(500).json({ error: "Internal Server Error", code: "INTERNAL_ERROR" });
  });
}

export function createApp(services: Services) {
  const app = express();

  setupCors(app, services.config);
  setupBodyParsing(app);
  setupRequestLogging(app);

  const server = registerRoutes(app, services);

  setupErrorHandler(app);
  return { app, server };
}
