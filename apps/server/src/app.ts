import { randomUUID } from "node:crypto";
import cors from "cors";
import express from "express";
import pino from "pino";
import { createHealthRouter } from "./routes/health.js";
import { createOcrRouter } from "./routes/ocr.js";
import type { OcrEngine } from "./services/ocr/ocrEngine.js";

export interface AppOptions {
  corsOrigin: string;
  maxUploadBytes: number;
  logger?: pino.Logger;
}

export function createApp(engine: OcrEngine, options: AppOptions) {
  const logger = options.logger ?? pino({ name: "http" });
  const app = express();

  app.use(cors({ origin: options.corsOrigin === "*" ? true : options.corsOrigin.split(",").map((origin) => origin.trim()) }));
  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || randomUUID();
    res.setHeader("x-request-id", requestId);
    req.headers["x-request-id"] = requestId;
    next();
  });
  app.use(express.json());

  app.use(createHealthRouter(engine));
  app.use(createOcrRouter(engine, { maxUploadBytes: options.maxUploadBytes, logger }));

  return app;
}
