import { Router } from "express";
import type { OcrEngine } from "../services/ocr/ocrEngine.js";

export function createHealthRouter(engine: OcrEngine) {
  const healthRouter = Router();

  healthRouter.get("/health", (_req, res) => {
    const health = engine.health();
    res.json({
      status: "healthy",
      ocrEngine: health.activeEngine,
      engineState: health.state,
      fallbackEngine: health.fallbackEngine,
      providers: health.providers
    });
  });

  return healthRouter;
}
