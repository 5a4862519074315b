import type pino from "pino";
import type { Env } from "../../config/env.js";
import type { CachedRecognition } from "../../types/ocr.js";
import { loadOcrCapabilities } from "../startupDependencyChecks.js";
import { OcrEngine } from "./ocrEngine.js";
import { PageScheduler } from "./pageScheduler.js";
import { discoverProviders } from "./providerRegistry.js";
import { ResultCache } from "./resultCache.js";

/**
 * Composition root for the OCR layer: the process owns exactly one engine,
 * created here and handed to whatever needs it.
 */
export async function createOcrEngine(config: Env, logger: pino.Logger): Promise<OcrEngine> {
  const capabilities = await loadOcrCapabilities(config, logger.child({ module: "startup" }));

  return new OcrEngine({
    candidates: discoverProviders(config, capabilities.localRecognizer, logger.child({ module: "provider" })),
    preprocessor: capabilities.preprocessor,
    pageScheduler: new PageScheduler(capabilities.rasterizer, logger.child({ module: "page-scheduler" })),
    cache: new ResultCache<CachedRecognition>(config.OCR_CACHE_SIZE),
    pdf: {
      workerCount: config.OCR_PDF_WORKERS,
      dpi: config.OCR_PDF_DPI,
      pageGraceMs: config.OCR_PAGE_GRACE_MS,
      pageTimeoutMs: config.OCR_PAGE_TIMEOUT_MS
    },
    logger: logger.child({ module: "ocr-engine" })
  });
}
