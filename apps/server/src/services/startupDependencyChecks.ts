import type pino from "pino";
import type { Env } from "../config/env.js";
import type { ImagePreprocessor, LocalRecognizer, PageRasterizer } from "../types/ocr.js";
import { conversionFailed, providerUnavailable } from "./ocr/errors.js";

export interface OcrCapabilities {
  preprocessor: ImagePreprocessor;
  localRecognizer: LocalRecognizer;
  rasterizer: PageRasterizer;
}

export class PassThroughPreprocessor implements ImagePreprocessor {
  async preprocess(raw: Buffer): Promise<Buffer> {
    return raw;
  }
}

export class DisabledLocalRecognizer implements LocalRecognizer {
  readonly modelName = "tesseract";

  constructor(private readonly reason: string) {}

  async recognizeLocally(_image: Buffer): Promise<string> {
    throw providerUnavailable("local_ocr", this.reason);
  }
}

export class UnavailableRasterizer implements PageRasterizer {
  constructor(private readonly reason: string) {}

  async rasterize(_pdf: Buffer, _dpi: number): Promise<Buffer[]> {
    throw conversionFailed(this.reason);
  }
}

/**
 * sharp, tesseract.js and pdf2pic are native-heavy; a host without one of them
 * still boots and gets the matching null implementation instead.
 */
export async function loadOcrCapabilities(config: Env, logger: pino.Logger): Promise<OcrCapabilities> {
  const preprocessor = config.OCR_PREPROCESS_ENABLED
    ? await loadOptional(
        "sharp",
        "Image preprocessing",
        logger,
        async () => new (await import("./ocr/imagePreprocessor.js")).SharpImagePreprocessor(logger.child({ module: "preprocessor" })),
        () => new PassThroughPreprocessor()
      )
    : new PassThroughPreprocessor();

  const localRecognizer = config.LOCAL_OCR_ENABLED
    ? await loadOptional<LocalRecognizer>(
        "tesseract.js",
        "Local OCR fallback",
        logger,
        async () => new (await import("./ocr/localTesseractAdapter.js")).LocalTesseractAdapter(config.LOCAL_OCR_LANG),
        (reason) => new DisabledLocalRecognizer(reason)
      )
    : new DisabledLocalRecognizer("disabled by LOCAL_OCR_ENABLED");

  const rasterizer = await loadOptional(
    "pdf2pic",
    "PDF page rasterization",
    logger,
    async () => new (await import("./ocr/pdfRasterizer.js")).Pdf2PicRasterizer(),
    (reason) => new UnavailableRasterizer(reason)
  );

  return { preprocessor, localRecognizer, rasterizer };
}

async function loadOptional<T>(
  moduleName: string,
  feature: string,
  logger: pino.Logger,
  load: () => Promise<T>,
  fallback: (reason: string) => T
): Promise<T> {
  try {
    const loaded = await load();
    logger.info({ moduleName, feature }, "Startup dependency check passed");
    return loaded;
  } catch (error) {
    logger.warn({ moduleName, feature, err: error }, "Startup dependency missing; feature degraded");
    return fallback(`missing_runtime_dependency:${moduleName}`);
  }
}
