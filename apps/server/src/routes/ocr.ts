import { extname } from "node:path";
import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import type pino from "pino";
import type { MediaKind } from "../types/ocr.js";
import { errorMessage, httpStatusForOcrError, isOcrError } from "../services/ocr/errors.js";
import type { OcrEngine } from "../services/ocr/ocrEngine.js";

export const IMAGE_EXTENSIONS = new Set(["png", "jpg", "jpeg", "bmp", "tiff", "tif", "webp"]);
export const PDF_EXTENSIONS = new Set(["pdf"]);

export interface OcrRouterOptions {
  maxUploadBytes: number;
  logger: pino.Logger;
}

export function requestIdFromRequest(req: Request) {
  const value = req.headers["x-request-id"];
  return typeof value === "string" ? value : "unknown_request";
}

export function extensionOf(filename: string) {
  return extname(filename).slice(1).toLowerCase();
}

function failure(res: Response, status: number, error: string, code: string, requestId: string) {
  return res.status(status).json({ success: false, error, code, request_id: requestId });
}

export function createOcrRouter(engine: OcrEngine, options: OcrRouterOptions) {
  const ocrRouter = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 1 }
  });

  const handle = (kind: MediaKind, allowed: Set<string>): RequestHandler =>
    async (req, res) => {
      const requestId = requestIdFromRequest(req);
      const file = req.file;
      if (!file) {
        return failure(res, 400, "A file must be uploaded in the 'file' field", "file_required", requestId);
      }
      const extension = extensionOf(file.originalname);
      if (!allowed.has(extension)) {
        return failure(
          res,
          400,
          `Unsupported file type '.${extension}'. Allowed: ${[...allowed].join(", ")}`,
          "unsupported_file_type",
          requestId
        );
      }

      try {
        const data = await engine.process({ data: file.buffer, kind });
        options.logger.info(
          { requestId, kind, engineUsed: data.engineUsed, processingTimeMs: data.processingTimeMs },
          "OCR request completed"
        );
        return res.json({ success: true, data });
      } catch (error) {
        if (isOcrError(error)) {
          options.logger.warn({ requestId, kind, code: error.code, err: error.message }, "OCR request failed");
          return failure(res, httpStatusForOcrError(error), error.message, error.code, requestId);
        }
        options.logger.error({ requestId, kind, err: error }, "Unexpected OCR failure");
        return failure(res, 500, errorMessage(error), "internal_error", requestId);
      }
    };

  ocrRouter.post("/api/ocr/image", upload.single("file"), handle("image", IMAGE_EXTENSIONS));
  ocrRouter.post("/api/ocr/pdf", upload.single("file"), handle("pdf", PDF_EXTENSIONS));

  ocrRouter.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (!(error instanceof multer.MulterError)) {
      next(error);
      return;
    }
    const requestId = requestIdFromRequest(req);
    if (error.code === "LIMIT_FILE_SIZE") {
      failure(res, 413, `File exceeds ${options.maxUploadBytes} byte upload limit`, "file_too_large", requestId);
      return;
    }
    failure(res, 400, error.message, "upload_failed", requestId);
  });

  return ocrRouter;
}
