import type { OcrError } from "../services/ocr/errors.js";

export type MediaKind = "image" | "pdf";

export type RecognitionRequest = Readonly<{
  data: Buffer;
  kind: MediaKind;
}>;

export interface RecognitionResult {
  extractedText: string;
  processingTimeMs: number;
  modelName: string;
  engineUsed: string;
  pagesProcessed?: number;
}

export interface ProviderHealth {
  available: boolean;
  lastError: string | null;
}

export type EngineState = "uninitialized" | "ready" | "degraded" | "unavailable";

export interface EngineHealth {
  state: EngineState;
  activeEngine: string;
  fallbackEngine: string | null;
  providers: Record<string, ProviderHealth>;
}

export interface OcrProvider {
  readonly id: string;
  readonly modelName: string;
  readonly timeoutMs: number;
  /** Resolves with non-empty text or rejects with an OcrError. An aborted signal cancels in-flight requests. */
  recognizeImage(image: Buffer, signal?: AbortSignal): Promise<ProviderRecognition>;
}

export interface ProviderRecognition {
  text: string;
  /** Differs from the provider's modelName when an adapter answered from its own local fallback. */
  modelName: string;
}

export type ProviderCandidate =
  | { ok: true; provider: OcrProvider }
  | { ok: false; id: string; error: OcrError };

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

export interface PageRasterizer {
  rasterize(pdf: Buffer, dpi: number): Promise<Buffer[]>;
}

export interface LocalRecognizer {
  readonly modelName: string;
  recognizeLocally(image: Buffer): Promise<string>;
}

export interface ImagePreprocessor {
  preprocess(raw: Buffer): Promise<Buffer>;
}

export interface PageTask {
  index: number;
  imageBytes: Buffer;
  /** Aborted with the page_timeout error once the page deadline passes. */
  signal: AbortSignal;
}

export type PageOutcome =
  | { index: number; status: "ok"; text: string; engineUsed: string; modelName: string }
  | { index: number; status: "timeout"; error: string }
  | { index: number; status: "error"; error: string };

export interface CachedRecognition {
  text: string;
  engineUsed: string;
  modelName: string;
}
