import pino from "pino";
import type {
  CachedRecognition,
  EngineHealth,
  EngineState,
  ImagePreprocessor,
  OcrProvider,
  PageOutcome,
  ProviderHealth,
  ProviderCandidate,
  RecognitionRequest,
  RecognitionResult
} from "../../types/ocr.js";
import { allEnginesFailed, conversionFailed, errorMessage, OcrError } from "./errors.js";
import { isPdf } from "./mediaType.js";
import type { PageRecognition, PageScheduler } from "./pageScheduler.js";
import { digestOf, ResultCache } from "./resultCache.js";

export const LOCAL_PROVIDER_ID = "ollama";

export interface PdfOptions {
  workerCount: number;
  dpi: number;
  pageGraceMs: number;
  /** Overrides the derived deadline of longest provider timeout + grace. */
  pageTimeoutMs?: number;
}

export interface OcrEngineDeps {
  /** Candidates in priority order; the local provider is recognised by id wherever it appears. */
  candidates: ProviderCandidate[];
  preprocessor: ImagePreprocessor;
  pageScheduler: PageScheduler;
  pdf: PdfOptions;
  cache?: ResultCache<CachedRecognition>;
  localProviderId?: string;
  logger?: pino.Logger;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Single entry point for OCR. Picks a primary provider once at construction,
 * keeps the local model as the permanent fallback, and for every image tries
 * primary then fallback. Nothing here is reconfigured after construction.
 */
export class OcrEngine {
  private state: EngineState = "uninitialized";
  private readonly primary: OcrProvider | undefined;
  private readonly fallback: OcrProvider | undefined;
  private readonly providerHealth: Record<string, ProviderHealth> = {};
  private readonly cache: ResultCache<CachedRecognition>;
  private readonly logger: pino.Logger;

  constructor(private readonly deps: OcrEngineDeps) {
    this.logger = deps.logger ?? pino({ name: "ocr-engine" });
    this.cache = deps.cache ?? new ResultCache<CachedRecognition>();
    const localId = deps.localProviderId ?? LOCAL_PROVIDER_ID;

    const available: OcrProvider[] = [];
    for (const candidate of deps.candidates) {
      if (candidate.ok) {
        this.providerHealth[candidate.provider.id] = { available: true, lastError: null };
        available.push(candidate.provider);
        this.logger.info({ provider: candidate.provider.id, model: candidate.provider.modelName }, "OCR provider available");
      } else {
        this.providerHealth[candidate.id] = { available: false, lastError: candidate.error.message };
        this.logger.info({ provider: candidate.id, reason: candidate.error.message }, "OCR provider disabled");
      }
    }

    const local = available.find((provider) => provider.id === localId);
    this.primary = available.find((provider) => provider.id !== localId) ?? local;
    this.fallback = local && local !== this.primary ? local : undefined;

    if (!this.primary) {
      this.state = "unavailable";
      this.logger.error("No OCR engine available; configure a cloud provider key or enable the local model");
    } else {
      this.state = this.fallback ? "ready" : "degraded";
      this.logger.info(
        { state: this.state, primary: this.primary.id, fallback: this.fallback?.id ?? null },
        "OCR engine initialised"
      );
    }
  }

  get activeEngine(): string {
    return this.primary?.id ?? "none";
  }

  get engineState(): EngineState {
    return this.state;
  }

  health(): EngineHealth {
    return {
      state: this.state,
      activeEngine: this.activeEngine,
      fallbackEngine: this.fallback?.id ?? null,
      providers: Object.fromEntries(Object.entries(this.providerHealth).map(([id, health]) => [id, { ...health }]))
    };
  }

  async process(request: RecognitionRequest): Promise<RecognitionResult> {
    return request.kind === "pdf" ? this.processPdf(request.data) : this.processImage(request.data);
  }

  async processImage(image: Buffer): Promise<RecognitionResult> {
    this.assertAvailable();
    if (image.length === 0) {
      throw new OcrError("invalid_input", "Image is empty");
    }
    if (isPdf(image)) {
      throw new OcrError("invalid_input", "Received a PDF where an image was expected");
    }

    const startedAt = Date.now();
    const recognized = await this.recognizeWithFailover(image, "image");
    return Object.freeze({
      extractedText: recognized.text,
      processingTimeMs: Date.now() - startedAt,
      modelName: recognized.modelName,
      engineUsed: recognized.engineUsed
    });
  }

  async processPdf(pdf: Buffer): Promise<RecognitionResult> {
    this.assertAvailable();
    if (!isPdf(pdf)) {
      throw conversionFailed("input is not a PDF document");
    }

    const startedAt = Date.now();
    const document = await this.deps.pageScheduler.processPdf(
      pdf,
      (task) => this.recognizeWithFailover(task.imageBytes, `page ${task.index + 1}`, task.signal),
      {
        workerCount: this.deps.pdf.workerCount,
        dpi: this.deps.pdf.dpi,
        pageTimeoutMs: this.pageTimeoutMs()
      }
    );

    const recognized = document.pages.filter(
      (page): page is Extract<PageOutcome, { status: "ok" }> => page.status === "ok"
    );
    if (recognized.length === 0) {
      throw allEnginesFailed(
        "PDF document",
        document.pages.map((page) => `page ${page.index + 1}: ${page.status === "ok" ? "ok" : page.error}`)
      );
    }

    const engines = unique(recognized.map((page) => page.engineUsed));
    return Object.freeze({
      extractedText: document.text,
      processingTimeMs: Date.now() - startedAt,
      modelName: unique(recognized.map((page) => page.modelName)).join(", "),
      engineUsed: engines.find((engine) => engine !== this.primary?.id) ?? engines[0],
      pagesProcessed: document.pagesProcessed
    });
  }

  private assertAvailable(): void {
    if (this.state === "unavailable" || !this.primary) {
      throw new OcrError("no_engine_available", "No OCR engine available. Set a cloud provider key or enable the local model.");
    }
  }

  private pageTimeoutMs(): number {
    if (this.deps.pdf.pageTimeoutMs !== undefined) return this.deps.pdf.pageTimeoutMs;
    const longest = Math.max(...this.chain().map((provider) => provider.timeoutMs));
    return longest + this.deps.pdf.pageGraceMs;
  }

  private chain(): OcrProvider[] {
    const chain: OcrProvider[] = [];
    if (this.primary) chain.push(this.primary);
    if (this.fallback) chain.push(this.fallback);
    return chain;
  }

  /** An aborted signal stops the chain: no further provider is tried and nothing is cached. */
  private async recognizeWithFailover(image: Buffer, subject: string, signal?: AbortSignal): Promise<PageRecognition> {
    const prepared = await this.deps.preprocessor.preprocess(image);
    const digest = digestOf(prepared);
    const cached = this.cache.get(digest);
    if (cached) {
      this.logger.debug({ subject, digest, engine: cached.engineUsed }, "OCR cache hit");
      return cached;
    }

    const chain = this.chain();
    const errors: string[] = [];
    for (const [position, provider] of chain.entries()) {
      signal?.throwIfAborted();
      try {
        const result = await provider.recognizeImage(prepared, signal);
        signal?.throwIfAborted();
        if (!result.text.trim()) {
          throw new OcrError("recognition_failed", `${provider.id} returned empty text`, { providerId: provider.id });
        }
        const recognized: CachedRecognition = { text: result.text, engineUsed: provider.id, modelName: result.modelName };
        this.cache.put(digest, recognized);
        return recognized;
      } catch (error) {
        signal?.throwIfAborted();
        errors.push(`${provider.id}: ${errorMessage(error)}`);
        const next = chain[position + 1];
        if (next) {
          this.logger.warn({ subject, provider: provider.id, next: next.id, err: errorMessage(error) }, "OCR provider failed; falling back");
        } else {
          this.logger.error({ subject, provider: provider.id, err: errorMessage(error) }, "OCR provider failed; no engines left");
        }
      }
    }

    throw allEnginesFailed(subject, errors);
  }
}
