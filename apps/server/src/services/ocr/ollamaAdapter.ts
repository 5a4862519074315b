import pino from "pino";
import type { LocalRecognizer, OcrProvider, ProviderCandidate, ProviderRecognition, RetryPolicy } from "../../types/ocr.js";
import { errorMessage, OcrError, providerUnavailable, recognitionFailed } from "./errors.js";
import { postForJson, requireText } from "./httpClient.js";
import { RetryExecutor } from "./retryExecutor.js";

export const OLLAMA_PROMPT = "Extract all text from this image. Return only the extracted text.";

export interface OllamaConfig {
  enabled: boolean;
  endpoint: string;
  model: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

function readResponseField(payload: unknown): unknown {
  return typeof payload === "object" && payload !== null && "response" in payload ? payload.response : undefined;
}

/**
 * Locally hosted vision model served by Ollama. When the model cannot answer
 * after its retries, the deterministic local recognizer gets the image; only
 * if that fails too does the adapter report a failure.
 */
export class OllamaAdapter implements OcrProvider {
  readonly id = "ollama";
  readonly modelName: string;
  readonly timeoutMs: number;
  private readonly apiEndpoint: string;

  constructor(
    private readonly config: OllamaConfig,
    private readonly localFallback: LocalRecognizer,
    private readonly retry: RetryExecutor = new RetryExecutor(),
    private readonly logger: pino.Logger = pino({ name: "ollama-adapter" })
  ) {
    this.modelName = config.model;
    this.timeoutMs = config.timeoutMs;
    this.apiEndpoint = `${config.endpoint.replace(/\/+$/, "")}/api/generate`;
  }

  async recognizeImage(image: Buffer, signal?: AbortSignal): Promise<ProviderRecognition> {
    let modelError: unknown;
    try {
      const text = await this.retry.execute(() => this.generate(image, signal), this.config.retry, "ollama generate", signal);
      return { text, modelName: this.modelName };
    } catch (error) {
      signal?.throwIfAborted();
      modelError = error;
      this.logger.warn({ err: errorMessage(error) }, "Ollama unavailable; trying local OCR fallback");
    }

    try {
      const text = requireText(await this.localFallback.recognizeLocally(image), "local_ocr");
      return { text, modelName: this.localFallback.modelName };
    } catch (fallbackError) {
      throw recognitionFailed(
        this.id,
        new OcrError("recognition_failed", `${errorMessage(modelError)}; local fallback: ${errorMessage(fallbackError)}`, {
          providerId: this.id,
          causes: [errorMessage(modelError), errorMessage(fallbackError)],
          cause: modelError
        })
      );
    }
  }

  private async generate(image: Buffer, signal?: AbortSignal): Promise<string> {
    const payload = await postForJson({
      url: this.apiEndpoint,
      contentType: "application/json",
      body: JSON.stringify({
        model: this.config.model,
        prompt: OLLAMA_PROMPT,
        images: [image.toString("base64")],
        stream: false
      }),
      timeoutMs: this.config.timeoutMs,
      providerId: this.id,
      signal
    });
    return requireText(readResponseField(payload), this.id);
  }
}

export function createOllamaProvider(
  config: OllamaConfig,
  localFallback: LocalRecognizer,
  retry?: RetryExecutor,
  logger?: pino.Logger
): ProviderCandidate {
  if (!config.enabled) {
    return { ok: false, id: "ollama", error: providerUnavailable("ollama", "disabled by OLLAMA_ENABLED") };
  }
  if (!URL.canParse(config.endpoint)) {
    return { ok: false, id: "ollama", error: providerUnavailable("ollama", `invalid endpoint ${config.endpoint}`) };
  }
  return { ok: true, provider: new OllamaAdapter(config, localFallback, retry, logger) };
}
