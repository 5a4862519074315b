import { GoogleGenerativeAI } from "@google/generative-ai";
import type { GenerativeModel } from "@google/generative-ai";
import pino from "pino";
import type { OcrProvider, ProviderCandidate, ProviderRecognition, RetryPolicy } from "../../types/ocr.js";
import { callFailure, errorMessage, recognitionFailed, providerUnavailable } from "./errors.js";
import type { FailureKind } from "./errors.js";
import { requireText } from "./httpClient.js";
import { sniffMimeType } from "./mediaType.js";
import { classifyFailure, RetryExecutor } from "./retryExecutor.js";

export const GEMINI_OCR_PROMPT =
  "Extract all text from this pharmaceutical label exactly as it appears. " +
  "Return only the extracted text, no explanations, no formatting, no extra words.";

export interface GeminiConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  return typeof error.status === "number" ? error.status : undefined;
}

function failureKindOf(error: unknown, statusCode: number | undefined): FailureKind {
  if (statusCode !== undefined) return "http_status";
  // The SDK reports its own request timeout as an aborted fetch.
  if (/timed? ?out|aborted/i.test(errorMessage(error))) return "timeout";
  const kind = classifyFailure(error);
  return kind === "unknown" ? "connection" : kind;
}

function toCallFailure(error: unknown): Error {
  const statusCode = statusOf(error);
  return callFailure(failureKindOf(error, statusCode), `gemini: ${errorMessage(error)}`, {
    providerId: "gemini",
    statusCode,
    cause: error
  });
}

/**
 * Gemini vision model via the Google Generative AI SDK. Images go inline as
 * base64 alongside the label prompt.
 */
export class GeminiAdapter implements OcrProvider {
  readonly id = "gemini";
  readonly modelName: string;
  readonly timeoutMs: number;
  private readonly model: GenerativeModel;

  constructor(
    apiKey: string,
    private readonly config: GeminiConfig,
    private readonly retry: RetryExecutor = new RetryExecutor(pino({ name: "gemini-adapter" }))
  ) {
    this.modelName = config.model;
    this.timeoutMs = config.timeoutMs;
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: config.model }, { timeout: config.timeoutMs });
  }

  async recognizeImage(image: Buffer, signal?: AbortSignal): Promise<ProviderRecognition> {
    try {
      const text = await this.retry.execute(() => this.generate(image, signal), this.config.retry, "gemini generateContent", signal);
      return { text, modelName: this.modelName };
    } catch (error) {
      throw recognitionFailed(this.id, error);
    }
  }

  private async generate(image: Buffer, signal?: AbortSignal): Promise<string> {
    let text: string;
    try {
      const result = await this.model.generateContent(
        [{ inlineData: { data: image.toString("base64"), mimeType: sniffMimeType(image) } }, GEMINI_OCR_PROMPT],
        { signal }
      );
      text = result.response.text();
    } catch (error) {
      throw toCallFailure(error);
    }
    return requireText(text, this.id);
  }
}

export function createGeminiProvider(config: GeminiConfig, retry?: RetryExecutor): ProviderCandidate {
  if (!config.apiKey) {
    return { ok: false, id: "gemini", error: providerUnavailable("gemini", "GEMINI_API_KEY not set") };
  }
  try {
    return { ok: true, provider: new GeminiAdapter(config.apiKey, config, retry) };
  } catch (error) {
    return { ok: false, id: "gemini", error: providerUnavailable("gemini", errorMessage(error)) };
  }
}
