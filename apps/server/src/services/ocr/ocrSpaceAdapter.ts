import pino from "pino";
import type { OcrProvider, ProviderCandidate, ProviderRecognition, RetryPolicy } from "../../types/ocr.js";
import { callFailure, providerUnavailable, recognitionFailed } from "./errors.js";
import { postForJson, requireText } from "./httpClient.js";
import { sniffMimeType } from "./mediaType.js";
import { RetryExecutor } from "./retryExecutor.js";

export interface OcrSpaceConfig {
  apiKey?: string;
  endpoint: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

interface OcrSpaceResponse {
  IsErroredOnProcessing?: boolean;
  ErrorMessage?: string | string[];
  ParsedResults?: Array<{ ParsedText?: string }>;
}

function isOcrSpaceResponse(payload: unknown): payload is OcrSpaceResponse {
  return typeof payload === "object" && payload !== null && !Array.isArray(payload);
}

export function parsedTextOf(data: OcrSpaceResponse): string {
  return (data.ParsedResults ?? []).map((page) => page.ParsedText ?? "").join("\n");
}

export class OcrSpaceAdapter implements OcrProvider {
  readonly id = "ocr_space";
  readonly modelName = "ocr.space";
  readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string,
    private readonly config: OcrSpaceConfig,
    private readonly retry: RetryExecutor = new RetryExecutor(pino({ name: "ocr-space-adapter" }))
  ) {
    this.timeoutMs = config.timeoutMs;
  }

  async recognizeImage(image: Buffer, signal?: AbortSignal): Promise<ProviderRecognition> {
    try {
      const text = await this.retry.execute(() => this.parse(image, signal), this.config.retry, "ocr.space parse", signal);
      return { text, modelName: this.modelName };
    } catch (error) {
      throw recognitionFailed(this.id, error);
    }
  }

  private async parse(image: Buffer, signal?: AbortSignal): Promise<string> {
    const form = new URLSearchParams({
      apikey: this.apiKey,
      language: "eng",
      isOverlayRequired: "false",
      base64Image: `data:${sniffMimeType(image)};base64,${image.toString("base64")}`
    });

    const data = await postForJson({
      url: this.config.endpoint,
      contentType: "application/x-www-form-urlencoded",
      body: form.toString(),
      timeoutMs: this.timeoutMs,
      providerId: this.id,
      signal
    });

    if (!isOcrSpaceResponse(data)) {
      throw callFailure("malformed_response", "OCR.space returned an unexpected body", { providerId: this.id });
    }
    if (data.IsErroredOnProcessing) {
      const detail = Array.isArray(data.ErrorMessage) ? data.ErrorMessage.join("; ") : data.ErrorMessage ?? "unknown";
      throw callFailure("malformed_response", `OCR.space processing error: ${detail}`, { providerId: this.id });
    }
    return requireText(parsedTextOf(data), this.id);
  }
}

export function createOcrSpaceProvider(config: OcrSpaceConfig, retry?: RetryExecutor): ProviderCandidate {
  if (!config.apiKey) {
    return { ok: false, id: "ocr_space", error: providerUnavailable("ocr_space", "OCRSPACE_API_KEY not set") };
  }
  return { ok: true, provider: new OcrSpaceAdapter(config.apiKey, config, retry) };
}
