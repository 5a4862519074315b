import { existsSync } from "node:fs";
import { GoogleAuth } from "google-auth-library";
import pino from "pino";
import type { OcrProvider, ProviderCandidate, ProviderRecognition, RetryPolicy } from "../../types/ocr.js";
import { callFailure, errorMessage, providerUnavailable, recognitionFailed } from "./errors.js";
import { postForJson, requireText } from "./httpClient.js";
import { RetryExecutor } from "./retryExecutor.js";

const ANNOTATE_URL = "https://vision.googleapis.com/v1/images:annotate";

export interface GoogleCloudVisionConfig {
  credentialsPath?: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

interface AnnotateResponse {
  responses?: Array<{
    fullTextAnnotation?: { text?: string };
    textAnnotations?: Array<{ description?: string }>;
    error?: { message?: string };
  }>;
}

function isAnnotateResponse(payload: unknown): payload is AnnotateResponse {
  return typeof payload === "object" && payload !== null && (!("responses" in payload) || Array.isArray(payload.responses));
}

/**
 * Google Cloud Vision DOCUMENT_TEXT_DETECTION using service account
 * authentication. GOOGLE_APPLICATION_CREDENTIALS must point to the JSON key.
 *
 * Docs: https://cloud.google.com/vision/docs/ocr
 */
export class GoogleCloudVisionAdapter implements OcrProvider {
  readonly id = "google_cloud_vision";
  readonly modelName = "document_text_detection";
  readonly timeoutMs: number;
  private readonly auth: GoogleAuth;

  constructor(
    private readonly config: GoogleCloudVisionConfig,
    private readonly retry: RetryExecutor = new RetryExecutor(pino({ name: "google-cloud-vision-adapter" }))
  ) {
    this.timeoutMs = config.timeoutMs;
    this.auth = new GoogleAuth({
      keyFilename: config.credentialsPath,
      scopes: ["https://www.googleapis.com/auth/cloud-platform"]
    });
  }

  async recognizeImage(image: Buffer, signal?: AbortSignal): Promise<ProviderRecognition> {
    try {
      const text = await this.retry.execute(() => this.annotate(image, signal), this.config.retry, "vision images:annotate", signal);
      return { text, modelName: this.modelName };
    } catch (error) {
      throw recognitionFailed(this.id, error);
    }
  }

  private async accessToken(): Promise<string> {
    try {
      const client = await this.auth.getClient();
      const token = await client.getAccessToken();
      if (token.token) return token.token;
    } catch (error) {
      throw callFailure("connection", `Google Cloud Vision: failed to obtain access token: ${errorMessage(error)}`, {
        providerId: this.id,
        cause: error
      });
    }
    throw callFailure("malformed_response", "Google Cloud Vision: failed to obtain access token", { providerId: this.id });
  }

  private async annotate(image: Buffer, signal?: AbortSignal): Promise<string> {
    const token = await this.accessToken();
    const data = await postForJson({
      url: ANNOTATE_URL,
      contentType: "application/json",
      headers: { Authorization: `Bearer ${token}` },
      body: JSON.stringify({
        requests: [
          {
            image: { content: image.toString("base64") },
            features: [{ type: "DOCUMENT_TEXT_DETECTION" }]
          }
        ]
      }),
      timeoutMs: this.timeoutMs,
      providerId: this.id,
      signal
    });

    if (!isAnnotateResponse(data)) {
      throw callFailure("malformed_response", "Google Cloud Vision returned an unexpected body", { providerId: this.id });
    }
    const result = data.responses?.[0];
    if (result?.error) {
      throw callFailure("malformed_response", `Google Cloud Vision API error: ${result.error.message ?? "unknown"}`, {
        providerId: this.id
      });
    }

    return requireText(result?.fullTextAnnotation?.text ?? result?.textAnnotations?.[0]?.description, this.id);
  }
}

export function createGoogleCloudVisionProvider(config: GoogleCloudVisionConfig, retry?: RetryExecutor): ProviderCandidate {
  if (!config.credentialsPath) {
    return { ok: false, id: "google_cloud_vision", error: providerUnavailable("google_cloud_vision", "GOOGLE_APPLICATION_CREDENTIALS not set") };
  }
  if (!existsSync(config.credentialsPath)) {
    return {
      ok: false,
      id: "google_cloud_vision",
      error: providerUnavailable("google_cloud_vision", `credentials file not found at ${config.credentialsPath}`)
    };
  }
  return { ok: true, provider: new GoogleCloudVisionAdapter(config, retry) };
}
