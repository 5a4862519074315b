import type pino from "pino";
import type { Env } from "../../config/env.js";
import type { LocalRecognizer, ProviderCandidate } from "../../types/ocr.js";
import { createGeminiProvider } from "./geminiAdapter.js";
import { createGoogleCloudVisionProvider } from "./googleCloudVisionAdapter.js";
import { createOcrSpaceProvider } from "./ocrSpaceAdapter.js";
import { createOllamaProvider } from "./ollamaAdapter.js";
import { RetryExecutor } from "./retryExecutor.js";

/**
 * Builds every provider in priority order: cloud vision, cloud OCR API, then
 * the local model. Missing credentials produce a disabled candidate, never a throw.
 */
export function discoverProviders(config: Env, localFallback: LocalRecognizer, logger: pino.Logger): ProviderCandidate[] {
  const retryFor = (provider: string) => new RetryExecutor(logger.child({ provider }));
  const cloudDelay = config.CLOUD_RETRY_DELAY_MS;

  return [
    createGeminiProvider(
      {
        apiKey: config.GEMINI_API_KEY,
        model: config.GEMINI_MODEL,
        timeoutMs: config.GEMINI_TIMEOUT_MS,
        retry: { maxAttempts: config.GEMINI_RETRIES, baseDelayMs: cloudDelay }
      },
      retryFor("gemini")
    ),
    createGoogleCloudVisionProvider(
      {
        credentialsPath: config.GOOGLE_APPLICATION_CREDENTIALS,
        timeoutMs: config.VISION_TIMEOUT_MS,
        retry: { maxAttempts: config.VISION_RETRIES, baseDelayMs: cloudDelay }
      },
      retryFor("google_cloud_vision")
    ),
    createOcrSpaceProvider(
      {
        apiKey: config.OCRSPACE_API_KEY,
        endpoint: config.OCRSPACE_ENDPOINT,
        timeoutMs: config.OCRSPACE_TIMEOUT_MS,
        retry: { maxAttempts: config.OCRSPACE_RETRIES, baseDelayMs: cloudDelay }
      },
      retryFor("ocr_space")
    ),
    createOllamaProvider(
      {
        enabled: config.OLLAMA_ENABLED,
        endpoint: config.OLLAMA_ENDPOINT,
        model: config.OLLAMA_MODEL,
        timeoutMs: config.OLLAMA_TIMEOUT_MS,
        retry: { maxAttempts: config.OLLAMA_RETRIES, baseDelayMs: config.OLLAMA_RETRY_DELAY_MS }
      },
      localFallback,
      retryFor("ollama"),
      logger.child({ provider: "ollama" })
    )
  ];
}
