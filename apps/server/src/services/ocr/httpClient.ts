import { callFailure, errorMessage } from "./errors.js";
import { classifyFailure } from "./retryExecutor.js";

export interface HttpCall {
  url: string;
  body: string;
  contentType: "application/json" | "application/x-www-form-urlencoded";
  timeoutMs: number;
  headers?: Record<string, string>;
  providerId: string;
  signal?: AbortSignal;
}

/**
 * One POST with a hard timeout. Every failure leaves as a `recognition_failed`
 * OcrError tagged with its failure kind so the retry loop can log and retry it.
 */
export async function postForJson(call: HttpCall): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(call.url, {
      method: "POST",
      headers: { "Content-Type": call.contentType, ...call.headers },
      body: call.body,
      signal: call.signal ? AbortSignal.any([AbortSignal.timeout(call.timeoutMs), call.signal]) : AbortSignal.timeout(call.timeoutMs)
    });
  } catch (error) {
    const kind = classifyFailure(error);
    const detail = kind === "timeout" ? `timed out after ${call.timeoutMs}ms` : errorMessage(error);
    throw callFailure(kind === "unknown" ? "connection" : kind, `${call.providerId} request failed: ${detail}`, {
      providerId: call.providerId,
      cause: error
    });
  }

  if (!response.ok) {
    const snippet = (await response.text().catch(() => "")).slice(0, 200);
    throw callFailure("http_status", `${call.providerId} HTTP ${response.status}${snippet ? `: ${snippet}` : ""}`, {
      providerId: call.providerId,
      statusCode: response.status
    });
  }

  try {
    return await response.json();
  } catch (error) {
    throw callFailure("malformed_response", `${call.providerId} returned a non-JSON body`, {
      providerId: call.providerId,
      cause: error
    });
  }
}

export function requireText(text: unknown, providerId: string): string {
  const value = typeof text === "string" ? text.trim() : "";
  if (!value) {
    throw callFailure("malformed_response", `${providerId} returned empty text`, { providerId });
  }
  return value;
}
