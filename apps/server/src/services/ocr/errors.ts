export type OcrErrorCode =
  | "provider_unavailable"
  | "recognition_failed"
  | "exhausted_retries"
  | "conversion_failed"
  | "page_timeout"
  | "all_engines_failed"
  | "no_engine_available"
  | "invalid_input";

export type FailureKind = "timeout" | "connection" | "malformed_response" | "http_status" | "unknown";

interface OcrErrorDetails {
  providerId?: string;
  failureKind?: FailureKind;
  statusCode?: number;
  causes?: string[];
  cause?: unknown;
}

/**
 * Single error type for the OCR layer. Callers branch on `code` instead of
 * reading messages: retry-worthy faults carry a `failureKind`, terminal ones
 * carry the aggregated `causes`.
 */
export class OcrError extends Error {
  readonly code: OcrErrorCode;
  readonly providerId?: string;
  readonly failureKind?: FailureKind;
  readonly statusCode?: number;
  readonly causes: string[];

  constructor(code: OcrErrorCode, message: string, details: OcrErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "OcrError";
    this.code = code;
    this.providerId = details.providerId;
    this.failureKind = details.failureKind;
    this.statusCode = details.statusCode;
    this.causes = details.causes ?? [];
  }
}

export function isOcrError(value: unknown, code?: OcrErrorCode): value is OcrError {
  return value instanceof OcrError && (code === undefined || value.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function providerUnavailable(providerId: string, reason: string): OcrError {
  return new OcrError("provider_unavailable", `${providerId} unavailable: ${reason}`, { providerId });
}

export function callFailure(
  kind: FailureKind,
  message: string,
  details: { providerId?: string; statusCode?: number; cause?: unknown } = {}
): OcrError {
  return new OcrError("recognition_failed", message, { ...details, failureKind: kind });
}

export function recognitionFailed(providerId: string, cause: unknown): OcrError {
  const inner = isOcrError(cause) ? cause : undefined;
  return new OcrError("recognition_failed", `${providerId} recognition failed: ${errorMessage(cause)}`, {
    providerId,
    failureKind: inner?.failureKind,
    statusCode: inner?.statusCode,
    cause
  });
}

export function conversionFailed(message: string, cause?: unknown): OcrError {
  return new OcrError("conversion_failed", `PDF could not be converted: ${message}`, { cause });
}

export function allEnginesFailed(subject: string, causes: string[]): OcrError {
  return new OcrError("all_engines_failed", `All OCR engines failed for ${subject}. Errors: ${causes.join(" | ")}`, {
    causes
  });
}

export function httpStatusForOcrError(error: unknown): number {
  if (!isOcrError(error)) return 500;
  switch (error.code) {
    case "invalid_input":
      return 400;
    case "conversion_failed":
      return 422;
    case "all_engines_failed":
      return 502;
    case "no_engine_available":
      return 503;
    default:
      return 500;
  }
}
