import { afterEach, mock, test } from "node:test";
import assert from "node:assert/strict";
import { isOcrError } from "../src/services/ocr/errors.js";
import { createOcrSpaceProvider, OcrSpaceAdapter, parsedTextOf, type OcrSpaceConfig } from "../src/services/ocr/ocrSpaceAdapter.js";
import { RetryExecutor } from "../src/services/ocr/retryExecutor.js";
import { silentLogger } from "./support/fakes.js";

const config: OcrSpaceConfig = {
  apiKey: "test-secret",
  endpoint: "https://ocr.test/parse/image",
  timeoutMs: 1_000,
  retry: { maxAttempts: 2, baseDelayMs: 5 }
};

function adapter() {
  return new OcrSpaceAdapter("test-secret", config, new RetryExecutor(silentLogger, async () => {}));
}

afterEach(() => {
  mock.restoreAll();
});

test("parsedTextOf joins every parsed page with newlines", () => {
  assert.equal(parsedTextOf({ ParsedResults: [{ ParsedText: "NDC 0000-1111" }, {}, { ParsedText: "Rx only" }] }), "NDC 0000-1111\n\nRx only");
  assert.equal(parsedTextOf({}), "");
});

test("a parsed response is returned trimmed and the form carries the key and image", async () => {
  const bodies: string[] = [];
  mock.method(globalThis, "fetch", async (_input: string | URL | Request, init?: RequestInit) => {
    bodies.push(typeof init?.body === "string" ? init.body : "");
    return new Response(JSON.stringify({ IsErroredOnProcessing: false, ParsedResults: [{ ParsedText: " LOT 42 \r\n" }] }));
  });

  const result = await adapter().recognizeImage(Buffer.from([0xff, 0xd8, 0xff, 0xe0]));
  const form = new URLSearchParams(bodies[0]);

  assert.deepEqual(result, { text: "LOT 42", modelName: "ocr.space" });
  assert.equal(form.get("apikey"), "test-secret");
  assert.equal(form.get("base64Image"), "data:image/jpeg;base64,/9j/4A==");
});

test("a processing error is retried and then reported as a recognition failure", async () => {
  const fetchMock = mock.method(globalThis, "fetch", async () =>
    new Response(JSON.stringify({ IsErroredOnProcessing: true, ErrorMessage: ["Unable to recognize the file type"] }))
  );

  await assert.rejects(adapter().recognizeImage(Buffer.from("image")), (error: unknown) => {
    assert.ok(isOcrError(error, "recognition_failed"));
    assert.equal(error.failureKind, "malformed_response");
    assert.match(error.message, /OCR.space processing error: Unable to recognize the file type$/);
    return true;
  });
  assert.equal(fetchMock.mock.callCount(), 2);
});

test("createOcrSpaceProvider is unavailable without an API key", () => {
  const candidate = createOcrSpaceProvider({ ...config, apiKey: undefined });

  assert.equal(candidate.ok, false);
  assert.equal(candidate.ok ? "" : candidate.error.message, "ocr_space unavailable: OCRSPACE_API_KEY not set");
});
