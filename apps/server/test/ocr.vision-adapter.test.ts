import { afterEach, mock, test } from "node:test";
import assert from "node:assert/strict";
import { GoogleAuth } from "google-auth-library";
import { isOcrError } from "../src/services/ocr/errors.js";
import {
  createGoogleCloudVisionProvider,
  GoogleCloudVisionAdapter,
  type GoogleCloudVisionConfig
} from "../src/services/ocr/googleCloudVisionAdapter.js";
import { RetryExecutor } from "../src/services/ocr/retryExecutor.js";
import { silentLogger } from "./support/fakes.js";

const config: GoogleCloudVisionConfig = {
  credentialsPath: "/nonexistent/test-service-account.json",
  timeoutMs: 1_000,
  retry: { maxAttempts: 2, baseDelayMs: 5 }
};
const IMAGE = Buffer.from("label image");

interface SentRequest {
  url: string;
  authorization: string | null;
  body: string;
}

function adapter() {
  return new GoogleCloudVisionAdapter(config, new RetryExecutor(silentLogger, async () => {}));
}

function stubToken() {
  mock.method(GoogleAuth.prototype, "getClient", async () => ({
    getAccessToken: async () => ({ token: "test-token" })
  }));
}

function stubFetch(respond: () => Response) {
  const sent: SentRequest[] = [];
  const fetchMock = mock.method(globalThis, "fetch", async (input: string | URL | Request, init?: RequestInit) => {
    sent.push({
      url: String(input),
      authorization: new Headers(init?.headers).get("authorization"),
      body: typeof init?.body === "string" ? init.body : ""
    });
    return respond();
  });
  return { sent, fetchMock };
}

function annotated(body: unknown) {
  return () => new Response(JSON.stringify(body));
}

afterEach(() => {
  mock.restoreAll();
});

test("document text is read from fullTextAnnotation with a bearer token", async () => {
  stubToken();
  const { sent } = stubFetch(annotated({ responses: [{ fullTextAnnotation: { text: " NDC 12345-678 \n" } }] }));

  const result = await adapter().recognizeImage(IMAGE);

  assert.deepEqual(result, { text: "NDC 12345-678", modelName: "document_text_detection" });
  assert.equal(sent[0].url, "https://vision.googleapis.com/v1/images:annotate");
  assert.equal(sent[0].authorization, "Bearer test-token");
  assert.deepEqual(JSON.parse(sent[0].body), {
    requests: [{ image: { content: IMAGE.toString("base64") }, features: [{ type: "DOCUMENT_TEXT_DETECTION" }] }]
  });
});

test("the first text annotation is used when there is no full annotation", async () => {
  stubToken();
  stubFetch(annotated({ responses: [{ textAnnotations: [{ description: "EXP 03/2027" }, { description: "EXP" }] }] }));

  const result = await adapter().recognizeImage(IMAGE);

  assert.equal(result.text, "EXP 03/2027");
});

test("a per-image API error is a malformed response after the retries", async () => {
  stubToken();
  const { fetchMock } = stubFetch(annotated({ responses: [{ error: { message: "Bad image data." } }] }));

  await assert.rejects(adapter().recognizeImage(IMAGE), (error: unknown) => {
    assert.ok(isOcrError(error, "recognition_failed"));
    assert.equal(error.failureKind, "malformed_response");
    assert.match(error.message, /Google Cloud Vision API error: Bad image data\.$/);
    return true;
  });
  assert.equal(fetchMock.mock.callCount(), 2);
});

test("an HTTP error keeps its status code", async () => {
  stubToken();
  stubFetch(() => new Response("permission denied", { status: 403 }));

  await assert.rejects(adapter().recognizeImage(IMAGE), (error: unknown) => {
    assert.ok(isOcrError(error, "recognition_failed"));
    assert.equal(error.failureKind, "http_status");
    assert.equal(error.statusCode, 403);
    return true;
  });
});

test("a token failure never reaches the annotate endpoint", async () => {
  mock.method(GoogleAuth.prototype, "getClient", async () => {
    throw new Error("invalid_grant");
  });
  const { fetchMock } = stubFetch(annotated({ responses: [] }));

  await assert.rejects(adapter().recognizeImage(IMAGE), (error: unknown) => {
    assert.ok(isOcrError(error, "recognition_failed"));
    assert.equal(error.failureKind, "connection");
    assert.match(error.message, /failed to obtain access token: invalid_grant$/);
    return true;
  });
  assert.equal(fetchMock.mock.callCount(), 0);
});

test("createGoogleCloudVisionProvider needs an existing credentials file", () => {
  const unset = createGoogleCloudVisionProvider({ ...config, credentialsPath: undefined });
  const missing = createGoogleCloudVisionProvider(config);

  assert.equal(unset.ok ? "" : unset.error.message, "google_cloud_vision unavailable: GOOGLE_APPLICATION_CREDENTIALS not set");
  assert.equal(
    missing.ok ? "" : missing.error.message,
    "google_cloud_vision unavailable: credentials file not found at /nonexistent/test-service-account.json"
  );
});
