import { test } from "node:test";
import assert from "node:assert/strict";
import { parseEnv } from "../src/config/env.js";
import { isOcrError } from "../src/services/ocr/errors.js";
import { discoverProviders } from "../src/services/ocr/providerRegistry.js";
import { DisabledLocalRecognizer, loadOcrCapabilities, PassThroughPreprocessor } from "../src/services/startupDependencyChecks.js";
import { silentLogger } from "./support/fakes.js";

test("providers are discovered in priority order and missing credentials disable them", () => {
  const candidates = discoverProviders(parseEnv({ OCRSPACE_API_KEY: "test-secret" }), new DisabledLocalRecognizer("off"), silentLogger);

  assert.deepEqual(
    candidates.map((candidate) => (candidate.ok ? `${candidate.provider.id}:on` : `${candidate.id}:off`)),
    ["gemini:off", "google_cloud_vision:off", "ocr_space:on", "ollama:on"]
  );
});

test("disabled features get their null implementations", async () => {
  const capabilities = await loadOcrCapabilities(
    parseEnv({ OCR_PREPROCESS_ENABLED: "false", LOCAL_OCR_ENABLED: "false" }),
    silentLogger
  );
  const raw = Buffer.from("raw bytes");

  assert.ok(capabilities.preprocessor instanceof PassThroughPreprocessor);
  assert.equal(await capabilities.preprocessor.preprocess(raw), raw);
  await assert.rejects(capabilities.localRecognizer.recognizeLocally(raw), (error: unknown) =>
    isOcrError(error, "provider_unavailable") && error.message === "local_ocr unavailable: disabled by LOCAL_OCR_ENABLED"
  );
});
