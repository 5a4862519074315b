import { test } from "node:test";
import assert from "node:assert/strict";
import { isOcrError } from "../src/services/ocr/errors.js";
import { joinPages, PageScheduler } from "../src/services/ocr/pageScheduler.js";
import type { PageRasterizer } from "../src/types/ocr.js";
import { delay, FakeRasterizer, PDF_BYTES, silentLogger } from "./support/fakes.js";

const options = { workerCount: 3, pageTimeoutMs: 100, dpi: 150 };

function recognized(text: string) {
  return { text, engineUsed: "primary", modelName: "primary-model" };
}

test("pages are joined in page order even when they finish out of order", async () => {
  const scheduler = new PageScheduler(new FakeRasterizer(["one", "two", "three"]), silentLogger);
  const finished: number[] = [];

  const document = await scheduler.processPdf(
    PDF_BYTES,
    async (task) => {
      await delay((3 - task.index) * 15);
      finished.push(task.index);
      return recognized(`text of ${task.imageBytes.toString()}`);
    },
    options
  );

  assert.deepEqual(finished, [2, 1, 0]);
  assert.equal(
    document.text,
    "text of one\n--- Page Break ---\ntext of two\n--- Page Break ---\ntext of three"
  );
  assert.equal(document.pagesProcessed, 3);
});

test("a page that exceeds its deadline becomes a timeout marker without affecting the others", async () => {
  const scheduler = new PageScheduler(new FakeRasterizer(["p1", "p2", "p3"]), silentLogger);

  const document = await scheduler.processPdf(
    PDF_BYTES,
    (task) => (task.index === 1 ? new Promise<never>(() => {}) : Promise.resolve(recognized(`<${task.imageBytes.toString()}>`))),
    { ...options, pageTimeoutMs: 30 }
  );

  assert.equal(document.text, "<p1>\n--- Page Break ---\n[Page 2: timeout]\n--- Page Break ---\n<p3>");
  assert.equal(document.pages[1].status, "timeout");
});

test("the deadline aborts the page's signal with the timeout error", async () => {
  const scheduler = new PageScheduler(new FakeRasterizer(["slow"]), silentLogger);
  const signals: AbortSignal[] = [];

  const document = await scheduler.processPdf(
    PDF_BYTES,
    (task) => {
      signals.push(task.signal);
      return new Promise<never>(() => {});
    },
    { ...options, pageTimeoutMs: 20 }
  );

  assert.equal(document.text, "[Page 1: timeout]");
  assert.equal(signals[0].aborted, true);
  assert.ok(isOcrError(signals[0].reason, "page_timeout"));
  assert.equal(signals[0].reason.message, "page 1 exceeded 20ms");
});

test("a page whose recognizer throws becomes an error marker", async () => {
  const scheduler = new PageScheduler(new FakeRasterizer(["p1", "p2"]), silentLogger);

  const document = await scheduler.processPdf(
    PDF_BYTES,
    async (task) => {
      if (task.index === 0) throw new Error("engine exploded");
      return recognized("second");
    },
    options
  );

  assert.equal(document.text, "[Page 1: error]\n--- Page Break ---\nsecond");
  assert.deepEqual(document.pages[0], { index: 0, status: "error", error: "engine exploded" });
});

test("no more than workerCount pages are recognized at once", async () => {
  const scheduler = new PageScheduler(new FakeRasterizer(["a", "b", "c", "d", "e"]), silentLogger);
  let inFlight = 0;
  let peak = 0;

  await scheduler.processPdf(
    PDF_BYTES,
    async (task) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
      return recognized(task.imageBytes.toString());
    },
    { ...options, workerCount: 2 }
  );

  assert.equal(peak, 2);
});

test("rasterizer failures surface as conversion_failed", async () => {
  const broken: PageRasterizer = {
    rasterize: async () => {
      throw new Error("gm/convert not installed");
    }
  };
  const scheduler = new PageScheduler(broken, silentLogger);

  await assert.rejects(
    scheduler.processPdf(PDF_BYTES, async () => recognized("unused"), options),
    (error: unknown) => {
      assert.ok(isOcrError(error, "conversion_failed"));
      assert.equal(error.message, "PDF could not be converted: gm/convert not installed");
      return true;
    }
  );
});

test("a PDF without pages is a conversion failure", async () => {
  const scheduler = new PageScheduler(new FakeRasterizer([]), silentLogger);

  await assert.rejects(
    scheduler.processPdf(PDF_BYTES, async () => recognized("unused"), options),
    (error: unknown) => isOcrError(error, "conversion_failed") && error.message === "PDF could not be converted: no pages found"
  );
});

test("joinPages renders markers with one-based page numbers", () => {
  assert.equal(
    joinPages([
      { index: 0, status: "timeout", error: "slow" },
      { index: 1, status: "ok", text: "body", engineUsed: "x", modelName: "y" }
    ]),
    "[Page 1: timeout]\n--- Page Break ---\nbody"
  );
});
