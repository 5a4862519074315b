import pino from "pino";
import type { PageOutcome, PageRasterizer, PageTask } from "../../types/ocr.js";
import { conversionFailed, errorMessage, isOcrError, OcrError } from "./errors.js";

export const PAGE_BREAK = "\n--- Page Break ---\n";

export interface PageRecognition {
  text: string;
  engineUsed: string;
  modelName: string;
}

export type PageRecognizer = (task: PageTask) => Promise<PageRecognition>;

export interface PageSchedulerOptions {
  workerCount: number;
  pageTimeoutMs: number;
  dpi: number;
}

export interface ScheduledDocument {
  text: string;
  pagesProcessed: number;
  pages: PageOutcome[];
}

export function pageMarker(outcome: PageOutcome): string {
  if (outcome.status === "ok") return outcome.text;
  return `[Page ${outcome.index + 1}: ${outcome.status}]`;
}

export function joinPages(outcomes: PageOutcome[]): string {
  return outcomes.map(pageMarker).join(PAGE_BREAK);
}

async function runWithConcurrency<T>(items: T[], concurrency: number, worker: (item: T, index: number) => Promise<void>) {
  let cursor = 0;
  const runners = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (true) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) break;
      await worker(items[index], index);
    }
  });
  await Promise.all(runners);
}

/**
 * Splits a PDF into page images and recognizes them on a pool sized per
 * document. Pages are written back by index, so completion order never
 * changes the output; a slow or failing page only affects its own slot.
 */
export class PageScheduler {
  constructor(
    private readonly rasterizer: PageRasterizer,
    private readonly logger: pino.Logger = pino({ name: "page-scheduler" })
  ) {}

  async processPdf(pdf: Buffer, recognizePage: PageRecognizer, options: PageSchedulerOptions): Promise<ScheduledDocument> {
    const images = await this.rasterize(pdf, options.dpi);
    const tasks = images.map((imageBytes, index) => ({ index, imageBytes, controller: new AbortController() }));
    const outcomes: PageOutcome[] = new Array<PageOutcome>(tasks.length);
    const workerCount = Math.max(1, Math.min(Math.floor(options.workerCount), tasks.length));

    this.logger.info({ pages: tasks.length, workerCount, dpi: options.dpi }, "Processing PDF pages");

    await runWithConcurrency(tasks, workerCount, async (task) => {
      outcomes[task.index] = await this.runPage(task, recognizePage, options.pageTimeoutMs);
    });

    return { text: joinPages(outcomes), pagesProcessed: tasks.length, pages: outcomes };
  }

  private async rasterize(pdf: Buffer, dpi: number): Promise<Buffer[]> {
    let images: Buffer[];
    try {
      images = await this.rasterizer.rasterize(pdf, dpi);
    } catch (error) {
      if (isOcrError(error, "conversion_failed")) throw error;
      throw conversionFailed(errorMessage(error), error);
    }
    if (images.length === 0) {
      throw conversionFailed("no pages found");
    }
    return images;
  }

  private async runPage(
    { index, imageBytes, controller }: { index: number; imageBytes: Buffer; controller: AbortController },
    recognizePage: PageRecognizer,
    timeoutMs: number
  ): Promise<PageOutcome> {
    const task: PageTask = { index, imageBytes, signal: controller.signal };
    try {
      const page = await this.withDeadline(recognizePage(task), timeoutMs, controller, index);
      return { index: task.index, status: "ok", ...page };
    } catch (error) {
      const status = isOcrError(error, "page_timeout") ? "timeout" : "error";
      this.logger.warn({ page: task.index + 1, status, err: errorMessage(error) }, "PDF page degraded to marker");
      return { index: task.index, status, error: errorMessage(error) };
    }
  }

  /**
   * On expiry the page's signal is aborted, so adapters cancel their requests and
   * skip remaining retries instead of holding a provider slot past the deadline.
   */
  private async withDeadline<T>(work: Promise<T>, timeoutMs: number, controller: AbortController, index: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const timeout = new OcrError("page_timeout", `page ${index + 1} exceeded ${timeoutMs}ms`);
        controller.abort(timeout);
        reject(timeout);
      }, timeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
      // The abandoned call may still settle later; record it instead of leaving it unhandled.
      work.catch((error: unknown) => {
        this.logger.debug({ page: index + 1, err: errorMessage(error) }, "Late page failure after deadline");
      });
    }
  }
}
