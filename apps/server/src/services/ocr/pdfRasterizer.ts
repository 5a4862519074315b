import { fromBuffer } from "pdf2pic";
import type { PageRasterizer } from "../../types/ocr.js";
import { conversionFailed, errorMessage, isOcrError } from "./errors.js";

/**
 * Renders every page to PNG with pdf2pic (GraphicsMagick + Ghostscript).
 * A document that cannot be fully rendered is rejected as a whole.
 */
export class Pdf2PicRasterizer implements PageRasterizer {
  async rasterize(pdf: Buffer, dpi: number): Promise<Buffer[]> {
    try {
      const convert = fromBuffer(pdf, {
        density: dpi,
        format: "png",
        preserveAspectRatio: true
      });
      const pages = await convert.bulk(-1, { responseType: "buffer" });
      const ordered = [...pages].sort((left, right) => (left.page ?? 0) - (right.page ?? 0));

      const images: Buffer[] = [];
      for (const page of ordered) {
        if (!page.buffer || page.buffer.length === 0) {
          throw conversionFailed(`page ${page.page ?? images.length + 1} rendered empty`);
        }
        images.push(page.buffer);
      }
      if (images.length === 0) {
        throw conversionFailed("no pages found");
      }
      return images;
    } catch (error) {
      if (isOcrError(error, "conversion_failed")) throw error;
      throw conversionFailed(errorMessage(error), error);
    }
  }
}
