import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { createWorker } from "tesseract.js";
import type { LocalRecognizer } from "../../types/ocr.js";
import { errorMessage, providerUnavailable } from "./errors.js";

const requireFromHere = createRequire(import.meta.url);
const TRAINED_DATA_VARIANT = "4.0.0_best_int";

/**
 * Directory holding `<lang>.traineddata.gz` from the `@tesseract.js-data/<lang>`
 * package, so the worker never fetches language data at run time.
 */
export function tesseractLangPath(lang: string): string {
  let packageDir: string;
  try {
    packageDir = dirname(requireFromHere.resolve(`@tesseract.js-data/${lang}/package.json`));
  } catch (error) {
    throw providerUnavailable("local_ocr", `language data @tesseract.js-data/${lang} not installed (${errorMessage(error)})`);
  }
  const langPath = join(packageDir, TRAINED_DATA_VARIANT);
  if (!existsSync(join(langPath, `${lang}.traineddata.gz`))) {
    throw providerUnavailable("local_ocr", `no ${TRAINED_DATA_VARIANT} traineddata for ${lang} in ${packageDir}`);
  }
  return langPath;
}

/**
 * Offline OCR backed by Tesseract.js. Last line of defence behind the local
 * model, so it runs entirely inside this process.
 */
export class LocalTesseractAdapter implements LocalRecognizer {
  readonly modelName = "tesseract";
  private readonly langPath: string;

  constructor(private readonly lang = "eng") {
    this.langPath = tesseractLangPath(lang);
  }

  async recognizeLocally(image: Buffer): Promise<string> {
    let workerError: Error | null = null;
    const worker = await createWorker(this.lang, 1, {
      langPath: this.langPath,
      gzip: true,
      cacheMethod: "none",
      errorHandler: (error) => {
        workerError = error instanceof Error ? error : new Error(String(error));
      }
    });

    try {
      const result = await worker.recognize(image);
      if (workerError) {
        throw workerError;
      }
      return result.data.text ?? "";
    } finally {
      await worker.terminate();
    }
  }
}
