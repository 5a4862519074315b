import pino from "pino";
import sharp from "sharp";
import type { ImagePreprocessor } from "../../types/ocr.js";
import { errorMessage } from "./errors.js";

export const MAX_WIDTH = 1600;
export const BINARIZE_STDDEV_CUTOFF = 40;
// 11x11 Gaussian neighbourhood: sigma = 0.3 * ((11 - 1) / 2 - 1) + 0.8
const THRESHOLD_SIGMA = 2;
const THRESHOLD_OFFSET = 2;

export interface GrayImage {
  data: Buffer;
  width: number;
  height: number;
}

export function grayStdDev(pixels: Uint8Array): number {
  if (pixels.length === 0) return 0;
  let sum = 0;
  for (const value of pixels) sum += value;
  const mean = sum / pixels.length;
  let squares = 0;
  for (const value of pixels) squares += (value - mean) ** 2;
  return Math.sqrt(squares / pixels.length);
}

async function decodeGray(input: Buffer): Promise<GrayImage> {
  const metadata = await sharp(input, { failOn: "error" }).metadata();
  const width = metadata.width ?? 0;

  let pipeline = sharp(input, { failOn: "error" }).flatten({ background: "#ffffff" });
  if (width > MAX_WIDTH) {
    pipeline = pipeline.resize({ width: MAX_WIDTH, kernel: sharp.kernel.cubic });
  }

  const { data, info } = await pipeline.grayscale().raw().toBuffer({ resolveWithObject: true });
  if (info.channels === 1) {
    return { data, width: info.width, height: info.height };
  }

  const single = Buffer.alloc(info.width * info.height);
  for (let i = 0; i < single.length; i += 1) single[i] = data[i * info.channels];
  return { data: single, width: info.width, height: info.height };
}

/** Gaussian-weighted neighbourhood mean, one byte per pixel like the input. */
export async function gaussianLocalMean(gray: GrayImage): Promise<Buffer> {
  return sharp(gray.data, { raw: { width: gray.width, height: gray.height, channels: 1 } })
    .blur(THRESHOLD_SIGMA)
    .toColourspace("b-w")
    .raw()
    .toBuffer();
}

async function adaptiveThreshold(gray: GrayImage): Promise<Buffer> {
  const localMean = await gaussianLocalMean(gray);
  const out = Buffer.alloc(gray.data.length);
  for (let i = 0; i < gray.data.length; i += 1) {
    out[i] = gray.data[i] > localMean[i] - THRESHOLD_OFFSET ? 255 : 0;
  }
  return out;
}

/**
 * Resize, grayscale and (for high-contrast photos) binarize, then encode PNG.
 * Output depends only on the input bytes, which the result cache relies on.
 */
export async function preprocessForOcr(input: Buffer): Promise<Buffer> {
  const gray = await decodeGray(input);
  const pixels = grayStdDev(gray.data) > BINARIZE_STDDEV_CUTOFF ? await adaptiveThreshold(gray) : gray.data;

  return sharp(pixels, { raw: { width: gray.width, height: gray.height, channels: 1 } })
    .toColourspace("b-w")
    .png({ compressionLevel: 9 })
    .toBuffer();
}

export class SharpImagePreprocessor implements ImagePreprocessor {
  constructor(private readonly logger: pino.Logger = pino({ name: "image-preprocessor" })) {}

  async preprocess(raw: Buffer): Promise<Buffer> {
    try {
      return await preprocessForOcr(raw);
    } catch (error) {
      this.logger.debug({ err: errorMessage(error), bytes: raw.length }, "Preprocessing skipped; sending original bytes");
      return raw;
    }
  }
}
