import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? defaultValue : value.trim().toLowerCase() === "true"));

const secret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(5000),
  LOG_LEVEL: z.string().default("info"),
  CORS_ORIGIN: z.string().default("*"),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(16),

  GEMINI_API_KEY: secret,
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GEMINI_RETRIES: z.coerce.number().int().min(1).default(2),

  GOOGLE_APPLICATION_CREDENTIALS: secret,
  VISION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  VISION_RETRIES: z.coerce.number().int().min(1).default(2),

  OCRSPACE_API_KEY: secret,
  OCRSPACE_ENDPOINT: z.string().default("https://api.ocr.space/parse/image"),
  OCRSPACE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  OCRSPACE_RETRIES: z.coerce.number().int().min(1).default(2),

  OLLAMA_ENABLED: flag(true),
  OLLAMA_ENDPOINT: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_MODEL: z.string().default("glm-ocr:latest"),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  OLLAMA_RETRIES: z.coerce.number().int().min(1).default(3),
  OLLAMA_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5_000),

  CLOUD_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1_000),

  LOCAL_OCR_ENABLED: flag(true),
  LOCAL_OCR_LANG: z.string().default("eng"),

  OCR_PREPROCESS_ENABLED: flag(true),
  OCR_CACHE_SIZE: z.coerce.number().int().min(1).default(128),
  OCR_PDF_WORKERS: z.coerce.number().int().min(1).default(4),
  OCR_PDF_DPI: z.coerce.number().int().min(72).max(300).default(150),
  OCR_PAGE_GRACE_MS: z.coerce.number().int().min(0).default(10_000),
  OCR_PAGE_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
