import pino from "pino";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createOcrEngine } from "./services/ocr/createOcrEngine.js";

const logger = pino({ level: env.LOG_LEVEL });
const engine = await createOcrEngine(env, logger);
const app = createApp(engine, {
  corsOrigin: env.CORS_ORIGIN,
  maxUploadBytes: env.MAX_UPLOAD_MB * 1024 * 1024,
  logger: logger.child({ module: "http" })
});

app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, ocrEngine: engine.activeEngine, engineState: engine.engineState }, "Label OCR API listening");
});
