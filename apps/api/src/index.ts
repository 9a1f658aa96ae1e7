import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createReportGenerator } from "./services/reportGenerator.js";
import { createReportPipeline } from "./services/reportPipeline.js";

// Load `apps/api/.env` regardless of where the process is started from (repo root vs apps/api).
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const apiRoot = path.resolve(__dirname, "..");
dotenv.config({ path: path.join(apiRoot, ".env") });
dotenv.config(); // fallback to cwd `.env` if present

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const generator = createReportGenerator(config.generator, logger);
const pipeline = createReportPipeline({ config, generator, logger });
const app = createApp({ config, pipeline, logger });

app.listen(config.port, () => {
  logger.info({ port: config.port, provider: generator.provider, locale: config.report.locale }, "api listening");
});
