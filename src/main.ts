import dotenv from "dotenv";
import { createApp } from "./app";
import { ConfigError, loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createPipeline } from "./pipeline";

dotenv.config();

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
    console.error("Please create a .env file (see .env.example)");
    process.exit(1);
  }
  throw error;
}

const pipeline = createPipeline(config);
const app = createApp(pipeline, { corsOrigins: config.corsOrigins });

const server = app.listen(config.port, () => {
  console.log(`🚀 Coverage Compass API running on http://localhost:${config.port}`);
  console.log(`📊 Health check: http://localhost:${config.port}/api/health`);
  console.log(`🧠 Scoring with ${pipeline.modelVersion}`);
});

function shutdown(signal: string) {
  console.log(`${signal} received, closing store`);
  server.close(() => {
    pipeline.store.close()
      .then(() => process.exit(0))
      .catch(err => {
        console.error('Failed to close store:', err);
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
