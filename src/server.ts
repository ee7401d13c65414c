import "dotenv/config";
import { createApp } from "./app";
import { loadWorkerConfig } from "./config/WorkerConfig";
import { loadToolDirectory } from "./tools/ToolLoader";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadWorkerConfig();
  const { app, worker } = createApp(config);
  for (const dir of config.toolDirs) await loadToolDirectory(worker.catalog, dir);

  app.listen(config.port, config.host, () => {
    logger.info(
      { host: config.host, port: config.port, basePath: worker.basePath, tools: worker.catalog.size },
      "toolhost worker is running"
    );
  });
}

main().catch(err => {
  logger.fatal({ err }, "toolhost worker failed to start");
  process.exit(1);
});
