import express from "express";
import type { WorkerConfig } from "./config/WorkerConfig";
import { builtinToolkits } from "./tools/toolkits";
import { ExpressWorker } from "./worker/ExpressRouter";

export function createApp(config: WorkerConfig): { app: express.Express; worker: ExpressWorker } {
  const app = express();
  const worker = new ExpressWorker(app, {
    secret: config.secret,
    disableAuth: config.disableAuth,
    catalogRequiresAuth: config.catalogRequiresAuth,
    basePath: config.basePath,
  });
  for (const name of config.toolkits) worker.registerToolkit(builtinToolkits[name]());

  app.use((_req, res) => {
    res.status(404).json({ error: "not found" });
  });
  return { app, worker };
}
