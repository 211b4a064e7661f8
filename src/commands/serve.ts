import { Server } from "http";
import { Settings } from "../config/settings";
import { Logger } from "../logging/logger";
import { ContextOverrides, createScraperContext } from "../scrape/context";
import { createApp } from "../server/app";

export interface ServeOptions {
  port?: number;
  host?: string;
}

export async function runServe(
  options: ServeOptions,
  settings: Settings,
  logger: Logger,
  overrides: ContextOverrides = {}
): Promise<Server> {
  const context = await createScraperContext(settings, logger, overrides);
  const app = createApp({
    source: context.source,
    logger,
    demoMode: settings.demoMode,
    outputDir: settings.outputDir
  });

  const port = options.port ?? settings.port;
  const host = options.host ?? settings.host;
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`Listening on http://${host}:${port}`, { demo_mode: settings.demoMode });
      resolve(server);
    });
    server.on("error", reject);
  });
}
