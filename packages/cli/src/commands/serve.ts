/**
 * Serve command - run the ingestion service in the foreground.
 */

import { loadConfig, type Config } from "@testcast/core";
import { startService } from "@testcast/service";

export interface ServeCommandOptions {
  port?: string;
  host?: string;
}

export async function serveCommand(options: ServeCommandOptions): Promise<void> {
  const config: Config = { ...loadConfig() };
  if (options.port !== undefined) {
    const port = Number.parseInt(options.port, 10);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      console.error(`Invalid port: ${options.port}`);
      process.exit(1);
    }
    config.listenPort = port;
  }
  if (options.host !== undefined) {
    config.host = options.host;
  }

  try {
    await startService({ config });
  } catch (error) {
    console.error("Failed to start service:", error);
    process.exit(1);
  }
}
