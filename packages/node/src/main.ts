// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOG_CONTEXT, createLogger } from "@entity-stream/core";
import { ConfigError, loadConfig } from "./config";
import { createStreamingService } from "./serve";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ minLevel: config.logLevel });

  if (!config.enabled) {
    logger.info(LOG_CONTEXT.SERVER, "Streaming is disabled (ENABLE_STREAMING=false)");
    return;
  }

  const service = createStreamingService(config, { logger });
  await service.listen();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(LOG_CONTEXT.SERVER, `Received ${signal}, shutting down`);
    service.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(LOG_CONTEXT.SERVER, "Shutdown failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("[server] Failed to start:", error);
  }
  process.exit(1);
});
