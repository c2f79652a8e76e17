import "dotenv/config";
import "reflect-metadata";
import app from "./app";
import { CONFIG } from "../config/config";
import { container } from "../config/container";
import { TYPES } from "../config/Types";
import type { BlockClock } from "../domain/ledger/core/LedgerClock";
import { ledgerEvents, ALL_LEDGER_EVENT_TYPES } from "../domain/ledger/core/events";
import { logger, LogCategory } from "../infrastructure/utils/logger";

/**
 * Main server entry point.
 *
 * Starts the block clock, mirrors every ledger event into the log and serves
 * the HTTP API.
 *
 * @module application
 */

const clock = container.get<BlockClock>(TYPES.BlockClock);

clock.onBlock((height) => logger.setBlock(height));
clock.start(CONFIG.BLOCK_INTERVAL_MS);

for (const eventType of ALL_LEDGER_EVENT_TYPES) {
  ledgerEvents.on(eventType, (payload: unknown) => {
    logger.debug(`Event ${eventType}`, LogCategory.LEDGER, payload);
  });
}

const server = app.listen(CONFIG.PORT, () => {
  logger.info(
    `Ledger server running on http://localhost:${CONFIG.PORT} (administrator: ${CONFIG.LEDGER.administrator})`,
    LogCategory.HTTP,
  );
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`, LogCategory.GENERAL);
  clock.stop();
  server.close(() => {
    logger
      .flush()
      .catch((error: unknown) => {
        console.error(
          "Failed to flush logs:",
          error instanceof Error ? error.message : String(error),
        );
      })
      .finally(() => {
        logger.destroy();
        process.exit(0);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
