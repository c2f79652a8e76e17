/**
 * Application configuration loaded from environment variables.
 *
 * The server entry loads `.env` through dotenv before this module is read.
 *
 * @module config
 */

/**
 * Ledger parameters consumed by the domain systems.
 */
export interface LedgerConfig {
  /** Identity fixed as administrator when the ledger is constructed */
  administrator: string;
  /** Default per-operation amount cap, until changed by update-parameters */
  globalCap: number;
  /** Blocks a request stays approvable after submission */
  requestExpirationBlocks: number;
  /** Entries kept in each resource's price history */
  priceHistoryCapacity: number;
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  administrator: "admin",
  globalCap: 1_000_000_000,
  requestExpirationBlocks: 144,
  priceHistoryCapacity: 10,
};

/**
 * Application configuration object.
 *
 * @property PORT - HTTP server port (default: 8080)
 * @property ALLOWED_ORIGINS - CORS origins, comma separated; all when unset
 * @property BLOCK_INTERVAL_MS - wall-clock duration of one logical block
 * @property LEDGER - ledger parameters
 */
export const CONFIG = {
  PORT: readPositiveInt(process.env.PORT, 8080),
  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS?.split(",") ?? "*",
  BLOCK_INTERVAL_MS: readPositiveInt(process.env.BLOCK_INTERVAL_MS, 600_000),
  LEDGER: {
    administrator: process.env.LEDGER_ADMIN || DEFAULT_LEDGER_CONFIG.administrator,
    globalCap: readPositiveInt(
      process.env.GLOBAL_CAP,
      DEFAULT_LEDGER_CONFIG.globalCap,
    ),
    requestExpirationBlocks: readPositiveInt(
      process.env.REQUEST_EXPIRATION_BLOCKS,
      DEFAULT_LEDGER_CONFIG.requestExpirationBlocks,
    ),
    priceHistoryCapacity: readPositiveInt(
      process.env.PRICE_HISTORY_CAPACITY,
      DEFAULT_LEDGER_CONFIG.priceHistoryCapacity,
    ),
  } satisfies LedgerConfig,
};

export { readPositiveInt };
