import type { LedgerState } from "../../types/ledger";
import { DEFAULT_LEDGER_CONFIG, type LedgerConfig } from "../../../config/config";

/**
 * Creates an empty ledger owned by `config.administrator`.
 */
export function createInitialLedgerState(
  config: Partial<LedgerConfig> = {},
): LedgerState {
  const { administrator, globalCap, requestExpirationBlocks, priceHistoryCapacity } =
    { ...DEFAULT_LEDGER_CONFIG, ...config };

  return {
    system: {
      administrator,
      initialized: false,
      totalRequests: 0,
      paused: false,
      maintenance: false,
      globalCap,
      emergencyContact: administrator,
      requestExpirationBlocks,
      priceHistoryCapacity,
    },
    resourceTypes: new Map(),
    requests: new Map(),
    balances: new Map(),
    roles: new Map(),
    blacklist: new Set(),
    priceHistory: new Map(),
  };
}
