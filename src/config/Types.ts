/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  LedgerState: Symbol.for("LedgerState"),
  BlockClock: Symbol.for("BlockClock"),
  LedgerClock: Symbol.for("LedgerClock"),

  AccessResolver: Symbol.for("AccessResolver"),
  ControlPlane: Symbol.for("ControlPlane"),
  ResourcePoolRegistry: Symbol.for("ResourcePoolRegistry"),
  BalanceLedger: Symbol.for("BalanceLedger"),
  AllocationRequestEngine: Symbol.for("AllocationRequestEngine"),

  LedgerCommandProcessor: Symbol.for("LedgerCommandProcessor"),
  LedgerController: Symbol.for("LedgerController"),
};
