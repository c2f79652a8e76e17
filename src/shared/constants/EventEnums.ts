/**
 * Ledger event names emitted after every successful mutation.
 *
 * @module shared/constants/EventEnums
 */
export enum LedgerEventType {
  SYSTEM_INITIALIZED = "system:initialized",
  PARAMETERS_UPDATED = "system:parameters_updated",
  MAINTENANCE_ENTERED = "system:maintenance_entered",
  MAINTENANCE_EXITED = "system:maintenance_exited",
  SYSTEM_PAUSED = "system:paused",
  SYSTEM_UNPAUSED = "system:unpaused",

  ROLE_ASSIGNED = "access:role_assigned",
  BLACKLIST_UPDATED = "access:blacklist_updated",

  RESOURCE_REGISTERED = "pool:resource_registered",
  RESOURCE_PRICE_UPDATED = "pool:price_updated",
  RESOURCE_LOCKED = "pool:resource_locked",
  RESOURCE_UNLOCKED = "pool:resource_unlocked",

  REQUEST_SUBMITTED = "request:submitted",
  REQUEST_APPROVED = "request:approved",
  REQUEST_REJECTED = "request:rejected",
  REQUESTS_EXPIRED = "request:expired",

  BALANCE_TRANSFERRED = "balance:transferred",
  ALLOCATION_RETURNED = "balance:returned",
}

export const ALL_LEDGER_EVENT_TYPES: readonly LedgerEventType[] =
  Object.values(LedgerEventType);
