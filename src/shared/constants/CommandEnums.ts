/**
 * Operation names accepted by the ledger command processor.
 *
 * @module shared/constants/CommandEnums
 */
export enum LedgerCommandType {
  INITIALIZE = "INITIALIZE",
  UPDATE_PARAMETERS = "UPDATE_PARAMETERS",
  ENTER_MAINTENANCE = "ENTER_MAINTENANCE",
  EXIT_MAINTENANCE = "EXIT_MAINTENANCE",
  PAUSE = "PAUSE",
  UNPAUSE = "UNPAUSE",

  SET_ROLE = "SET_ROLE",
  SET_BLACKLISTED = "SET_BLACKLISTED",

  REGISTER_RESOURCE = "REGISTER_RESOURCE",
  UPDATE_PRICE = "UPDATE_PRICE",
  LOCK_RESOURCE = "LOCK_RESOURCE",
  UNLOCK_RESOURCE = "UNLOCK_RESOURCE",

  SUBMIT_REQUEST = "SUBMIT_REQUEST",
  APPROVE_REQUEST = "APPROVE_REQUEST",
  REJECT_REQUEST = "REJECT_REQUEST",
  EXPIRE_STALE_REQUESTS = "EXPIRE_STALE_REQUESTS",

  TRANSFER = "TRANSFER",
  RETURN_ALLOCATION = "RETURN_ALLOCATION",
}
