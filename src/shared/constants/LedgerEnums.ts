/**
 * Ledger enumerations: request lifecycle, role labels and priority tiers.
 *
 * @module shared/constants/LedgerEnums
 */

/**
 * Allocation request status. PENDING is the only non-terminal state.
 */
export enum RequestStatus {
  PENDING = "pending",
  APPROVED = "approved",
  REJECTED = "rejected",
  EXPIRED = "expired",
}

/**
 * Role labels an administrator can assign to an actor.
 * Actors without an assigned label are USER.
 */
export enum RoleLabel {
  USER = "USER",
  VERIFIED = "VERIFIED",
  BUSINESS = "BUSINESS",
  PREMIUM = "PREMIUM",
  ADMIN = "ADMIN",
}

/**
 * Priority tiers, 1 (lowest) to 5 (highest).
 */
export enum PriorityTier {
  USER = 1,
  VERIFIED = 2,
  BUSINESS = 3,
  PREMIUM = 4,
  ADMIN = 5,
}

export const MIN_PRIORITY_TIER = PriorityTier.USER;
export const MAX_PRIORITY_TIER = PriorityTier.ADMIN;
