/**
 * Error kinds surfaced by ledger operations. A thrown AllocationError means
 * the operation changed nothing.
 */
export enum AllocationErrorCode {
  UNAUTHORIZED_ACCESS = "UNAUTHORIZED_ACCESS",
  INVALID_RESOURCE_AMOUNT = "INVALID_RESOURCE_AMOUNT",
  INSUFFICIENT_RESOURCE_BALANCE = "INSUFFICIENT_RESOURCE_BALANCE",
  RESOURCE_TYPE_NOT_FOUND = "RESOURCE_TYPE_NOT_FOUND",
  ALREADY_INITIALIZED = "ALREADY_INITIALIZED",
  INVALID_TRANSFER_DESTINATION = "INVALID_TRANSFER_DESTINATION",
  RESOURCE_LIMIT_EXCEEDED = "RESOURCE_LIMIT_EXCEEDED",
  INVALID_PRIORITY_LEVEL = "INVALID_PRIORITY_LEVEL",
  RESOURCE_LOCKED = "RESOURCE_LOCKED",
  EXPIRED_REQUEST = "EXPIRED_REQUEST",
}

export class AllocationError extends Error {
  readonly code: AllocationErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: AllocationErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AllocationError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, AllocationError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isAllocationError(error: unknown): error is AllocationError {
  return error instanceof AllocationError;
}

export const AllocationErrors = {
  unauthorized(reason: string, details?: Record<string, unknown>) {
    return new AllocationError(
      AllocationErrorCode.UNAUTHORIZED_ACCESS,
      reason,
      details,
    );
  },

  invalidAmount(amount: number, reason: string) {
    return new AllocationError(
      AllocationErrorCode.INVALID_RESOURCE_AMOUNT,
      `Invalid amount ${amount}: ${reason}`,
      { amount },
    );
  },

  invalidResourceTypeId(resourceTypeId: number) {
    return new AllocationError(
      AllocationErrorCode.INVALID_RESOURCE_AMOUNT,
      `Invalid resource type id ${resourceTypeId}: must be a non-negative integer`,
      { resourceTypeId },
    );
  },

  insufficientBalance(requested: number, available: number) {
    return new AllocationError(
      AllocationErrorCode.INSUFFICIENT_RESOURCE_BALANCE,
      `Requested ${requested} but only ${available} available`,
      { requested, available },
    );
  },

  resourceNotFound(resourceTypeId: number) {
    return new AllocationError(
      AllocationErrorCode.RESOURCE_TYPE_NOT_FOUND,
      `Resource type ${resourceTypeId} not found`,
      { resourceTypeId },
    );
  },

  alreadyInitialized() {
    return new AllocationError(
      AllocationErrorCode.ALREADY_INITIALIZED,
      "Ledger already initialized",
    );
  },

  invalidDestination(to: string, reason: string) {
    return new AllocationError(
      AllocationErrorCode.INVALID_TRANSFER_DESTINATION,
      `Cannot transfer to ${to}: ${reason}`,
      { to },
    );
  },

  limitExceeded(amount: number, limit: number) {
    return new AllocationError(
      AllocationErrorCode.RESOURCE_LIMIT_EXCEEDED,
      `Amount ${amount} exceeds limit ${limit}`,
      { amount, limit },
    );
  },

  invalidPriority(priority: number) {
    return new AllocationError(
      AllocationErrorCode.INVALID_PRIORITY_LEVEL,
      `Priority floor ${priority} outside 1-5`,
      { priority },
    );
  },

  resourceLocked(resourceTypeId: number) {
    return new AllocationError(
      AllocationErrorCode.RESOURCE_LOCKED,
      `Resource type ${resourceTypeId} is locked`,
      { resourceTypeId },
    );
  },

  expiredRequest(requestId: number, expiresAt: number) {
    return new AllocationError(
      AllocationErrorCode.EXPIRED_REQUEST,
      `Request ${requestId} expired at block ${expiresAt}`,
      { requestId, expiresAt },
    );
  },
};
