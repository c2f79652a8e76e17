import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type {
  ActorId,
  AllocationRequest,
  BlockHeight,
  LedgerState,
  RequestFilter,
  RequestId,
  SubmitRequestInput,
} from "../../types/ledger";
import type { LedgerClock } from "../core/LedgerClock";
import { AccessResolver } from "./AccessResolver";
import { ControlPlane } from "./ControlPlane";
import { ResourcePoolRegistry } from "./ResourcePoolRegistry";
import { BalanceLedger } from "./BalanceLedger";
import { AllocationErrors } from "../errors/AllocationError";
import { ledgerEvents, LedgerEventType } from "../core/events";
import { RequestStatus } from "../../../shared/constants/LedgerEnums";
import { logger, LogCategory, LogLevel } from "../../../infrastructure/utils/logger";

/**
 * A stored-PENDING request is expired once the clock has moved past its
 * expiration height.
 */
export function isExpired(request: AllocationRequest, now: BlockHeight): boolean {
  return request.status === RequestStatus.PENDING && now > request.expiresAt;
}

/**
 * Status as observed at `now`, with lazy expiry applied.
 */
export function effectiveStatus(
  request: AllocationRequest,
  now: BlockHeight,
): RequestStatus {
  return isExpired(request, now) ? RequestStatus.EXPIRED : request.status;
}

/**
 * Request lifecycle: submit -> PENDING -> APPROVED | REJECTED | EXPIRED.
 *
 * Submission only validates against the pool. Approval is the single step
 * that debits the pool and credits the requester, after every guard passed.
 */
@injectable()
export class AllocationRequestEngine {
  constructor(
    @inject(TYPES.LedgerState) private readonly state: LedgerState,
    @inject(TYPES.AccessResolver) private readonly access: AccessResolver,
    @inject(TYPES.ControlPlane) private readonly control: ControlPlane,
    @inject(TYPES.ResourcePoolRegistry)
    private readonly registry: ResourcePoolRegistry,
    @inject(TYPES.BalanceLedger) private readonly balances: BalanceLedger,
    @inject(TYPES.LedgerClock) private readonly clock: LedgerClock,
  ) {}

  /**
   * @returns the new request id
   */
  public submit(caller: ActorId, input: SubmitRequestInput): RequestId {
    const { resourceTypeId, amount, purpose } = input;

    this.control.assertSubmissionOpen();
    if (!this.access.isEligible(caller)) {
      throw AllocationErrors.unauthorized("Requester is not eligible", { caller });
    }
    this.control.assertValidAmount(amount);
    const record = this.registry.requireResourceType(resourceTypeId);
    if (record.locked) {
      throw AllocationErrors.resourceLocked(resourceTypeId);
    }
    const tier = this.access.resolveTier(caller);
    if (tier < record.priorityFloor) {
      throw AllocationErrors.unauthorized(
        `Tier ${tier} is below the priority floor ${record.priorityFloor}`,
        { caller, resourceTypeId },
      );
    }
    if (amount < record.minAllocation) {
      throw AllocationErrors.invalidAmount(
        amount,
        `below minimum allocation ${record.minAllocation}`,
      );
    }
    if (amount > record.maxAllocation) {
      throw AllocationErrors.limitExceeded(amount, record.maxAllocation);
    }
    if (amount > record.availableQuantity) {
      throw AllocationErrors.insufficientBalance(amount, record.availableQuantity);
    }

    const now = this.clock.now();
    const id = this.state.system.totalRequests + 1;
    const request: AllocationRequest = {
      id,
      requester: caller,
      resourceTypeId,
      amount,
      status: RequestStatus.PENDING,
      prioritySnapshot: tier,
      submittedAt: now,
      expiresAt: now + this.state.system.requestExpirationBlocks,
      purpose,
    };
    this.state.requests.set(id, request);
    this.state.system.totalRequests = id;

    logger.actorLog(
      LogLevel.INFO,
      LogCategory.REQUESTS,
      caller,
      `submitted request ${id} for ${amount} of type ${resourceTypeId}`,
    );
    ledgerEvents.emit(LedgerEventType.REQUEST_SUBMITTED, { ...request });
    return id;
  }

  /**
   * Debits the pool, credits the requester and marks the request APPROVED.
   */
  public approve(caller: ActorId, requestId: RequestId): AllocationRequest {
    this.access.assertAdministrator(caller, "approve");
    const request = this.requirePending(requestId);
    const record = this.registry.requireResourceType(request.resourceTypeId);
    if (request.amount > record.availableQuantity) {
      throw AllocationErrors.insufficientBalance(request.amount, record.availableQuantity);
    }

    this.registry.debitAvailable(request.resourceTypeId, request.amount);
    this.balances.credit(request.requester, request.resourceTypeId, request.amount);
    this.resolve(request, RequestStatus.APPROVED, caller);

    logger.info(
      `Request ${requestId} approved: ${request.amount} of type ${request.resourceTypeId} to ${request.requester}`,
      LogCategory.REQUESTS,
    );
    ledgerEvents.emit(LedgerEventType.REQUEST_APPROVED, { ...request });
    return { ...request };
  }

  /**
   * Marks the request REJECTED. The pool was never debited, so nothing moves.
   */
  public reject(caller: ActorId, requestId: RequestId): AllocationRequest {
    this.access.assertAdministrator(caller, "reject");
    const request = this.requirePending(requestId);
    this.resolve(request, RequestStatus.REJECTED, caller);

    logger.info(`Request ${requestId} rejected`, LogCategory.REQUESTS);
    ledgerEvents.emit(LedgerEventType.REQUEST_REJECTED, { ...request });
    return { ...request };
  }

  /**
   * Writes EXPIRED onto every stored-PENDING request whose window has passed.
   * Reads already report these as expired; this only makes it explicit.
   *
   * @returns number of requests marked
   */
  public expireStaleRequests(caller: ActorId): number {
    this.access.assertAdministrator(caller, "expire-stale-requests");
    const now = this.clock.now();
    const expired: RequestId[] = [];

    for (const request of this.state.requests.values()) {
      if (isExpired(request, now)) {
        request.status = RequestStatus.EXPIRED;
        request.resolvedAt = now;
        expired.push(request.id);
      }
    }

    if (expired.length > 0) {
      logger.info(`Marked ${expired.length} request(s) expired`, LogCategory.REQUESTS);
      ledgerEvents.emit(LedgerEventType.REQUESTS_EXPIRED, { requestIds: expired });
    }
    return expired.length;
  }

  public isExpired(request: AllocationRequest): boolean {
    return isExpired(request, this.clock.now());
  }

  /**
   * Request as observed now, with lazy expiry applied to its status.
   */
  public getRequest(requestId: RequestId): AllocationRequest | undefined {
    const request = this.state.requests.get(requestId);
    return request ? this.view(request) : undefined;
  }

  public listRequests(filter: RequestFilter = {}): AllocationRequest[] {
    return Array.from(this.state.requests.values(), (request) => this.view(request))
      .filter(
        (request) =>
          (filter.requester === undefined || request.requester === filter.requester) &&
          (filter.status === undefined || request.status === filter.status) &&
          (filter.resourceTypeId === undefined ||
            request.resourceTypeId === filter.resourceTypeId),
      )
      .sort((a, b) => a.id - b.id);
  }

  public getTotalRequests(): number {
    return this.state.system.totalRequests;
  }

  private view(request: AllocationRequest): AllocationRequest {
    return { ...request, status: effectiveStatus(request, this.clock.now()) };
  }

  private requirePending(requestId: RequestId): AllocationRequest {
    const request = this.state.requests.get(requestId);
    if (request?.status === RequestStatus.EXPIRED) {
      throw AllocationErrors.expiredRequest(requestId, request.expiresAt);
    }
    if (!request || request.status !== RequestStatus.PENDING) {
      throw AllocationErrors.unauthorized(`Request ${requestId} is not pending`, {
        requestId,
        status: request?.status,
      });
    }
    if (isExpired(request, this.clock.now())) {
      throw AllocationErrors.expiredRequest(requestId, request.expiresAt);
    }
    return request;
  }

  private resolve(request: AllocationRequest, status: RequestStatus, by: ActorId): void {
    request.status = status;
    request.resolvedAt = this.clock.now();
    request.resolvedBy = by;
  }
}
