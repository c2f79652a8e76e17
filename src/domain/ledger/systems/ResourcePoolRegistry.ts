import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type {
  ActorId,
  LedgerState,
  RegisterResourceInput,
  ResourceTypeId,
  ResourceTypeRecord,
} from "../../types/ledger";
import type { LedgerClock } from "../core/LedgerClock";
import { BoundedHistory } from "../core/BoundedHistory";
import { AccessResolver } from "./AccessResolver";
import { ControlPlane } from "./ControlPlane";
import { AllocationErrors } from "../errors/AllocationError";
import { ledgerEvents, LedgerEventType } from "../core/events";
import {
  MAX_PRIORITY_TIER,
  MIN_PRIORITY_TIER,
  PriorityTier,
} from "../../../shared/constants/LedgerEnums";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";

const PRIORITY_TIERS: readonly PriorityTier[] = [
  PriorityTier.USER,
  PriorityTier.VERIFIED,
  PriorityTier.BUSINESS,
  PriorityTier.PREMIUM,
  PriorityTier.ADMIN,
];

function toPriorityTier(value: number): PriorityTier | undefined {
  if (value < MIN_PRIORITY_TIER || value > MAX_PRIORITY_TIER) return undefined;
  return PRIORITY_TIERS.find((tier) => tier === value);
}

/**
 * Owns resource-type records and their price history.
 *
 * Administrative operations register, reprice and lock pools. The allocation
 * engine and the balance ledger move quantity through `debitAvailable` and
 * `creditAvailable`.
 */
@injectable()
export class ResourcePoolRegistry {
  constructor(
    @inject(TYPES.LedgerState) private readonly state: LedgerState,
    @inject(TYPES.AccessResolver) private readonly access: AccessResolver,
    @inject(TYPES.ControlPlane) private readonly control: ControlPlane,
    @inject(TYPES.LedgerClock) private readonly clock: LedgerClock,
  ) {}

  /**
   * Creates or overwrites a resource type. Availability resets to the full
   * supply and the lock is cleared; price history is left as it was.
   */
  public register(caller: ActorId, input: RegisterResourceInput): ResourceTypeRecord {
    this.access.assertAdministrator(caller, "register-resource");

    const { resourceTypeId, name, totalSupply, unitPrice, minAllocation, maxAllocation } =
      input;
    if (!Number.isSafeInteger(resourceTypeId) || resourceTypeId < 0) {
      throw AllocationErrors.invalidResourceTypeId(resourceTypeId);
    }
    this.control.assertValidAmount(totalSupply);
    this.control.assertValidAmount(unitPrice);
    if (!Number.isSafeInteger(minAllocation) || minAllocation < 0) {
      throw AllocationErrors.invalidAmount(minAllocation, "minimum allocation must be a non-negative integer");
    }
    if (!Number.isSafeInteger(maxAllocation) || maxAllocation < minAllocation) {
      throw AllocationErrors.invalidAmount(
        maxAllocation,
        `maximum allocation must be an integer of at least ${minAllocation}`,
      );
    }
    const priorityFloor = toPriorityTier(input.priorityFloor);
    if (priorityFloor === undefined) {
      throw AllocationErrors.invalidPriority(input.priorityFloor);
    }

    const now = this.clock.now();
    const record: ResourceTypeRecord = {
      id: resourceTypeId,
      name,
      totalSupply,
      availableQuantity: totalSupply,
      unitPrice,
      locked: false,
      priorityFloor,
      minAllocation,
      maxAllocation,
      lastPriceUpdate: now,
      registeredAt: now,
    };
    const replaced = this.state.resourceTypes.has(resourceTypeId);
    this.state.resourceTypes.set(resourceTypeId, record);

    logger.info(
      `${replaced ? "Re-registered" : "Registered"} resource type ${resourceTypeId} (${name})`,
      LogCategory.POOL,
      { totalSupply, unitPrice, priorityFloor },
    );
    ledgerEvents.emit(LedgerEventType.RESOURCE_REGISTERED, { ...record, replaced });
    return { ...record };
  }

  /**
   * Overwrites the unit price and records it at the front of the price
   * history. The price set at registration is not recorded.
   */
  public updatePrice(
    caller: ActorId,
    resourceTypeId: ResourceTypeId,
    unitPrice: number,
  ): ResourceTypeRecord {
    this.access.assertAdministrator(caller, "update-price");
    const record = this.requireResourceType(resourceTypeId);
    this.control.assertValidAmount(unitPrice);

    const history = this.getHistory(resourceTypeId).withEntry(unitPrice);
    const previousPrice = record.unitPrice;

    this.state.priceHistory.set(resourceTypeId, history);
    record.unitPrice = unitPrice;
    record.lastPriceUpdate = this.clock.now();

    logger.info(
      `Price of resource type ${resourceTypeId}: ${previousPrice} -> ${unitPrice}`,
      LogCategory.POOL,
    );
    ledgerEvents.emit(LedgerEventType.RESOURCE_PRICE_UPDATED, {
      resourceTypeId,
      previousPrice,
      unitPrice,
    });
    return { ...record };
  }

  public lock(caller: ActorId, resourceTypeId: ResourceTypeId): ResourceTypeRecord {
    return this.setLocked(caller, resourceTypeId, true);
  }

  public unlock(caller: ActorId, resourceTypeId: ResourceTypeId): ResourceTypeRecord {
    return this.setLocked(caller, resourceTypeId, false);
  }

  private setLocked(
    caller: ActorId,
    resourceTypeId: ResourceTypeId,
    locked: boolean,
  ): ResourceTypeRecord {
    this.access.assertAdministrator(caller, locked ? "lock-resource" : "unlock-resource");
    const record = this.requireResourceType(resourceTypeId);
    record.locked = locked;

    logger.info(
      `Resource type ${resourceTypeId} ${locked ? "locked" : "unlocked"}`,
      LogCategory.POOL,
    );
    ledgerEvents.emit(
      locked ? LedgerEventType.RESOURCE_LOCKED : LedgerEventType.RESOURCE_UNLOCKED,
      { resourceTypeId },
    );
    return { ...record };
  }

  public getResourceType(resourceTypeId: ResourceTypeId): ResourceTypeRecord | undefined {
    const record = this.state.resourceTypes.get(resourceTypeId);
    return record ? { ...record } : undefined;
  }

  public listResourceTypes(): ResourceTypeRecord[] {
    return Array.from(this.state.resourceTypes.values(), (record) => ({ ...record }))
      .sort((a, b) => a.id - b.id);
  }

  /**
   * Prices set by `updatePrice`, most recent first.
   */
  public getPriceHistory(resourceTypeId: ResourceTypeId): number[] {
    return this.state.priceHistory.get(resourceTypeId)?.toArray() ?? [];
  }

  /**
   * Live record for callers inside the same operation.
   */
  public requireResourceType(resourceTypeId: ResourceTypeId): ResourceTypeRecord {
    const record = this.state.resourceTypes.get(resourceTypeId);
    if (!record) {
      throw AllocationErrors.resourceNotFound(resourceTypeId);
    }
    return record;
  }

  /**
   * Only the allocation engine calls this, after checking `amount` against
   * the live record in the same operation.
   */
  public debitAvailable(resourceTypeId: ResourceTypeId, amount: number): void {
    const record = this.requireResourceType(resourceTypeId);
    record.availableQuantity -= amount;
  }

  /**
   * Adds returned units back to the pool. Availability may never pass the
   * total supply.
   */
  public creditAvailable(resourceTypeId: ResourceTypeId, amount: number): void {
    const record = this.requireResourceType(resourceTypeId);
    const headroom = record.totalSupply - record.availableQuantity;
    if (amount > headroom) {
      throw AllocationErrors.limitExceeded(amount, headroom);
    }
    record.availableQuantity += amount;
  }

  private getHistory(resourceTypeId: ResourceTypeId): BoundedHistory<number> {
    return (
      this.state.priceHistory.get(resourceTypeId) ??
      new BoundedHistory<number>(this.state.system.priceHistoryCapacity)
    );
  }
}
