import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type {
  ActorId,
  BalanceEntry,
  LedgerState,
  ResourceTypeId,
  ReturnAllocationInput,
  TransferInput,
} from "../../types/ledger";
import { AccessResolver } from "./AccessResolver";
import { ControlPlane } from "./ControlPlane";
import { ResourcePoolRegistry } from "./ResourcePoolRegistry";
import { AllocationErrors } from "../errors/AllocationError";
import { ledgerEvents, LedgerEventType } from "../core/events";
import { logger, LogCategory, LogLevel } from "../../../infrastructure/utils/logger";

/**
 * Allocated units held by each actor, kept per resource type so a transfer or
 * return always knows which pool the units came from.
 */
@injectable()
export class BalanceLedger {
  constructor(
    @inject(TYPES.LedgerState) private readonly state: LedgerState,
    @inject(TYPES.AccessResolver) private readonly access: AccessResolver,
    @inject(TYPES.ControlPlane) private readonly control: ControlPlane,
    @inject(TYPES.ResourcePoolRegistry)
    private readonly registry: ResourcePoolRegistry,
  ) {}

  public getBalance(actor: ActorId, resourceTypeId: ResourceTypeId): number {
    return this.state.balances.get(actor)?.get(resourceTypeId) ?? 0;
  }

  public getBalances(actor: ActorId): BalanceEntry[] {
    const byType = this.state.balances.get(actor);
    if (!byType) return [];
    return Array.from(byType, ([resourceTypeId, amount]) => ({ resourceTypeId, amount }))
      .sort((a, b) => a.resourceTypeId - b.resourceTypeId);
  }

  public getTotalBalance(actor: ActorId): number {
    let total = 0;
    for (const amount of this.state.balances.get(actor)?.values() ?? []) {
      total += amount;
    }
    return total;
  }

  /**
   * Sum of every actor's balance for one resource type.
   */
  public getOutstanding(resourceTypeId: ResourceTypeId): number {
    let total = 0;
    for (const byType of this.state.balances.values()) {
      total += byType.get(resourceTypeId) ?? 0;
    }
    return total;
  }

  public credit(actor: ActorId, resourceTypeId: ResourceTypeId, amount: number): void {
    let byType = this.state.balances.get(actor);
    if (!byType) {
      byType = new Map();
      this.state.balances.set(actor, byType);
    }
    byType.set(resourceTypeId, (byType.get(resourceTypeId) ?? 0) + amount);
  }

  public debit(actor: ActorId, resourceTypeId: ResourceTypeId, amount: number): void {
    const current = this.getBalance(actor, resourceTypeId);
    if (amount > current) {
      throw AllocationErrors.insufficientBalance(amount, current);
    }

    const byType = this.state.balances.get(actor);
    if (!byType) return;
    const remaining = current - amount;
    if (remaining === 0) {
      byType.delete(resourceTypeId);
      if (byType.size === 0) this.state.balances.delete(actor);
    } else {
      byType.set(resourceTypeId, remaining);
    }
  }

  /**
   * Moves allocated units of one resource type from the caller to `to`.
   */
  public transfer(caller: ActorId, input: TransferInput): void {
    const { to, resourceTypeId, amount } = input;

    this.control.assertNotPaused();
    this.control.assertValidAmount(amount);
    if (!this.access.isEligible(caller)) {
      throw AllocationErrors.unauthorized("Sender is not eligible", { caller });
    }
    if (to === caller) {
      throw AllocationErrors.invalidDestination(to, "sender and recipient are the same actor");
    }
    if (!this.access.isEligible(to)) {
      throw AllocationErrors.invalidDestination(to, "recipient is not eligible");
    }
    const record = this.registry.requireResourceType(resourceTypeId);
    if (record.locked) {
      throw AllocationErrors.resourceLocked(resourceTypeId);
    }
    const senderBalance = this.getBalance(caller, resourceTypeId);
    if (amount > senderBalance) {
      throw AllocationErrors.insufficientBalance(amount, senderBalance);
    }

    this.debit(caller, resourceTypeId, amount);
    this.credit(to, resourceTypeId, amount);

    logger.actorLog(
      LogLevel.INFO,
      LogCategory.BALANCES,
      caller,
      `transferred ${amount} of type ${resourceTypeId} to ${to}`,
    );
    ledgerEvents.emit(LedgerEventType.BALANCE_TRANSFERRED, {
      from: caller,
      to,
      resourceTypeId,
      amount,
    });
  }

  /**
   * Gives allocated units back to their pool.
   */
  public returnAllocated(caller: ActorId, input: ReturnAllocationInput): void {
    const { resourceTypeId, amount } = input;

    this.control.assertValidAmount(amount);
    this.registry.requireResourceType(resourceTypeId);
    const balance = this.getBalance(caller, resourceTypeId);
    if (amount > balance) {
      throw AllocationErrors.insufficientBalance(amount, balance);
    }

    this.registry.creditAvailable(resourceTypeId, amount);
    this.debit(caller, resourceTypeId, amount);

    logger.actorLog(
      LogLevel.INFO,
      LogCategory.BALANCES,
      caller,
      `returned ${amount} of type ${resourceTypeId}`,
    );
    ledgerEvents.emit(LedgerEventType.ALLOCATION_RETURNED, {
      actor: caller,
      resourceTypeId,
      amount,
    });
  }
}
