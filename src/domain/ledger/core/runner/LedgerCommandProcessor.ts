import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import { LedgerCommandType } from "../../../../shared/constants/CommandEnums";
import type {
  LedgerCommand,
  LedgerCommandResult,
} from "../../../../shared/types/commands/LedgerCommand";
import type { ActorId } from "../../../types/ledger";
import { AccessResolver } from "../../systems/AccessResolver";
import { ControlPlane } from "../../systems/ControlPlane";
import { ResourcePoolRegistry } from "../../systems/ResourcePoolRegistry";
import { BalanceLedger } from "../../systems/BalanceLedger";
import { AllocationRequestEngine } from "../../systems/AllocationRequestEngine";
import { isAllocationError } from "../../errors/AllocationError";
import { ledgerEvents } from "../events";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";

/**
 * Single entry point for ledger mutations. Runs one command at a time,
 * flushes the queued events afterwards and reports ledger errors as results.
 */
@injectable()
export class LedgerCommandProcessor {
  constructor(
    @inject(TYPES.AccessResolver) private readonly access: AccessResolver,
    @inject(TYPES.ControlPlane) private readonly control: ControlPlane,
    @inject(TYPES.ResourcePoolRegistry)
    private readonly registry: ResourcePoolRegistry,
    @inject(TYPES.BalanceLedger) private readonly balances: BalanceLedger,
    @inject(TYPES.AllocationRequestEngine)
    private readonly requests: AllocationRequestEngine,
  ) {}

  public execute(caller: ActorId, command: LedgerCommand): LedgerCommandResult {
    logger.startCorrelation("cmd");
    logger.debug(`Processing command ${command.type} from ${caller}`, LogCategory.LEDGER);

    try {
      const result = this.dispatchCommand(caller, command);
      ledgerEvents.flushEvents();
      return { ok: true, type: command.type, result };
    } catch (error) {
      ledgerEvents.clearQueue();
      if (isAllocationError(error)) {
        logger.warn(`Command ${command.type} rejected: ${error.message}`, LogCategory.LEDGER, {
          caller,
          code: error.code,
        });
        return {
          ok: false,
          type: command.type,
          error: { code: error.code, message: error.message, details: error.details },
        };
      }
      logger.error(`Failed to process command ${command.type}`, LogCategory.LEDGER, {
        caller,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      logger.endCorrelation();
    }
  }

  public process(caller: ActorId, commands: LedgerCommand[]): LedgerCommandResult[] {
    if (commands.length > 0) {
      logger.info(`Processing ${commands.length} command(s)`, LogCategory.LEDGER);
    }
    return commands.map((command) => this.execute(caller, command));
  }

  private dispatchCommand(caller: ActorId, command: LedgerCommand): unknown {
    switch (command.type) {
      case LedgerCommandType.INITIALIZE:
        return this.control.initialize(caller);
      case LedgerCommandType.UPDATE_PARAMETERS:
        return this.control.updateParameters(
          caller,
          command.globalCap,
          command.emergencyContact,
        );
      case LedgerCommandType.ENTER_MAINTENANCE:
        return this.control.enterMaintenance(caller);
      case LedgerCommandType.EXIT_MAINTENANCE:
        return this.control.exitMaintenance(caller);
      case LedgerCommandType.PAUSE:
        return this.control.pause(caller);
      case LedgerCommandType.UNPAUSE:
        return this.control.unpause(caller);

      case LedgerCommandType.SET_ROLE:
        this.access.setRole(caller, command.actor, command.role);
        return this.access.getActorProfile(command.actor);
      case LedgerCommandType.SET_BLACKLISTED:
        this.access.setBlacklisted(caller, command.actor, command.blacklisted);
        return this.access.getActorProfile(command.actor);

      case LedgerCommandType.REGISTER_RESOURCE:
        return this.registry.register(caller, {
          resourceTypeId: command.resourceTypeId,
          name: command.name,
          totalSupply: command.totalSupply,
          unitPrice: command.unitPrice,
          minAllocation: command.minAllocation,
          maxAllocation: command.maxAllocation,
          priorityFloor: command.priorityFloor,
        });
      case LedgerCommandType.UPDATE_PRICE:
        return this.registry.updatePrice(caller, command.resourceTypeId, command.unitPrice);
      case LedgerCommandType.LOCK_RESOURCE:
        return this.registry.lock(caller, command.resourceTypeId);
      case LedgerCommandType.UNLOCK_RESOURCE:
        return this.registry.unlock(caller, command.resourceTypeId);

      case LedgerCommandType.SUBMIT_REQUEST: {
        const requestId = this.requests.submit(caller, {
          resourceTypeId: command.resourceTypeId,
          amount: command.amount,
          purpose: command.purpose,
        });
        return { requestId };
      }
      case LedgerCommandType.APPROVE_REQUEST:
        return this.requests.approve(caller, command.requestId);
      case LedgerCommandType.REJECT_REQUEST:
        return this.requests.reject(caller, command.requestId);
      case LedgerCommandType.EXPIRE_STALE_REQUESTS:
        return { expired: this.requests.expireStaleRequests(caller) };

      case LedgerCommandType.TRANSFER:
        this.balances.transfer(caller, {
          to: command.to,
          resourceTypeId: command.resourceTypeId,
          amount: command.amount,
        });
        return { balances: this.balances.getBalances(caller) };
      case LedgerCommandType.RETURN_ALLOCATION:
        this.balances.returnAllocated(caller, {
          resourceTypeId: command.resourceTypeId,
          amount: command.amount,
        });
        return { balances: this.balances.getBalances(caller) };
    }
  }
}
