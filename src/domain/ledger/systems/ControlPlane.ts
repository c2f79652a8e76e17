import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { ActorId, LedgerState, SystemStatus } from "../../types/ledger";
import { AccessResolver } from "./AccessResolver";
import { AllocationErrors } from "../errors/AllocationError";
import { ledgerEvents, LedgerEventType } from "../core/events";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";

/**
 * Global switches consulted as guards by the other systems: initialized,
 * paused, maintenance, the per-operation amount cap and the emergency contact.
 */
@injectable()
export class ControlPlane {
  constructor(
    @inject(TYPES.LedgerState) private readonly state: LedgerState,
    @inject(TYPES.AccessResolver) private readonly access: AccessResolver,
  ) {}

  public getStatus(): SystemStatus {
    return { ...this.state.system };
  }

  /**
   * One-time setup. Clears the pause and maintenance flags and points the
   * emergency contact at the administrator. The request counter goes back to
   * the number of stored requests, which is 0 on a fresh ledger.
   */
  public initialize(caller: ActorId): SystemStatus {
    this.access.assertAdministrator(caller, "initialize");
    const system = this.state.system;
    if (system.initialized) {
      throw AllocationErrors.alreadyInitialized();
    }

    system.initialized = true;
    system.totalRequests = this.state.requests.size;
    system.paused = false;
    system.maintenance = false;
    system.emergencyContact = system.administrator;

    logger.info("Ledger initialized", LogCategory.CONTROL, {
      administrator: system.administrator,
      globalCap: system.globalCap,
    });
    ledgerEvents.emit(LedgerEventType.SYSTEM_INITIALIZED, this.getStatus());
    return this.getStatus();
  }

  public updateParameters(
    caller: ActorId,
    globalCap: number,
    emergencyContact: ActorId,
  ): SystemStatus {
    this.access.assertAdministrator(caller, "update-parameters");
    if (!Number.isSafeInteger(globalCap) || globalCap <= 0) {
      throw AllocationErrors.invalidAmount(globalCap, "global cap must be a positive integer");
    }

    this.state.system.globalCap = globalCap;
    this.state.system.emergencyContact = emergencyContact;

    logger.info("Parameters updated", LogCategory.CONTROL, { globalCap, emergencyContact });
    ledgerEvents.emit(LedgerEventType.PARAMETERS_UPDATED, { globalCap, emergencyContact });
    return this.getStatus();
  }

  /** Maintenance also forces the pause flag on. */
  public enterMaintenance(caller: ActorId): SystemStatus {
    this.access.assertAdministrator(caller, "enter-maintenance");
    this.state.system.maintenance = true;
    this.state.system.paused = true;

    logger.warn("Maintenance mode entered", LogCategory.CONTROL);
    ledgerEvents.emit(LedgerEventType.MAINTENANCE_ENTERED, {});
    return this.getStatus();
  }

  public exitMaintenance(caller: ActorId): SystemStatus {
    this.access.assertAdministrator(caller, "exit-maintenance");
    this.state.system.maintenance = false;
    this.state.system.paused = false;

    logger.info("Maintenance mode exited", LogCategory.CONTROL);
    ledgerEvents.emit(LedgerEventType.MAINTENANCE_EXITED, {});
    return this.getStatus();
  }

  public pause(caller: ActorId): SystemStatus {
    this.access.assertAdministrator(caller, "pause");
    this.state.system.paused = true;

    logger.warn("Ledger paused", LogCategory.CONTROL);
    ledgerEvents.emit(LedgerEventType.SYSTEM_PAUSED, {});
    return this.getStatus();
  }

  public unpause(caller: ActorId): SystemStatus {
    this.access.assertAdministrator(caller, "unpause");
    this.state.system.paused = false;

    logger.info("Ledger unpaused", LogCategory.CONTROL);
    ledgerEvents.emit(LedgerEventType.SYSTEM_UNPAUSED, {});
    return this.getStatus();
  }

  /** Submission is closed while paused or in maintenance. */
  public assertSubmissionOpen(): void {
    const { paused, maintenance } = this.state.system;
    if (paused || maintenance) {
      throw AllocationErrors.unauthorized(
        maintenance ? "Ledger is in maintenance" : "Ledger is paused",
      );
    }
  }

  public assertNotPaused(): void {
    if (this.state.system.paused) {
      throw AllocationErrors.unauthorized("Ledger is paused");
    }
  }

  /**
   * Amounts must be positive integers no larger than the global cap.
   */
  public assertValidAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw AllocationErrors.invalidAmount(amount, "must be a positive integer");
    }
    if (amount > this.state.system.globalCap) {
      throw AllocationErrors.invalidAmount(
        amount,
        `exceeds global cap ${this.state.system.globalCap}`,
      );
    }
  }
}
