import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { ActorId, ActorProfile, LedgerState } from "../../types/ledger";
import { PriorityTier, RoleLabel } from "../../../shared/constants/LedgerEnums";
import { AllocationErrors } from "../errors/AllocationError";
import { ledgerEvents, LedgerEventType } from "../core/events";
import { logger, LogCategory, LogLevel } from "../../../infrastructure/utils/logger";

const ROLE_TIERS: Record<RoleLabel, PriorityTier> = {
  [RoleLabel.ADMIN]: PriorityTier.ADMIN,
  [RoleLabel.PREMIUM]: PriorityTier.PREMIUM,
  [RoleLabel.BUSINESS]: PriorityTier.BUSINESS,
  [RoleLabel.VERIFIED]: PriorityTier.VERIFIED,
  [RoleLabel.USER]: PriorityTier.USER,
};

/**
 * Maps actors to priority tiers and eligibility. Reads are pure lookups over
 * the role and blacklist relations; only the administrator writes them.
 */
@injectable()
export class AccessResolver {
  constructor(@inject(TYPES.LedgerState) private readonly state: LedgerState) {}

  public getRole(actor: ActorId): RoleLabel {
    return this.state.roles.get(actor) ?? RoleLabel.USER;
  }

  public resolveTier(actor: ActorId): PriorityTier {
    return ROLE_TIERS[this.getRole(actor)];
  }

  public isBlacklisted(actor: ActorId): boolean {
    return this.state.blacklist.has(actor);
  }

  /**
   * True iff the actor is not blacklisted. Tier sufficiency is checked by
   * each caller against its own floor.
   */
  public isEligible(actor: ActorId): boolean {
    return !this.isBlacklisted(actor);
  }

  public isAdministrator(actor: ActorId): boolean {
    return actor === this.state.system.administrator;
  }

  public assertAdministrator(caller: ActorId, operation: string): void {
    if (!this.isAdministrator(caller)) {
      throw AllocationErrors.unauthorized(
        `${operation} requires the administrator`,
        { caller },
      );
    }
  }

  public getActorProfile(actor: ActorId): ActorProfile {
    return {
      actor,
      role: this.getRole(actor),
      tier: this.resolveTier(actor),
      eligible: this.isEligible(actor),
      administrator: this.isAdministrator(actor),
    };
  }

  public setRole(caller: ActorId, actor: ActorId, role: RoleLabel): void {
    this.assertAdministrator(caller, "set-role");

    if (role === RoleLabel.USER) {
      this.state.roles.delete(actor);
    } else {
      this.state.roles.set(actor, role);
    }

    logger.actorLog(LogLevel.INFO, LogCategory.ACCESS, actor, `role set to ${role}`);
    ledgerEvents.emit(LedgerEventType.ROLE_ASSIGNED, { actor, role });
  }

  public setBlacklisted(caller: ActorId, actor: ActorId, blacklisted: boolean): void {
    this.assertAdministrator(caller, "set-blacklisted");

    if (blacklisted) {
      this.state.blacklist.add(actor);
    } else {
      this.state.blacklist.delete(actor);
    }

    logger.actorLog(
      LogLevel.INFO,
      LogCategory.ACCESS,
      actor,
      blacklisted ? "blacklisted" : "removed from blacklist",
    );
    ledgerEvents.emit(LedgerEventType.BLACKLIST_UPDATED, { actor, blacklisted });
  }
}
