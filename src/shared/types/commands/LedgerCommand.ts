import type { LedgerCommandType } from "../../constants/CommandEnums";
import type { RoleLabel } from "../../constants/LedgerEnums";
import type {
  ActorId,
  RegisterResourceInput,
  RequestId,
  ResourceTypeId,
  ReturnAllocationInput,
  SubmitRequestInput,
  TransferInput,
} from "../../../domain/types/ledger";
import type { AllocationErrorCode } from "../../../domain/ledger/errors/AllocationError";

export type LedgerCommand =
  | { type: LedgerCommandType.INITIALIZE }
  | {
      type: LedgerCommandType.UPDATE_PARAMETERS;
      globalCap: number;
      emergencyContact: ActorId;
    }
  | { type: LedgerCommandType.ENTER_MAINTENANCE }
  | { type: LedgerCommandType.EXIT_MAINTENANCE }
  | { type: LedgerCommandType.PAUSE }
  | { type: LedgerCommandType.UNPAUSE }
  | { type: LedgerCommandType.SET_ROLE; actor: ActorId; role: RoleLabel }
  | { type: LedgerCommandType.SET_BLACKLISTED; actor: ActorId; blacklisted: boolean }
  | ({ type: LedgerCommandType.REGISTER_RESOURCE } & RegisterResourceInput)
  | {
      type: LedgerCommandType.UPDATE_PRICE;
      resourceTypeId: ResourceTypeId;
      unitPrice: number;
    }
  | { type: LedgerCommandType.LOCK_RESOURCE; resourceTypeId: ResourceTypeId }
  | { type: LedgerCommandType.UNLOCK_RESOURCE; resourceTypeId: ResourceTypeId }
  | ({ type: LedgerCommandType.SUBMIT_REQUEST } & SubmitRequestInput)
  | { type: LedgerCommandType.APPROVE_REQUEST; requestId: RequestId }
  | { type: LedgerCommandType.REJECT_REQUEST; requestId: RequestId }
  | { type: LedgerCommandType.EXPIRE_STALE_REQUESTS }
  | ({ type: LedgerCommandType.TRANSFER } & TransferInput)
  | ({ type: LedgerCommandType.RETURN_ALLOCATION } & ReturnAllocationInput);

export interface LedgerCommandFailure {
  code: AllocationErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type LedgerCommandResult =
  | { ok: true; type: LedgerCommandType; result: unknown }
  | { ok: false; type: LedgerCommandType; error: LedgerCommandFailure };

/**
 * Outcome of parsing an untrusted command body.
 */
export type ParsedLedgerCommand =
  | { valid: true; command: LedgerCommand }
  | { valid: false; reason: string };
