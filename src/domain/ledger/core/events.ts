import { BatchedEventEmitter } from "./BatchedEventEmitter";
import {
  LedgerEventType,
  ALL_LEDGER_EVENT_TYPES,
} from "../../../shared/constants/EventEnums";
import type { RoleLabel } from "../../../shared/constants/LedgerEnums";
import type {
  ActorId,
  AllocationRequest,
  RequestId,
  ResourceTypeId,
  ResourceTypeRecord,
  SystemStatus,
} from "../../types/ledger";

type EmptyPayload = Record<string, never>;

interface ResourceRef {
  resourceTypeId: ResourceTypeId;
}

/**
 * Payload carried by each ledger event.
 */
export interface LedgerEventPayloads {
  [LedgerEventType.SYSTEM_INITIALIZED]: SystemStatus;
  [LedgerEventType.PARAMETERS_UPDATED]: { globalCap: number; emergencyContact: ActorId };
  [LedgerEventType.MAINTENANCE_ENTERED]: EmptyPayload;
  [LedgerEventType.MAINTENANCE_EXITED]: EmptyPayload;
  [LedgerEventType.SYSTEM_PAUSED]: EmptyPayload;
  [LedgerEventType.SYSTEM_UNPAUSED]: EmptyPayload;

  [LedgerEventType.ROLE_ASSIGNED]: { actor: ActorId; role: RoleLabel };
  [LedgerEventType.BLACKLIST_UPDATED]: { actor: ActorId; blacklisted: boolean };

  [LedgerEventType.RESOURCE_REGISTERED]: ResourceTypeRecord & { replaced: boolean };
  [LedgerEventType.RESOURCE_PRICE_UPDATED]: ResourceRef & {
    previousPrice: number;
    unitPrice: number;
  };
  [LedgerEventType.RESOURCE_LOCKED]: ResourceRef;
  [LedgerEventType.RESOURCE_UNLOCKED]: ResourceRef;

  [LedgerEventType.REQUEST_SUBMITTED]: AllocationRequest;
  [LedgerEventType.REQUEST_APPROVED]: AllocationRequest;
  [LedgerEventType.REQUEST_REJECTED]: AllocationRequest;
  [LedgerEventType.REQUESTS_EXPIRED]: { requestIds: RequestId[] };

  [LedgerEventType.BALANCE_TRANSFERRED]: ResourceRef & {
    from: ActorId;
    to: ActorId;
    amount: number;
  };
  [LedgerEventType.ALLOCATION_RETURNED]: ResourceRef & { actor: ActorId; amount: number };
}

/**
 * Global emitter for ledger events. Systems emit after their writes; the
 * command processor flushes once per command.
 */
export const ledgerEvents = new BatchedEventEmitter<LedgerEventPayloads>();

export { LedgerEventType, ALL_LEDGER_EVENT_TYPES };
