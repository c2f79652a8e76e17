import type {
  PriorityTier,
  RequestStatus,
  RoleLabel,
} from "../../shared/constants/LedgerEnums";
import type { BoundedHistory } from "../ledger/core/BoundedHistory";

/** Authenticated identity of the caller of an operation. */
export type ActorId = string;
export type ResourceTypeId = number;
export type RequestId = number;
/** Logical clock value (block height). */
export type BlockHeight = number;

/**
 * A named, priced, capacity-bounded pool of allocatable units.
 */
export interface ResourceTypeRecord {
  id: ResourceTypeId;
  name: string;
  totalSupply: number;
  /** Always within [0, totalSupply] */
  availableQuantity: number;
  unitPrice: number;
  locked: boolean;
  priorityFloor: PriorityTier;
  minAllocation: number;
  maxAllocation: number;
  lastPriceUpdate: BlockHeight;
  registeredAt: BlockHeight;
}

export interface RegisterResourceInput {
  resourceTypeId: ResourceTypeId;
  name: string;
  totalSupply: number;
  unitPrice: number;
  minAllocation: number;
  maxAllocation: number;
  priorityFloor: number;
}

/**
 * A claim against a resource type's available quantity.
 * The pool is only debited when an administrator approves it.
 */
export interface AllocationRequest {
  id: RequestId;
  requester: ActorId;
  resourceTypeId: ResourceTypeId;
  amount: number;
  status: RequestStatus;
  /** Requester's tier at submission time */
  prioritySnapshot: PriorityTier;
  submittedAt: BlockHeight;
  expiresAt: BlockHeight;
  purpose: string;
  resolvedAt?: BlockHeight;
  resolvedBy?: ActorId;
}

export interface SubmitRequestInput {
  resourceTypeId: ResourceTypeId;
  amount: number;
  purpose: string;
}

export interface RequestFilter {
  requester?: ActorId;
  status?: RequestStatus;
  resourceTypeId?: ResourceTypeId;
}

export interface TransferInput {
  to: ActorId;
  resourceTypeId: ResourceTypeId;
  amount: number;
}

export interface ReturnAllocationInput {
  resourceTypeId: ResourceTypeId;
  amount: number;
}

export interface BalanceEntry {
  resourceTypeId: ResourceTypeId;
  amount: number;
}

/**
 * Global switches and counters.
 */
export interface SystemState {
  /** Fixed when the ledger is constructed */
  readonly administrator: ActorId;
  initialized: boolean;
  /** Also the source of the next request id */
  totalRequests: number;
  paused: boolean;
  maintenance: boolean;
  globalCap: number;
  emergencyContact: ActorId;
  requestExpirationBlocks: number;
  priceHistoryCapacity: number;
}

export type SystemStatus = Readonly<SystemState>;

export interface ActorProfile {
  actor: ActorId;
  role: RoleLabel;
  tier: PriorityTier;
  eligible: boolean;
  administrator: boolean;
}

/**
 * Every relation the ledger owns. A single instance is created per ledger
 * and passed by reference to each system.
 */
export interface LedgerState {
  system: SystemState;
  resourceTypes: Map<ResourceTypeId, ResourceTypeRecord>;
  requests: Map<RequestId, AllocationRequest>;
  /** actor -> resource type -> allocated units */
  balances: Map<ActorId, Map<ResourceTypeId, number>>;
  roles: Map<ActorId, RoleLabel>;
  blacklist: Set<ActorId>;
  priceHistory: Map<ResourceTypeId, BoundedHistory<number>>;
}
