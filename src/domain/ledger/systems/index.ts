export { AccessResolver } from "./AccessResolver";
export { ControlPlane } from "./ControlPlane";
export { ResourcePoolRegistry } from "./ResourcePoolRegistry";
export { BalanceLedger } from "./BalanceLedger";
export {
  AllocationRequestEngine,
  isExpired,
  effectiveStatus,
} from "./AllocationRequestEngine";
