import { LedgerCommandType } from "../../../../shared/constants/CommandEnums";
import { RoleLabel } from "../../../../shared/constants/LedgerEnums";
import type {
  LedgerCommand,
  ParsedLedgerCommand,
} from "../../../../shared/types/commands/LedgerCommand";

export const COMMAND_LIMITS = {
  MAX_NAME_LENGTH: 64,
  MAX_PURPOSE_LENGTH: 256,
  MAX_ACTOR_LENGTH: 128,
} as const;

const COMMAND_TYPES: readonly LedgerCommandType[] = Object.values(LedgerCommandType);
const ROLE_LABELS: readonly RoleLabel[] = Object.values(RoleLabel);

class CommandParseError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(body: Record<string, unknown>, key: string): number {
  const value = body[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new CommandParseError(`${key} must be a finite number`);
  }
  return value;
}

function readId(body: Record<string, unknown>, key: string): number {
  const value = readNumber(body, key);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new CommandParseError(`${key} must be a non-negative integer`);
  }
  return value;
}

function readString(
  body: Record<string, unknown>,
  key: string,
  maxLength: number,
  allowEmpty = false,
): string {
  const value = body[key];
  if (typeof value !== "string") {
    throw new CommandParseError(`${key} must be a string`);
  }
  if (!allowEmpty && value.trim().length === 0) {
    throw new CommandParseError(`${key} must not be empty`);
  }
  if (value.length > maxLength) {
    throw new CommandParseError(`${key} exceeds ${maxLength} characters`);
  }
  return value;
}

function readActor(body: Record<string, unknown>, key: string): string {
  return readString(body, key, COMMAND_LIMITS.MAX_ACTOR_LENGTH);
}

function readBoolean(body: Record<string, unknown>, key: string): boolean {
  const value = body[key];
  if (typeof value !== "boolean") {
    throw new CommandParseError(`${key} must be a boolean`);
  }
  return value;
}

function readRole(body: Record<string, unknown>): RoleLabel {
  const role = ROLE_LABELS.find((label) => label === body.role);
  if (!role) {
    throw new CommandParseError(`role must be one of ${ROLE_LABELS.join(", ")}`);
  }
  return role;
}

function toCommand(type: LedgerCommandType, body: Record<string, unknown>): LedgerCommand {
  switch (type) {
    case LedgerCommandType.INITIALIZE:
    case LedgerCommandType.ENTER_MAINTENANCE:
    case LedgerCommandType.EXIT_MAINTENANCE:
    case LedgerCommandType.PAUSE:
    case LedgerCommandType.UNPAUSE:
    case LedgerCommandType.EXPIRE_STALE_REQUESTS:
      return { type };
    case LedgerCommandType.UPDATE_PARAMETERS:
      return {
        type,
        globalCap: readNumber(body, "globalCap"),
        emergencyContact: readActor(body, "emergencyContact"),
      };
    case LedgerCommandType.SET_ROLE:
      return { type, actor: readActor(body, "actor"), role: readRole(body) };
    case LedgerCommandType.SET_BLACKLISTED:
      return {
        type,
        actor: readActor(body, "actor"),
        blacklisted: readBoolean(body, "blacklisted"),
      };
    case LedgerCommandType.REGISTER_RESOURCE:
      return {
        type,
        resourceTypeId: readId(body, "resourceTypeId"),
        name: readString(body, "name", COMMAND_LIMITS.MAX_NAME_LENGTH),
        totalSupply: readNumber(body, "totalSupply"),
        unitPrice: readNumber(body, "unitPrice"),
        minAllocation: readNumber(body, "minAllocation"),
        maxAllocation: readNumber(body, "maxAllocation"),
        priorityFloor: readNumber(body, "priorityFloor"),
      };
    case LedgerCommandType.UPDATE_PRICE:
      return {
        type,
        resourceTypeId: readId(body, "resourceTypeId"),
        unitPrice: readNumber(body, "unitPrice"),
      };
    case LedgerCommandType.LOCK_RESOURCE:
    case LedgerCommandType.UNLOCK_RESOURCE:
      return { type, resourceTypeId: readId(body, "resourceTypeId") };
    case LedgerCommandType.SUBMIT_REQUEST:
      return {
        type,
        resourceTypeId: readId(body, "resourceTypeId"),
        amount: readNumber(body, "amount"),
        purpose: readString(body, "purpose", COMMAND_LIMITS.MAX_PURPOSE_LENGTH, true),
      };
    case LedgerCommandType.APPROVE_REQUEST:
    case LedgerCommandType.REJECT_REQUEST:
      return { type, requestId: readId(body, "requestId") };
    case LedgerCommandType.TRANSFER:
      return {
        type,
        to: readActor(body, "to"),
        resourceTypeId: readId(body, "resourceTypeId"),
        amount: readNumber(body, "amount"),
      };
    case LedgerCommandType.RETURN_ALLOCATION:
      return {
        type,
        resourceTypeId: readId(body, "resourceTypeId"),
        amount: readNumber(body, "amount"),
      };
  }
}

/**
 * Turns an untrusted request body into a typed command. Checks shapes and
 * text bounds only; ledger rules are enforced by the systems.
 */
export function parseLedgerCommand(body: unknown): ParsedLedgerCommand {
  if (!isRecord(body)) {
    return { valid: false, reason: "Command must be a JSON object" };
  }
  const type = COMMAND_TYPES.find((candidate) => candidate === body.type);
  if (!type) {
    return { valid: false, reason: `Unknown command type: ${String(body.type)}` };
  }

  try {
    return { valid: true, command: toCommand(type, body) };
  } catch (error) {
    if (error instanceof CommandParseError) {
      return { valid: false, reason: error.message };
    }
    throw error;
  }
}
