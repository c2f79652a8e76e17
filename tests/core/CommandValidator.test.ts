import { describe, it, expect } from "vitest";
import {
  COMMAND_LIMITS,
  parseLedgerCommand,
} from "../../src/domain/ledger/core/runner/CommandValidator";
import { LedgerCommandType } from "../../src/shared/constants/CommandEnums";
import { RoleLabel } from "../../src/shared/constants/LedgerEnums";

describe("parseLedgerCommand", () => {
  it("debe rechazar cuerpos que no son objetos", () => {
    expect(parseLedgerCommand(null)).toEqual({
      valid: false,
      reason: "Command must be a JSON object",
    });
    expect(parseLedgerCommand([1, 2])).toEqual({
      valid: false,
      reason: "Command must be a JSON object",
    });
  });

  it("debe rechazar tipos desconocidos", () => {
    expect(parseLedgerCommand({ type: "MINT" })).toEqual({
      valid: false,
      reason: "Unknown command type: MINT",
    });
  });

  it("debe aceptar comandos sin payload", () => {
    expect(parseLedgerCommand({ type: "PAUSE", extra: true })).toEqual({
      valid: true,
      command: { type: LedgerCommandType.PAUSE },
    });
  });

  it("debe construir un SUBMIT_REQUEST tipado", () => {
    const parsed = parseLedgerCommand({
      type: "SUBMIT_REQUEST",
      resourceTypeId: 1,
      amount: 30,
      purpose: "batch job",
    });

    expect(parsed).toEqual({
      valid: true,
      command: {
        type: LedgerCommandType.SUBMIT_REQUEST,
        resourceTypeId: 1,
        amount: 30,
        purpose: "batch job",
      },
    });
  });

  it("debe permitir un propósito vacío", () => {
    const parsed = parseLedgerCommand({
      type: "SUBMIT_REQUEST",
      resourceTypeId: 1,
      amount: 1,
      purpose: "",
    });

    expect(parsed.valid).toBe(true);
  });

  it("debe exigir números en los campos numéricos", () => {
    expect(
      parseLedgerCommand({ type: "APPROVE_REQUEST", requestId: "1" }),
    ).toEqual({ valid: false, reason: "requestId must be a finite number" });
  });

  it("debe exigir identificadores enteros no negativos", () => {
    expect(
      parseLedgerCommand({ type: "LOCK_RESOURCE", resourceTypeId: 1.5 }),
    ).toEqual({ valid: false, reason: "resourceTypeId must be a non-negative integer" });
    expect(
      parseLedgerCommand({ type: "REJECT_REQUEST", requestId: -7 }),
    ).toEqual({ valid: false, reason: "requestId must be a non-negative integer" });
    expect(parseLedgerCommand({ type: "APPROVE_REQUEST", requestId: 0 })).toEqual({
      valid: true,
      command: { type: LedgerCommandType.APPROVE_REQUEST, requestId: 0 },
    });
  });

  it("debe aplicar el límite de longitud del nombre", () => {
    const parsed = parseLedgerCommand({
      type: "REGISTER_RESOURCE",
      resourceTypeId: 1,
      name: "x".repeat(COMMAND_LIMITS.MAX_NAME_LENGTH + 1),
      totalSupply: 100,
      unitPrice: 10,
      minAllocation: 1,
      maxAllocation: 50,
      priorityFloor: 1,
    });

    expect(parsed).toEqual({ valid: false, reason: "name exceeds 64 characters" });
  });

  it("debe aplicar el límite de longitud del propósito", () => {
    const parsed = parseLedgerCommand({
      type: "SUBMIT_REQUEST",
      resourceTypeId: 1,
      amount: 1,
      purpose: "p".repeat(257),
    });

    expect(parsed).toEqual({ valid: false, reason: "purpose exceeds 256 characters" });
  });

  it("debe validar el rol contra la enumeración", () => {
    expect(
      parseLedgerCommand({ type: "SET_ROLE", actor: "alice", role: "PREMIUM" }),
    ).toEqual({
      valid: true,
      command: { type: LedgerCommandType.SET_ROLE, actor: "alice", role: RoleLabel.PREMIUM },
    });
    expect(
      parseLedgerCommand({ type: "SET_ROLE", actor: "alice", role: "superuser" }),
    ).toEqual({
      valid: false,
      reason: "role must be one of USER, VERIFIED, BUSINESS, PREMIUM, ADMIN",
    });
  });

  it("debe rechazar destinatarios vacíos", () => {
    expect(
      parseLedgerCommand({ type: "TRANSFER", to: "  ", resourceTypeId: 1, amount: 5 }),
    ).toEqual({ valid: false, reason: "to must not be empty" });
  });

  it("debe exigir un booleano en SET_BLACKLISTED", () => {
    expect(
      parseLedgerCommand({ type: "SET_BLACKLISTED", actor: "mallory", blacklisted: "yes" }),
    ).toEqual({ valid: false, reason: "blacklisted must be a boolean" });
  });
});
