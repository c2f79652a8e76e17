import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  ADMIN,
  createTestLedger,
  registerTestResource,
  snapshotLedger,
  type TestLedger,
} from "../setup";
import { AllocationErrorCode } from "../../src/domain/ledger/errors/AllocationError";
import { ledgerEvents, LedgerEventType } from "../../src/domain/ledger/core/events";

function allocate(ledger: TestLedger, actor: string, amount: number, resourceTypeId = 1): void {
  const id = ledger.engine.submit(actor, { resourceTypeId, amount, purpose: "" });
  ledger.engine.approve(ADMIN, id);
}

describe("BalanceLedger", () => {
  let ledger: TestLedger;

  beforeEach(() => {
    ledger = createTestLedger();
    registerTestResource(ledger);
    allocate(ledger, "alice", 30);
  });

  describe("transfer", () => {
    it("debe mover saldo entre actores del mismo tipo", () => {
      ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 12 });

      expect(ledger.balances.getBalance("alice", 1)).toBe(18);
      expect(ledger.balances.getBalance("bob", 1)).toBe(12);
      expect(ledger.registry.getResourceType(1)?.availableQuantity).toBe(70);
    });

    it("debe eliminar la entrada cuando el saldo llega a cero", () => {
      ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 30 });

      expect(ledger.state.balances.has("alice")).toBe(false);
      expect(ledger.balances.getBalances("alice")).toEqual([]);
    });

    it("debe fallar si supera el saldo sin cambiar nada", () => {
      const before = snapshotLedger(ledger.state);

      expect(() =>
        ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 31 }),
      ).toThrow(
        expect.objectContaining({ code: AllocationErrorCode.INSUFFICIENT_RESOURCE_BALANCE }),
      );
      expect(snapshotLedger(ledger.state)).toEqual(before);
    });

    it("debe rechazar destinatarios en la lista negra", () => {
      ledger.access.setBlacklisted(ADMIN, "mallory", true);

      expect(() =>
        ledger.balances.transfer("alice", { to: "mallory", resourceTypeId: 1, amount: 5 }),
      ).toThrow(
        expect.objectContaining({ code: AllocationErrorCode.INVALID_TRANSFER_DESTINATION }),
      );
      expect(ledger.balances.getBalance("alice", 1)).toBe(30);
    });

    it("debe rechazar transferencias a uno mismo", () => {
      expect(() =>
        ledger.balances.transfer("alice", { to: "alice", resourceTypeId: 1, amount: 5 }),
      ).toThrow("Cannot transfer to alice: sender and recipient are the same actor");
    });

    it("debe rechazar remitentes en la lista negra", () => {
      ledger.access.setBlacklisted(ADMIN, "alice", true);

      expect(() =>
        ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 5 }),
      ).toThrow(expect.objectContaining({ code: AllocationErrorCode.UNAUTHORIZED_ACCESS }));
    });

    it("debe fallar en pausa", () => {
      ledger.control.pause(ADMIN);

      expect(() =>
        ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 5 }),
      ).toThrow("Ledger is paused");
    });

    it("debe fallar con un recurso bloqueado", () => {
      ledger.registry.lock(ADMIN, 1);

      expect(() =>
        ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 5 }),
      ).toThrow(expect.objectContaining({ code: AllocationErrorCode.RESOURCE_LOCKED }));
    });

    it("debe rechazar montos no positivos", () => {
      expect(() =>
        ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 0 }),
      ).toThrow(expect.objectContaining({ code: AllocationErrorCode.INVALID_RESOURCE_AMOUNT }));
    });

    it("no debe mezclar saldos de distintos tipos", () => {
      registerTestResource(ledger, { resourceTypeId: 2, name: "storage-gb" });

      expect(() =>
        ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 2, amount: 5 }),
      ).toThrow("Requested 5 but only 0 available");
    });

    it("debe emitir el evento de transferencia", () => {
      const listener = vi.fn();
      ledgerEvents.on(LedgerEventType.BALANCE_TRANSFERRED, listener);

      ledger.balances.transfer("alice", { to: "bob", resourceTypeId: 1, amount: 4 });
      ledgerEvents.flushEvents();

      expect(listener).toHaveBeenCalledWith({
        from: "alice",
        to: "bob",
        resourceTypeId: 1,
        amount: 4,
      });
    });
  });

  describe("returnAllocated", () => {
    it("debe devolver unidades al pool", () => {
      ledger.balances.returnAllocated("alice", { resourceTypeId: 1, amount: 10 });

      expect(ledger.balances.getBalance("alice", 1)).toBe(20);
      expect(ledger.registry.getResourceType(1)?.availableQuantity).toBe(80);
    });

    it("debe funcionar en pausa", () => {
      ledger.control.pause(ADMIN);
      ledger.balances.returnAllocated("alice", { resourceTypeId: 1, amount: 30 });

      expect(ledger.registry.getResourceType(1)?.availableQuantity).toBe(100);
    });

    it("debe fallar si supera el saldo", () => {
      const before = snapshotLedger(ledger.state);

      expect(() =>
        ledger.balances.returnAllocated("alice", { resourceTypeId: 1, amount: 40 }),
      ).toThrow(
        expect.objectContaining({ code: AllocationErrorCode.INSUFFICIENT_RESOURCE_BALANCE }),
      );
      expect(snapshotLedger(ledger.state)).toEqual(before);
    });

    it("no debe superar el suministro total tras un re-registro", () => {
      registerTestResource(ledger);
      const before = snapshotLedger(ledger.state);

      expect(() =>
        ledger.balances.returnAllocated("alice", { resourceTypeId: 1, amount: 1 }),
      ).toThrow(expect.objectContaining({ code: AllocationErrorCode.RESOURCE_LIMIT_EXCEEDED }));
      expect(snapshotLedger(ledger.state)).toEqual(before);
    });

    it("debe fallar con un tipo desconocido", () => {
      expect(() =>
        ledger.balances.returnAllocated("alice", { resourceTypeId: 7, amount: 1 }),
      ).toThrow(expect.objectContaining({ code: AllocationErrorCode.RESOURCE_TYPE_NOT_FOUND }));
    });
  });

  describe("consultas", () => {
    it("debe listar saldos por tipo y sumar el total", () => {
      registerTestResource(ledger, { resourceTypeId: 2, name: "storage-gb" });
      allocate(ledger, "alice", 7, 2);

      expect(ledger.balances.getBalances("alice")).toEqual([
        { resourceTypeId: 1, amount: 30 },
        { resourceTypeId: 2, amount: 7 },
      ]);
      expect(ledger.balances.getTotalBalance("alice")).toBe(37);
      expect(ledger.balances.getTotalBalance("nobody")).toBe(0);
    });

    it("debe sumar lo asignado de un tipo entre todos los actores", () => {
      allocate(ledger, "bob", 15);

      expect(ledger.balances.getOutstanding(1)).toBe(45);
    });
  });
});
