import { describe, it, expect, beforeEach, vi } from "vitest";
import { BatchedEventEmitter } from "../../src/domain/ledger/core/BatchedEventEmitter";
import {
  LedgerEventType,
  type LedgerEventPayloads,
} from "../../src/domain/ledger/core/events";
import { PriorityTier, RequestStatus } from "../../src/shared/constants/LedgerEnums";
import type { AllocationRequest } from "../../src/domain/types/ledger";

const pendingRequest: AllocationRequest = {
  id: 1,
  requester: "alice",
  resourceTypeId: 1,
  amount: 5,
  status: RequestStatus.PENDING,
  prioritySnapshot: PriorityTier.USER,
  submittedAt: 0,
  expiresAt: 100,
  purpose: "render farm",
};

describe("BatchedEventEmitter", () => {
  let emitter: BatchedEventEmitter<LedgerEventPayloads>;

  beforeEach(() => {
    emitter = new BatchedEventEmitter<LedgerEventPayloads>();
  });

  describe("emit", () => {
    it("debe encolar el evento hasta el flush", () => {
      const listener = vi.fn();
      emitter.on(LedgerEventType.REQUEST_SUBMITTED, listener);

      emitter.emit(LedgerEventType.REQUEST_SUBMITTED, pendingRequest);

      expect(listener).not.toHaveBeenCalled();
      expect(emitter.getQueueSize()).toBe(1);

      emitter.flushEvents();
      expect(listener).toHaveBeenCalledWith(pendingRequest);
      expect(emitter.getQueueSize()).toBe(0);
    });
  });

  describe("flushEvents", () => {
    it("debe entregar los eventos en el orden en que se emitieron", () => {
      const received: string[] = [];
      emitter.on(LedgerEventType.REQUEST_SUBMITTED, (request) =>
        received.push(`submitted ${request.id}`),
      );
      emitter.on(LedgerEventType.REQUEST_APPROVED, (request) =>
        received.push(`approved ${request.id}`),
      );

      emitter.emit(LedgerEventType.REQUEST_SUBMITTED, pendingRequest);
      emitter.emit(LedgerEventType.REQUEST_APPROVED, {
        ...pendingRequest,
        status: RequestStatus.APPROVED,
        resolvedAt: 4,
      });
      emitter.flushEvents();

      expect(received).toEqual(["submitted 1", "approved 1"]);
    });

    it("debe entregar en el mismo flush lo que emite un listener", () => {
      const returned = vi.fn();
      emitter.on(LedgerEventType.RESOURCE_LOCKED, ({ resourceTypeId }) => {
        emitter.emit(LedgerEventType.ALLOCATION_RETURNED, {
          actor: "alice",
          resourceTypeId,
          amount: 5,
        });
      });
      emitter.on(LedgerEventType.ALLOCATION_RETURNED, returned);

      emitter.emit(LedgerEventType.RESOURCE_LOCKED, { resourceTypeId: 3 });
      emitter.flushEvents();

      expect(returned).toHaveBeenCalledWith({ actor: "alice", resourceTypeId: 3, amount: 5 });
      expect(emitter.getQueueSize()).toBe(0);
    });

    it("no debe hacer nada con la cola vacía", () => {
      const listener = vi.fn();
      emitter.on(LedgerEventType.SYSTEM_PAUSED, listener);

      emitter.flushEvents();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("clearQueue", () => {
    it("debe descartar los eventos sin entregarlos", () => {
      const listener = vi.fn();
      emitter.on(LedgerEventType.RESOURCE_UNLOCKED, listener);
      emitter.emit(LedgerEventType.RESOURCE_UNLOCKED, { resourceTypeId: 3 });

      emitter.clearQueue();
      emitter.flushEvents();

      expect(emitter.getQueueSize()).toBe(0);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("listeners", () => {
    it("debe dejar de notificar tras off", () => {
      const listener = vi.fn();
      emitter.on(LedgerEventType.SYSTEM_UNPAUSED, listener);
      emitter.off(LedgerEventType.SYSTEM_UNPAUSED, listener);

      emitter.emit(LedgerEventType.SYSTEM_UNPAUSED, {});
      emitter.flushEvents();

      expect(listener).not.toHaveBeenCalled();
      expect(emitter.listenerCount(LedgerEventType.SYSTEM_UNPAUSED)).toBe(0);
    });

    it("debe quitar los listeners de un solo evento", () => {
      emitter.on(LedgerEventType.SYSTEM_PAUSED, vi.fn());
      emitter.on(LedgerEventType.SYSTEM_UNPAUSED, vi.fn());

      emitter.removeAllListeners(LedgerEventType.SYSTEM_PAUSED);

      expect(emitter.listenerCount(LedgerEventType.SYSTEM_PAUSED)).toBe(0);
      expect(emitter.listenerCount(LedgerEventType.SYSTEM_UNPAUSED)).toBe(1);
    });
  });
});
