import { describe, it, expect } from "vitest";
import { createLedgerContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import { BlockClock, type LedgerClock } from "../../src/domain/ledger/core/LedgerClock";
import type { LedgerState } from "../../src/domain/types/ledger";
import {
  AllocationRequestEngine,
  ControlPlane,
  ResourcePoolRegistry,
} from "../../src/domain/ledger/systems";

describe("createLedgerContainer", () => {
  it("debe crear el estado con la configuración indicada", () => {
    const container = createLedgerContainer({
      config: { administrator: "ops", requestExpirationBlocks: 6 },
    });
    const state = container.get<LedgerState>(TYPES.LedgerState);

    expect(state.system.administrator).toBe("ops");
    expect(state.system.requestExpirationBlocks).toBe(6);
  });

  it("debe resolver LedgerClock al BlockClock enlazado", () => {
    const clock = new BlockClock(30);
    const container = createLedgerContainer({ clock });

    expect(container.get<LedgerClock>(TYPES.LedgerClock)).toBe(clock);
    expect(container.get<LedgerClock>(TYPES.LedgerClock).now()).toBe(30);
  });

  it("debe compartir singletons y estado entre sistemas", () => {
    const container = createLedgerContainer({ config: { administrator: "ops" } });
    const registry = container.get<ResourcePoolRegistry>(TYPES.ResourcePoolRegistry);
    const engine = container.get<AllocationRequestEngine>(TYPES.AllocationRequestEngine);

    expect(container.get<ControlPlane>(TYPES.ControlPlane)).toBe(
      container.get<ControlPlane>(TYPES.ControlPlane),
    );

    registry.register("ops", {
      resourceTypeId: 4,
      name: "gpu-hours",
      totalSupply: 10,
      unitPrice: 3,
      minAllocation: 1,
      maxAllocation: 10,
      priorityFloor: 1,
    });
    expect(engine.submit("alice", { resourceTypeId: 4, amount: 2, purpose: "" })).toBe(1);
  });

  it("debe aislar el estado entre contenedores", () => {
    const first = createLedgerContainer();
    const second = createLedgerContainer();

    expect(first.get<LedgerState>(TYPES.LedgerState)).not.toBe(
      second.get<LedgerState>(TYPES.LedgerState),
    );
  });
});
