import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, type LedgerConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * One ledger per container: the state object is bound as a constant and every
 * system is a singleton sharing it. `LedgerClock` resolves to the bound
 * `BlockClock`.
 *
 * @module config
 */
import type { LedgerState } from "../domain/types/ledger";
import { createInitialLedgerState } from "../domain/ledger/core/defaultState";
import { BlockClock, type LedgerClock } from "../domain/ledger/core/LedgerClock";
import {
  AccessResolver,
  ControlPlane,
  ResourcePoolRegistry,
  BalanceLedger,
  AllocationRequestEngine,
} from "../domain/ledger/systems";
import { LedgerCommandProcessor } from "../domain/ledger/core/runner/LedgerCommandProcessor";
import { LedgerController } from "../infrastructure/controllers/ledgerController";

export interface LedgerContainerOptions {
  config?: Partial<LedgerConfig>;
  clock?: BlockClock;
}

export function createLedgerContainer(
  options: LedgerContainerOptions = {},
): Container {
  const container = new Container();

  const config = { ...CONFIG.LEDGER, ...options.config };
  container
    .bind<LedgerState>(TYPES.LedgerState)
    .toConstantValue(createInitialLedgerState(config));

  container
    .bind<BlockClock>(TYPES.BlockClock)
    .toConstantValue(options.clock ?? new BlockClock());
  container.bind<LedgerClock>(TYPES.LedgerClock).toService(TYPES.BlockClock);

  container
    .bind<AccessResolver>(TYPES.AccessResolver)
    .to(AccessResolver)
    .inSingletonScope();
  container
    .bind<ControlPlane>(TYPES.ControlPlane)
    .to(ControlPlane)
    .inSingletonScope();
  container
    .bind<ResourcePoolRegistry>(TYPES.ResourcePoolRegistry)
    .to(ResourcePoolRegistry)
    .inSingletonScope();
  container
    .bind<BalanceLedger>(TYPES.BalanceLedger)
    .to(BalanceLedger)
    .inSingletonScope();
  container
    .bind<AllocationRequestEngine>(TYPES.AllocationRequestEngine)
    .to(AllocationRequestEngine)
    .inSingletonScope();

  container
    .bind<LedgerCommandProcessor>(TYPES.LedgerCommandProcessor)
    .to(LedgerCommandProcessor)
    .inSingletonScope();
  container
    .bind<LedgerController>(TYPES.LedgerController)
    .to(LedgerController)
    .inSingletonScope();

  return container;
}

export const container = createLedgerContainer();
