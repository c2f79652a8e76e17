import { injectable, unmanaged } from "inversify";
import type { BlockHeight } from "../../types/ledger";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";

/**
 * Monotonic logical clock supplied by the host.
 */
export interface LedgerClock {
  now(): BlockHeight;
}

/**
 * Block-height clock. Advances one block per `advance()` call, or on a timer
 * once `start()` has been called.
 */
@injectable()
export class BlockClock implements LedgerClock {
  private height: BlockHeight;
  private timer?: NodeJS.Timeout;
  private readonly listeners = new Set<(height: BlockHeight) => void>();

  constructor(@unmanaged() startHeight: BlockHeight = 0) {
    if (!Number.isSafeInteger(startHeight) || startHeight < 0) {
      throw new RangeError(`Invalid start height ${startHeight}`);
    }
    this.height = startHeight;
  }

  public now(): BlockHeight {
    return this.height;
  }

  public advance(blocks = 1): BlockHeight {
    if (!Number.isSafeInteger(blocks) || blocks < 1) {
      throw new RangeError(`Clock can only move forward, got ${blocks}`);
    }
    this.height += blocks;
    for (const listener of this.listeners) {
      listener(this.height);
    }
    return this.height;
  }

  public onBlock(listener: (height: BlockHeight) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.advance(), intervalMs);
    this.timer.unref();
    logger.info(
      `Block clock started at height ${this.height} (${intervalMs}ms per block)`,
      LogCategory.CLOCK,
    );
  }

  public stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  public isRunning(): boolean {
    return this.timer !== undefined;
  }
}
