import { EventEmitter } from 'events';
import Database from 'better-sqlite3';
import type { LedgerClient, RawEvent } from './chain/ledger';
import { getCheckpoint, setCheckpoint } from './db/schema';
import { errorMessage } from './errors';
import type { EventListener, HandleResult } from './handlers/listener';
import { chunk, delay } from './utils';

/** Most getBlockTimestamp calls in flight at once, per listener */
export const BLOCK_TIME_CONCURRENCY = 20;

export interface PollerConfig {
  /** Blocks per range */
  batchSize: number;
  pollIntervalMs: number;
  /** Checkpoint to use when none is persisted yet */
  startBlock: number;
}

export interface RangeResult {
  fromBlock: number;
  toBlock: number;
  /** Events seen per listener name */
  events: Record<string, number>;
  /** Events that changed the store */
  applied: number;
}

/**
 * Walks the chain forward in bounded block ranges, hands each range's logs
 * to the listeners and persists the checkpoint once every listener has
 * written its range.
 *
 * Events: 'range' (RangeResult), 'idle' (height), 'error' (Error), 'stopped'.
 */
export class ChainPoller extends EventEmitter {
  private readonly config: PollerConfig;
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly db: Database.Database,
    private readonly ledger: LedgerClient,
    private readonly eventListeners: EventListener[],
    config: PollerConfig,
  ) {
    super();
    if (config.batchSize < 1) {
      throw new RangeError(`batchSize must be at least 1, got ${config.batchSize}`);
    }
    this.config = config;
  }

  /** Last processed block, falling back to the configured start block. */
  get checkpoint(): number {
    return getCheckpoint(this.db) ?? this.config.startBlock;
  }

  /**
   * Process the next range. Returns null when already at the chain head.
   * Rejects (leaving the checkpoint untouched) if any listener fails.
   */
  async runOnce(): Promise<RangeResult | null> {
    const height = await this.ledger.currentHeight();
    const checkpoint = this.checkpoint;
    if (checkpoint >= height) return null;

    const fromBlock = checkpoint + 1;
    const toBlock = Math.min(checkpoint + this.config.batchSize, height);

    const settled = await Promise.allSettled(
      this.eventListeners.map((listener) => this.processListener(listener, fromBlock, toBlock)),
    );

    const result: RangeResult = { fromBlock, toBlock, events: {}, applied: 0 };
    for (let i = 0; i < settled.length; i++) {
      const outcome = settled[i];
      if (outcome.status === 'rejected') {
        throw outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      }
      result.events[this.eventListeners[i].name] = outcome.value.seen;
      result.applied += outcome.value.applied;
    }

    setCheckpoint(this.db, toBlock);
    return result;
  }

  private async processListener(
    listener: EventListener,
    fromBlock: number,
    toBlock: number,
  ): Promise<{ seen: number; applied: number }> {
    const batches = await Promise.all(
      listener.events.map((event) => this.ledger.getLogs(listener.address, event, fromBlock, toBlock)),
    );
    const events = batches.flat().sort(compareLogPosition);
    if (events.length === 0) return { seen: 0, applied: 0 };

    const blockTimes = await this.resolveBlockTimes(events);

    let applied = 0;
    for (const event of events) {
      const blockTime = blockTimes.get(event.blockNumber) ?? 0;
      const outcome: HandleResult = listener.handle(event, blockTime);
      if (outcome === 'applied') applied++;
    }
    return { seen: events.length, applied };
  }

  private async resolveBlockTimes(events: RawEvent[]): Promise<Map<number, number>> {
    const blocks = [...new Set(events.map((e) => e.blockNumber))];
    const times = new Map<number, number>();
    for (const group of chunk(blocks, BLOCK_TIME_CONCURRENCY)) {
      const resolved = await Promise.all(group.map((n) => this.ledger.getBlockTimestamp(n)));
      group.forEach((n, i) => times.set(n, resolved[i]));
    }
    return times;
  }

  /**
   * Poll until the signal aborts. A failed range is logged and retried on
   * the next iteration. Abort takes effect between ranges.
   */
  async run(signal: AbortSignal): Promise<void> {
    console.log(
      `[indexer] Polling from block ${this.checkpoint + 1} (${this.config.batchSize} blocks per range, idle ${this.config.pollIntervalMs}ms)`,
    );

    while (!signal.aborted) {
      try {
        const result = await this.runOnce();
        if (result) {
          const counts = Object.entries(result.events)
            .map(([name, n]) => `${name}=${n}`)
            .join(' ');
          console.log(`[indexer] Blocks ${result.fromBlock}-${result.toBlock}: ${counts}, ${result.applied} applied`);
          this.emit('range', result);
          continue;
        }
        this.emit('idle', this.checkpoint);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        console.error(`[indexer] Range failed, retrying: ${errorMessage(error)}`);
        if (this.listenerCount('error') > 0) this.emit('error', error);
      }
      await delay(this.config.pollIntervalMs, signal);
    }

    console.log(`[indexer] Stopped at block ${this.checkpoint}`);
    this.emit('stopped');
  }

  /** Start polling in the background. Resolves once stopped. */
  start(): Promise<void> {
    if (this.running) return this.running;
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal).finally(() => {
      this.running = null;
      this.controller = null;
    });
    return this.running;
  }

  stop(): void {
    this.controller?.abort();
  }

  isRunning(): boolean {
    return this.running !== null;
  }
}

function compareLogPosition(a: RawEvent, b: RawEvent): number {
  return a.blockNumber - b.blockNumber || a.logIndex - b.logIndex;
}
