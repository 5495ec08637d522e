import type { AbiEvent, Address } from 'viem';
import type { RawEvent } from '../chain/ledger';

/**
 * What applying one event did to the store.
 * - applied: a row was inserted or changed
 * - duplicate: the event was already applied (replay)
 * - stale: an older event than what the row already reflects
 * - missing: the row the event refers to does not exist
 * - invalid: the event arguments did not decode to the expected shape
 * - ignored: an event this listener does not map
 */
export type HandleResult = 'applied' | 'duplicate' | 'stale' | 'missing' | 'invalid' | 'ignored';

/**
 * One contract's slice of the ingestion pipeline: which logs to fetch
 * and how to apply each of them to the store.
 */
export interface EventListener {
  name: string;
  address: Address;
  events: readonly AbiEvent[];
  /** Applies a single event in its own transaction */
  handle(event: RawEvent, blockTime: number): HandleResult;
}

export function shortAddress(address: string): string {
  return address.length > 10 ? `${address.slice(0, 10)}...` : address;
}
