import type { AbiEvent, Address, Hash, Hex } from 'viem';

/**
 * One decoded contract log. `args` is whatever the ABI decoder produced;
 * handlers validate it before use.
 */
export interface RawEvent {
  eventName: string;
  address: Address;
  args: unknown;
  blockNumber: number;
  transactionHash: Hash;
  logIndex: number;
}

export interface TxReceipt {
  status: 'success' | 'reverted';
  blockNumber: number;
}

/**
 * Read/write boundary to the chain. Every method may reject with a
 * LedgerError; callers treat that as transient.
 */
export interface LedgerClient {
  currentHeight(): Promise<number>;
  getLogs(contract: Address, event: AbiEvent, fromBlock: number, toBlock: number): Promise<RawEvent[]>;
  /** Unix seconds */
  getBlockTimestamp(blockNumber: number): Promise<number>;
  submitTransaction(to: Address, data: Hex): Promise<Hash>;
  /** Rejects when no receipt is observed within timeoutMs */
  waitForReceipt(hash: Hash, timeoutMs: number): Promise<TxReceipt>;
  /** eth_call against a view function; returns the raw ABI-encoded result */
  callView(contract: Address, data: Hex): Promise<Hex>;
}
