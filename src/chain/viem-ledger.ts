import {
  createPublicClient,
  createWalletClient,
  defineChain,
  fallback,
  http,
  type AbiEvent,
  type Account,
  type Address,
  type Chain,
  type Hash,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { base, baseSepolia, mainnet, sepolia } from 'viem/chains';
import { LedgerError } from '../errors';
import type { LedgerClient, RawEvent, TxReceipt } from './ledger';

export interface ViemLedgerOptions {
  rpcUrls: string[];
  chainId: number;
  /** Signing key for the oracle writer; reads work without it */
  privateKey?: Hex;
  requestTimeoutMs?: number;
}

const BLOCK_TIME_CACHE_SIZE = 2048;

function toChain(chainId: number, rpcUrls: string[]): Chain {
  switch (chainId) {
    case 1:
      return mainnet;
    case 11155111:
      return sepolia;
    case 8453:
      return base;
    case 84532:
      return baseSepolia;
    default:
      return defineChain({
        id: chainId,
        name: `chain-${chainId}`,
        nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
        rpcUrls: { default: { http: rpcUrls } },
      });
  }
}

/**
 * LedgerClient over an EVM JSON-RPC endpoint. Multiple URLs are tried in
 * the order given. Ranking is off: it runs a background timer that would
 * keep the process alive after shutdown.
 */
export class ViemLedgerClient implements LedgerClient {
  private readonly publicClient: PublicClient<Transport, Chain>;
  private readonly walletClient: WalletClient<Transport, Chain, Account> | null;
  private readonly blockTimes = new Map<number, number>();

  constructor(options: ViemLedgerOptions) {
    if (options.rpcUrls.length === 0) {
      throw new Error('ViemLedgerClient needs at least one RPC URL');
    }
    const chain = toChain(options.chainId, options.rpcUrls);
    const timeout = options.requestTimeoutMs ?? 15_000;
    const transports = options.rpcUrls.map((url) => http(url, { retryCount: 1, timeout }));
    const transport = transports.length > 1 ? fallback(transports, { retryCount: 1 }) : transports[0];

    this.publicClient = createPublicClient({ chain, transport });
    this.walletClient = options.privateKey
      ? createWalletClient({ account: privateKeyToAccount(options.privateKey), chain, transport })
      : null;
  }

  get signerAddress(): Address | null {
    return this.walletClient ? this.walletClient.account.address : null;
  }

  async currentHeight(): Promise<number> {
    try {
      return Number(await this.publicClient.getBlockNumber({ cacheTime: 0 }));
    } catch (err) {
      throw new LedgerError('currentHeight', err);
    }
  }

  async getLogs(contract: Address, event: AbiEvent, fromBlock: number, toBlock: number): Promise<RawEvent[]> {
    try {
      const logs = await this.publicClient.getLogs({
        address: contract,
        event,
        fromBlock: BigInt(fromBlock),
        toBlock: BigInt(toBlock),
      });

      const events: RawEvent[] = [];
      for (const log of logs) {
        // Pending logs carry no position yet
        if (log.blockNumber === null || log.transactionHash === null || log.logIndex === null) continue;
        events.push({
          eventName: event.name,
          address: log.address,
          args: log.args,
          blockNumber: Number(log.blockNumber),
          transactionHash: log.transactionHash,
          logIndex: log.logIndex,
        });
      }
      return events;
    } catch (err) {
      throw new LedgerError(`getLogs(${event.name} ${fromBlock}-${toBlock})`, err);
    }
  }

  async getBlockTimestamp(blockNumber: number): Promise<number> {
    const cached = this.blockTimes.get(blockNumber);
    if (cached !== undefined) return cached;

    try {
      const block = await this.publicClient.getBlock({ blockNumber: BigInt(blockNumber) });
      const timestamp = Number(block.timestamp);
      if (this.blockTimes.size >= BLOCK_TIME_CACHE_SIZE) {
        // Map iterates in insertion order; drop the oldest entry
        const oldest = this.blockTimes.keys().next();
        if (!oldest.done) this.blockTimes.delete(oldest.value);
      }
      this.blockTimes.set(blockNumber, timestamp);
      return timestamp;
    } catch (err) {
      throw new LedgerError(`getBlockTimestamp(${blockNumber})`, err);
    }
  }

  async submitTransaction(to: Address, data: Hex): Promise<Hash> {
    if (!this.walletClient) {
      throw new LedgerError('submitTransaction', 'no signing key configured');
    }
    try {
      return await this.walletClient.sendTransaction({ to, data });
    } catch (err) {
      throw new LedgerError('submitTransaction', err);
    }
  }

  async waitForReceipt(hash: Hash, timeoutMs: number): Promise<TxReceipt> {
    try {
      const receipt = await this.publicClient.waitForTransactionReceipt({ hash, timeout: timeoutMs });
      return { status: receipt.status, blockNumber: Number(receipt.blockNumber) };
    } catch (err) {
      throw new LedgerError(`waitForReceipt(${hash})`, err);
    }
  }

  async callView(contract: Address, data: Hex): Promise<Hex> {
    let result: Hex | undefined;
    try {
      ({ data: result } = await this.publicClient.call({ to: contract, data }));
    } catch (err) {
      throw new LedgerError('callView', err);
    }
    if (result === undefined) {
      throw new LedgerError('callView', `empty result from ${contract}`);
    }
    return result;
  }
}
