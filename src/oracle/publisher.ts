import Database from 'better-sqlite3';
import { decodeFunctionResult, encodeFunctionData, type Hash } from 'viem';
import { z } from 'zod';
import { ORACLE_ABI } from '../chain/abi';
import type { LedgerClient, TxReceipt } from '../chain/ledger';
import type { OracleConfig } from '../config';
import { getUnpushedScores, markScoresPushed } from '../db/queries';
import { errorMessage } from '../errors';
import type { ScoreAggregator } from '../scoring/aggregator';
import { failed, succeeded, type ComputedScore, type Outcome } from '../types';
import { chunk, delay, unixNow } from '../utils';

export type PublisherConfig = Omit<OracleConfig, 'privateKey'>;

export interface ScoreUpdate {
  agentId: string;
  score: number;
  /** score × 100, as the oracle stores it */
  chainValue: bigint;
  /** Value currently on chain, null if the oracle has none */
  onchainValue: bigint | null;
}

const scoreViewResult = z.tuple([z.bigint(), z.bigint(), z.boolean()]);

/** Oracle scores carry two implied decimals: 87.5 is stored as 8750. */
export function toChainValue(score: number): bigint {
  return BigInt(Math.round(score * 100));
}

/**
 * Pushes computed trust scores to the oracle contract in batches, skipping
 * agents whose on-chain score is already within the change threshold.
 */
export class OraclePublisher {
  private readonly config: PublisherConfig;
  private readonly now: () => number;

  constructor(
    private readonly db: Database.Database,
    private readonly ledger: LedgerClient,
    private readonly aggregator: ScoreAggregator,
    config: PublisherConfig,
    now: () => number = unixNow,
  ) {
    this.config = config;
    this.now = now;
  }

  /** On-chain score for an agent, or null if the oracle has never stored one. */
  async readOnchainScore(agentId: string): Promise<bigint | null> {
    const data = encodeFunctionData({
      abi: ORACLE_ABI,
      functionName: 'getScoreView',
      args: [BigInt(agentId)],
    });
    const raw = await this.ledger.callView(this.config.address, data);
    const decoded = decodeFunctionResult({ abi: ORACLE_ABI, functionName: 'getScoreView', data: raw });
    const [score, , exists] = scoreViewResult.parse(decoded);
    return exists ? score : null;
  }

  /**
   * Keep the scores that differ from the chain by at least minScoreChange,
   * or that the oracle does not know yet. An agent whose on-chain score
   * cannot be read is left out of this cycle.
   */
  async selectUpdates(scores: ComputedScore[]): Promise<ScoreUpdate[]> {
    // At least one scaled unit, so an unchanged score is never re-sent
    const threshold = BigInt(Math.max(1, Math.round(this.config.minScoreChange * 100)));
    const updates: ScoreUpdate[] = [];

    for (const score of scores) {
      const onchain = await this.tryReadOnchainScore(score.agentId);
      if (!onchain.ok) {
        console.warn(`[oracle] Could not read on-chain score for agent ${score.agentId}: ${errorMessage(onchain.error)}`);
        continue;
      }

      const chainValue = toChainValue(score.overallScore);
      const current = onchain.value;
      if (current !== null) {
        const delta = chainValue > current ? chainValue - current : current - chainValue;
        if (delta < threshold) continue;
      }

      updates.push({ agentId: score.agentId, score: score.overallScore, chainValue, onchainValue: current });
    }
    return updates;
  }

  private async tryReadOnchainScore(agentId: string): Promise<Outcome<bigint | null>> {
    try {
      return succeeded(await this.readOnchainScore(agentId));
    } catch (err) {
      return failed(err);
    }
  }

  /**
   * Submit one batch and wait for its receipt. Scores are marked pushed only
   * after a successful receipt; a revert or a timeout leaves them pending.
   */
  async publishBatch(batch: ScoreUpdate[]): Promise<Outcome<Hash>> {
    if (batch.length === 0) return failed(new Error('empty batch'));

    const data = encodeFunctionData({
      abi: ORACLE_ABI,
      functionName: 'updateScoreBatch',
      args: [batch.map((u) => BigInt(u.agentId)), batch.map((u) => u.chainValue)],
    });

    let hash: Hash;
    try {
      hash = await this.ledger.submitTransaction(this.config.address, data);
    } catch (err) {
      console.error(`[oracle] Failed to submit batch of ${batch.length}: ${errorMessage(err)}`);
      return failed(err);
    }
    console.log(`[oracle] Sent batch of ${batch.length} scores, tx ${hash}`);

    let receipt: TxReceipt;
    try {
      receipt = await this.ledger.waitForReceipt(hash, this.config.confirmTimeoutMs);
    } catch (err) {
      console.error(`[oracle] No confirmation for ${hash}: ${errorMessage(err)}`);
      return failed(err);
    }
    if (receipt.status !== 'success') {
      console.error(`[oracle] Batch transaction reverted: ${hash}`);
      return failed(new Error(`transaction ${hash} reverted`));
    }

    try {
      markScoresPushed(this.db, batch.map((u) => u.agentId), this.now());
    } catch (err) {
      console.error(`[oracle] Batch ${hash} confirmed but not recorded as pushed: ${errorMessage(err)}`);
      return failed(err);
    }
    console.log(`[oracle] Batch confirmed in block ${receipt.blockNumber}: ${batch.length} scores updated`);
    return succeeded(hash);
  }

  /**
   * Recompute every score, then publish what moved. Returns the number of
   * scores confirmed on chain. Abort is honoured between batches.
   */
  async runUpdateCycle(signal?: AbortSignal): Promise<number> {
    console.log('[oracle] Recomputing all scores...');
    this.aggregator.computeAllScores(this.now());

    const pending = getUnpushedScores(this.db, this.config.batchSize * 10);
    console.log(`[oracle] Found ${pending.length} unpushed scores`);

    const updates = await this.selectUpdates(pending);
    console.log(`[oracle] ${updates.length} scores need updating (above threshold)`);
    if (updates.length === 0) return 0;

    const batches = chunk(updates, this.config.batchSize);
    let pushed = 0;
    for (let i = 0; i < batches.length; i++) {
      if (signal?.aborted) break;
      const outcome = await this.publishBatch(batches[i]);
      if (outcome.ok) pushed += batches[i].length;

      if (i < batches.length - 1) {
        await delay(this.config.batchDelayMs, signal);
      }
    }
    return pushed;
  }

  /** Run a cycle every updateIntervalMs until the signal aborts. */
  async runDaemon(signal: AbortSignal): Promise<void> {
    const hours = this.config.updateIntervalMs / 3_600_000;
    console.log(`[oracle] Starting publication daemon (interval: ${hours}h, oracle ${this.config.address})`);

    while (!signal.aborted) {
      try {
        const pushed = await this.runUpdateCycle(signal);
        console.log(`[oracle] Update cycle complete: ${pushed} scores pushed`);
      } catch (err) {
        console.error(`[oracle] Error in update cycle: ${errorMessage(err)}`);
      }
      await delay(this.config.updateIntervalMs, signal);
    }
    console.log('[oracle] Publication daemon stopped');
  }
}
