import Database from 'better-sqlite3';
import { listActiveFeedback, listScoredSubjects, saveComputedScore } from '../db/queries';
import { errorMessage } from '../errors';
import { failed, succeeded, type CategoryScores, type ComputedScore, type Outcome } from '../types';
import { unixNow } from '../utils';
import { TimeDecay } from './decay';

const NEUTRAL_SCORE = 50;

export interface AggregatorOptions {
  halfLifeDays: number;
}

export interface RecomputeSummary {
  /** Agents whose score row was written */
  computed: number;
  /** Agents that turned out to have no active feedback */
  empty: number;
  failures: Array<{ agentId: string; error: Error }>;
}

interface Bucket {
  weightedSum: number;
  weightSum: number;
  count: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function bucketScore(bucket: Bucket): number {
  return bucket.weightSum > 0 ? round2(bucket.weightedSum / bucket.weightSum) : NEUTRAL_SCORE;
}

/**
 * Turns the active feedback of an agent into a time-weighted trust score
 * on a 0-100 scale, with a breakdown per primary tag.
 */
export class ScoreAggregator {
  private readonly decay: TimeDecay;

  constructor(
    private readonly db: Database.Database,
    options: AggregatorOptions,
  ) {
    this.decay = new TimeDecay(options.halfLifeDays);
  }

  /**
   * Map a raw feedback value onto 0-100: the value is read as a number in
   * [-100, 100] (clamped), so 0 lands on the neutral 50.
   */
  static normalizeValue(value: bigint, decimals: number): number {
    const raw = Number(value) / Math.pow(10, decimals);
    const clamped = Math.min(100, Math.max(-100, raw));
    return (clamped + 100) / 2;
  }

  /** Returns null when the agent has no non-revoked feedback. */
  computeScore(agentId: string, referenceTime: number): ComputedScore | null {
    const rows = listActiveFeedback(this.db, agentId);
    if (rows.length === 0) return null;

    const overall: Bucket = { weightedSum: 0, weightSum: 0, count: 0 };
    const categories = new Map<string, Bucket>();
    let positiveCount = 0;
    let negativeCount = 0;

    for (const row of rows) {
      const normalized = ScoreAggregator.normalizeValue(row.value, row.valueDecimals);
      const weight = this.decay.weight(row.timestamp, referenceTime);

      overall.weightedSum += normalized * weight;
      overall.weightSum += weight;
      overall.count++;

      if (row.tag1) {
        let bucket = categories.get(row.tag1);
        if (!bucket) {
          bucket = { weightedSum: 0, weightSum: 0, count: 0 };
          categories.set(row.tag1, bucket);
        }
        bucket.weightedSum += normalized * weight;
        bucket.weightSum += weight;
        bucket.count++;
      }

      if (row.value > 0n) positiveCount++;
      else if (row.value < 0n) negativeCount++;
    }

    const categoryScores: CategoryScores = {};
    for (const [category, bucket] of categories) {
      categoryScores[category] = { score: bucketScore(bucket), count: bucket.count };
    }

    return {
      agentId,
      overallScore: bucketScore(overall),
      feedbackCount: rows.length,
      positiveCount,
      negativeCount,
      categoryScores,
      computedAt: referenceTime,
      pushedToChain: false,
      pushedAt: null,
    };
  }

  /**
   * Compute and persist. Saving resets the publication flag. An agent with
   * no active feedback keeps whatever row it had.
   */
  computeAndSave(agentId: string, referenceTime: number): ComputedScore | null {
    const score = this.computeScore(agentId, referenceTime);
    if (score) {
      saveComputedScore(this.db, score);
    }
    return score;
  }

  scoreAgent(agentId: string, referenceTime: number): Outcome<ComputedScore | null> {
    try {
      return succeeded(this.computeAndSave(agentId, referenceTime));
    } catch (err) {
      return failed(err);
    }
  }

  /** Recompute every agent with active feedback; one failure does not stop the rest. */
  computeAllScores(referenceTime: number = unixNow()): RecomputeSummary {
    const summary: RecomputeSummary = { computed: 0, empty: 0, failures: [] };

    for (const agentId of listScoredSubjects(this.db)) {
      const outcome = this.scoreAgent(agentId, referenceTime);
      if (!outcome.ok) {
        console.error(`[scoring] Failed to score agent ${agentId}: ${errorMessage(outcome.error)}`);
        summary.failures.push({ agentId, error: outcome.error });
      } else if (outcome.value) {
        summary.computed++;
      } else {
        summary.empty++;
      }
    }

    console.log(
      `[scoring] Recomputed ${summary.computed} scores` +
        (summary.failures.length > 0 ? ` (${summary.failures.length} failed)` : ''),
    );
    return summary;
  }
}
