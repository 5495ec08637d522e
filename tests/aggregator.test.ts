import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { initDatabase } from '../src/db/schema';
import { getComputedScore, markScoresPushed } from '../src/db/queries';
import { handleReputationEvent } from '../src/handlers/reputation';
import { ScoreAggregator } from '../src/scoring/aggregator';
import { CLIENT, newFeedbackEvent, rawEvent, REPUTATION } from './fakes';

const DAY = 86_400;
const T0 = 1_700_000_000;
const OTHER_CLIENT = '0x00000000000000000000000000000000000000C2';

let db: Database.Database;
let aggregator: ScoreAggregator;

beforeEach(() => {
  db = initDatabase(':memory:');
  aggregator = new ScoreAggregator(db, { halfLifeDays: 90 });
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ScoreAggregator.normalizeValue', () => {
  it('should map [-100, 100] linearly onto [0, 100]', () => {
    expect(ScoreAggregator.normalizeValue(100n, 0)).toBe(100);
    expect(ScoreAggregator.normalizeValue(-100n, 0)).toBe(0);
    expect(ScoreAggregator.normalizeValue(0n, 0)).toBe(50);
    expect(ScoreAggregator.normalizeValue(80n, 0)).toBe(90);
  });

  it('should clamp out-of-range values', () => {
    expect(ScoreAggregator.normalizeValue(500n, 0)).toBe(100);
    expect(ScoreAggregator.normalizeValue(-101n, 0)).toBe(0);
  });

  it('should apply value decimals', () => {
    // 5000 / 10^2 = 50
    expect(ScoreAggregator.normalizeValue(5000n, 2)).toBe(75);
  });
});

describe('ScoreAggregator.computeScore', () => {
  it('should return null for an agent without feedback', () => {
    expect(aggregator.computeScore('1', T0)).toBeNull();
  });

  it('should score a single feedback and its category', () => {
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 80n, tag1: 'support' }, 10), T0);

    const score = aggregator.computeScore('1', T0);
    expect(score).toEqual({
      agentId: '1',
      overallScore: 90,
      feedbackCount: 1,
      positiveCount: 1,
      negativeCount: 0,
      categoryScores: { support: { score: 90, count: 1 } },
      computedAt: T0,
      pushedToChain: false,
      pushedAt: null,
    });
  });

  it('should keep a single sample unchanged as it ages', () => {
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 80n, tag1: 'support' }, 10), T0);

    const later = aggregator.computeScore('1', T0 + 90 * DAY);
    expect(later?.overallScore).toBe(90);
    expect(later?.categoryScores.support).toEqual({ score: 90, count: 1 });
  });

  it('should weigh newer feedback more than older feedback', () => {
    // -100 at T0 normalizes to 0; 80 at T0+90d normalizes to 90
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: -100n }, 10), T0);
    handleReputationEvent(
      db,
      newFeedbackEvent({ agentId: 1n, value: 80n, clientAddress: OTHER_CLIENT }, 20),
      T0 + 90 * DAY,
    );

    const score = aggregator.computeScore('1', T0 + 90 * DAY);
    // (90 * 1 + 0 * 0.5) / 1.5
    expect(score?.overallScore).toBe(60);
    expect(score?.feedbackCount).toBe(2);
    expect(score?.positiveCount).toBe(1);
    expect(score?.negativeCount).toBe(1);
  });

  it('should build one bucket per primary tag', () => {
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 100n, tag1: 'speed', feedbackIndex: 1n }, 10), T0);
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 0n, tag1: 'speed', feedbackIndex: 2n }, 10, 1), T0);
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: -100n, tag1: 'accuracy', feedbackIndex: 3n }, 10, 2), T0);
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 60n, feedbackIndex: 4n }, 10, 3), T0);

    const score = aggregator.computeScore('1', T0);
    // (100 + 50 + 0 + 80) / 4
    expect(score?.overallScore).toBe(57.5);
    expect(score?.categoryScores).toEqual({
      speed: { score: 75, count: 2 },
      accuracy: { score: 0, count: 1 },
    });
    // value 0 is neither positive nor negative
    expect(score?.positiveCount).toBe(2);
    expect(score?.negativeCount).toBe(1);
  });

  it('should round to two decimals', () => {
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 100n, feedbackIndex: 1n }, 10), T0);
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 0n, feedbackIndex: 2n }, 10, 1), T0);
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 0n, feedbackIndex: 3n }, 10, 2), T0);

    // (100 + 50 + 50) / 3 = 66.666...
    expect(aggregator.computeScore('1', T0)?.overallScore).toBe(66.67);
  });

  it('should exclude revoked feedback from every count and sum', () => {
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 80n, tag1: 'support', feedbackIndex: 1n }, 10), T0);
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: -100n, tag1: 'support', feedbackIndex: 2n }, 10, 1), T0);
    handleReputationEvent(
      db,
      rawEvent(REPUTATION, 'FeedbackRevoked', { agentId: 1n, clientAddress: CLIENT, feedbackIndex: 2n }, 11),
      T0,
    );

    const score = aggregator.computeScore('1', T0);
    expect(score?.overallScore).toBe(90);
    expect(score?.feedbackCount).toBe(1);
    expect(score?.positiveCount).toBe(1);
    expect(score?.negativeCount).toBe(0);
    expect(score?.categoryScores).toEqual({ support: { score: 90, count: 1 } });
  });

  it('should return null once every feedback is revoked', () => {
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 80n }, 10), T0);
    handleReputationEvent(
      db,
      rawEvent(REPUTATION, 'FeedbackRevoked', { agentId: 1n, clientAddress: CLIENT, feedbackIndex: 1n }, 11),
      T0,
    );
    expect(aggregator.computeScore('1', T0)).toBeNull();
  });

  it('should fall back to neutral when every weight underflows', () => {
    const shortLived = new ScoreAggregator(db, { halfLifeDays: 1 });
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 100n, tag1: 'support' }, 10), 0);

    // 2^-100000 is 0 in floating point
    const score = shortLived.computeScore('1', 100_000 * DAY);
    expect(score?.overallScore).toBe(50);
    expect(score?.categoryScores.support).toEqual({ score: 50, count: 1 });
    expect(score?.feedbackCount).toBe(1);
  });
});

describe('ScoreAggregator persistence', () => {
  it('should save the score and reset publication status on recompute', () => {
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 80n }, 10), T0);
    aggregator.computeAndSave('1', T0);
    markScoresPushed(db, ['1'], T0 + 10);
    expect(getComputedScore(db, '1')?.pushedToChain).toBe(true);

    aggregator.computeAndSave('1', T0 + DAY);

    const saved = getComputedScore(db, '1');
    expect(saved?.pushedToChain).toBe(false);
    expect(saved?.pushedAt).toBeNull();
    expect(saved?.computedAt).toBe(T0 + DAY);
  });

  it('should not write a row for an agent without feedback', () => {
    expect(aggregator.computeAndSave('1', T0)).toBeNull();
    expect(getComputedScore(db, '1')).toBeNull();
  });

  it('should recompute every agent and isolate failures', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 80n }, 10), T0);
    handleReputationEvent(db, newFeedbackEvent({ agentId: 2n, value: -20n }, 10, 1), T0);
    // A row whose value cannot be parsed makes agent 3 fail
    db.prepare(`
      INSERT INTO feedback (id, subject, author, feedback_index, value, value_decimals, block_number, tx_hash, timestamp)
      VALUES ('3-x-1', '3', 'x', '1', 'garbage', 0, 10, '0x00', ?)
    `).run(T0);

    const summary = aggregator.computeAllScores(T0);

    expect(summary.computed).toBe(2);
    expect(summary.empty).toBe(0);
    expect(summary.failures.map((f) => f.agentId)).toEqual(['3']);
    expect(getComputedScore(db, '1')?.overallScore).toBe(90);
    expect(getComputedScore(db, '2')?.overallScore).toBe(40);
    expect(getComputedScore(db, '3')).toBeNull();
    error.mockRestore();
  });
});
