import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { getCheckpoint, initDatabase, pruneEvents, setCheckpoint } from '../src/db/schema';
import {
  getAgent,
  getComputedScore,
  getLeaderboard,
  getStats,
  getUnpushedScores,
  insertAgent,
  insertFeedback,
  listAgents,
  listFeedbackForAgent,
  logEvent,
  markScoresPushed,
  revokeFeedback,
  saveComputedScore,
} from '../src/db/queries';
import { handleReputationEvent } from '../src/handlers/reputation';
import type { Agent, ComputedScore, Feedback } from '../src/types';
import { newFeedbackEvent } from './fakes';

function agent(id: string, owner: string, createdAt: number): Agent {
  return {
    id,
    owner,
    metadataURI: `ipfs://${id}`,
    registrationBlock: createdAt,
    registrationTx: '0x01',
    lastEventBlock: createdAt,
    createdAt,
    updatedAt: createdAt,
  };
}

function feedback(id: string, subject: string, timestamp: number, value = 10n): Feedback {
  return {
    id,
    subject,
    author: '0xclient',
    feedbackIndex: id,
    tag1: null,
    tag2: null,
    tag3: null,
    value,
    valueDecimals: 0,
    comment: null,
    feedbackHash: null,
    revoked: false,
    blockNumber: timestamp,
    txHash: '0x02',
    timestamp,
  };
}

function score(agentId: string, overallScore: number, feedbackCount: number, computedAt = 1000): ComputedScore {
  return {
    agentId,
    overallScore,
    feedbackCount,
    positiveCount: feedbackCount,
    negativeCount: 0,
    categoryScores: { support: { score: overallScore, count: feedbackCount } },
    computedAt,
    pushedToChain: false,
    pushedAt: null,
  };
}

let db: Database.Database;

beforeEach(() => {
  db = initDatabase(':memory:');
});

describe('Database Schema', () => {
  it('should create all required tables', () => {
    const tableNames = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table'")
      .all()
      .map((t) => t.name);

    expect(tableNames).toContain('agents');
    expect(tableNames).toContain('feedback');
    expect(tableNames).toContain('computed_scores');
    expect(tableNames).toContain('indexer_state');
    expect(tableNames).toContain('events');
  });
});

describe('Checkpoint', () => {
  it('should start empty', () => {
    expect(getCheckpoint(db)).toBeNull();
  });

  it('should only move forward', () => {
    expect(setCheckpoint(db, 10)).toBe(10);
    expect(setCheckpoint(db, 5)).toBe(10);
    expect(setCheckpoint(db, 20)).toBe(20);
    expect(getCheckpoint(db)).toBe(20);
  });
});

describe('Agent queries', () => {
  beforeEach(() => {
    insertAgent(db, agent('1', '0xaaa', 100));
    insertAgent(db, agent('2', '0xbbb', 300));
    insertAgent(db, agent('3', '0xaaa', 200));
  });

  it('should reject a duplicate insert', () => {
    expect(insertAgent(db, agent('1', '0xccc', 999))).toBe(false);
    expect(getAgent(db, '1')?.owner).toBe('0xaaa');
  });

  it('should list newest first with paging', () => {
    expect(listAgents(db).map((a) => a.id)).toEqual(['2', '3', '1']);
    expect(listAgents(db, { limit: 1, offset: 1 }).map((a) => a.id)).toEqual(['3']);
  });

  it('should filter by owner regardless of case', () => {
    expect(listAgents(db, { owner: '0xAAA' }).map((a) => a.id)).toEqual(['3', '1']);
  });
});

describe('Feedback queries', () => {
  beforeEach(() => {
    insertFeedback(db, feedback('a', '1', 100));
    insertFeedback(db, feedback('b', '1', 300));
    insertFeedback(db, feedback('c', '1', 200));
    insertFeedback(db, feedback('d', '2', 100));
    revokeFeedback(db, 'c');
  });

  it('should list a subject newest first without revoked rows', () => {
    expect(listFeedbackForAgent(db, '1').map((f) => f.id)).toEqual(['b', 'a']);
  });

  it('should include revoked rows on request', () => {
    expect(listFeedbackForAgent(db, '1', { includeRevoked: true }).map((f) => f.id)).toEqual(['b', 'c', 'a']);
  });

  it('should revoke once', () => {
    expect(revokeFeedback(db, 'a')).toBe(true);
    expect(revokeFeedback(db, 'a')).toBe(false);
    expect(revokeFeedback(db, 'missing')).toBe(false);
  });
});

describe('Score queries', () => {
  it('should round-trip category scores', () => {
    saveComputedScore(db, score('1', 87.5, 4));
    expect(getComputedScore(db, '1')).toEqual(score('1', 87.5, 4));
  });

  it('should order the leaderboard by score then volume', () => {
    saveComputedScore(db, score('1', 70, 3));
    saveComputedScore(db, score('2', 90, 1));
    saveComputedScore(db, score('3', 70, 8));

    expect(getLeaderboard(db).map((s) => s.agentId)).toEqual(['2', '3', '1']);
    expect(getLeaderboard(db, { minFeedback: 2 }).map((s) => s.agentId)).toEqual(['3', '1']);
    expect(getLeaderboard(db, { limit: 1 }).map((s) => s.agentId)).toEqual(['2']);
  });

  it('should return unpushed scores oldest first and mark them pushed', () => {
    saveComputedScore(db, score('1', 50, 1, 300));
    saveComputedScore(db, score('2', 50, 1, 100));
    saveComputedScore(db, score('3', 50, 1, 200));

    expect(getUnpushedScores(db, 2).map((s) => s.agentId)).toEqual(['2', '3']);

    expect(markScoresPushed(db, ['2', '3'], 5000)).toBe(2);
    expect(getUnpushedScores(db, 10).map((s) => s.agentId)).toEqual(['1']);
    expect(getComputedScore(db, '2')?.pushedAt).toBe(5000);
  });
});

describe('Stats and journal', () => {
  it('should count what the indexer holds', () => {
    insertAgent(db, agent('1', '0xaaa', 100));
    insertFeedback(db, feedback('a', '1', 100));
    insertFeedback(db, feedback('b', '1', 200));
    revokeFeedback(db, 'b');
    saveComputedScore(db, score('1', 55, 1));
    setCheckpoint(db, 42);

    expect(getStats(db)).toEqual({
      totalAgents: 1,
      totalFeedback: 1,
      revokedFeedback: 1,
      scoredAgents: 1,
      pendingPublication: 1,
      lastIndexedBlock: 42,
    });
  });

  it('should prune journal entries by the time they were written', () => {
    const entry = { txHash: '0x01', logIndex: 0, eventName: 'NewFeedback', contract: '0xreg', data: { value: 5n } };
    logEvent(db, { ...entry, blockNumber: 1, blockTime: 100, loggedAt: 1000 });
    logEvent(db, { ...entry, blockNumber: 2, blockTime: 200, loggedAt: 5000 });

    expect(pruneEvents(db, 1000, 5500)).toBe(1);

    const rows = db
      .prepare<[], { block_number: number; block_time: number; data: string }>('SELECT block_number, block_time, data FROM events')
      .all();
    expect(rows).toEqual([{ block_number: 2, block_time: 200, data: '{"value":"5"}' }]);
  });

  it('should keep a fresh entry for an old block', () => {
    const now = Math.floor(Date.now() / 1000);
    const yearAgo = now - 365 * 24 * 60 * 60;
    handleReputationEvent(db, newFeedbackEvent({ agentId: 1n, value: 80n }, 10), yearAgo);

    expect(pruneEvents(db, 30 * 24 * 60 * 60)).toBe(0);

    const row = db.prepare<[], { block_time: number }>('SELECT block_time FROM events').get();
    expect(row?.block_time).toBe(yearAgo);
  });
});
