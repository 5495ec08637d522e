import Database from 'better-sqlite3';
import type {
  Agent,
  AgentListOptions,
  CategoryScores,
  ComputedScore,
  Feedback,
  FeedbackListOptions,
  IndexerStats,
  LeaderboardOptions,
} from '../types';
import { getCheckpoint } from './schema';

// ============== Row shapes ==============

interface AgentRow {
  id: string;
  owner: string;
  metadata_uri: string;
  registration_block: number;
  registration_tx: string;
  last_event_block: number;
  created_at: number;
  updated_at: number;
}

interface FeedbackRow {
  id: string;
  subject: string;
  author: string;
  feedback_index: string;
  tag1: string | null;
  tag2: string | null;
  tag3: string | null;
  value: string;
  value_decimals: number;
  comment: string | null;
  feedback_hash: string | null;
  revoked: number;
  block_number: number;
  tx_hash: string;
  timestamp: number;
}

interface ScoreRow {
  agent_id: string;
  overall_score: number;
  feedback_count: number;
  positive_count: number;
  negative_count: number;
  category_scores: string;
  computed_at: number;
  pushed_to_chain: number;
  pushed_at: number | null;
}

function parseAgent(row: AgentRow): Agent {
  return {
    id: row.id,
    owner: row.owner,
    metadataURI: row.metadata_uri,
    registrationBlock: row.registration_block,
    registrationTx: row.registration_tx,
    lastEventBlock: row.last_event_block,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseFeedback(row: FeedbackRow): Feedback {
  return {
    id: row.id,
    subject: row.subject,
    author: row.author,
    feedbackIndex: row.feedback_index,
    tag1: row.tag1,
    tag2: row.tag2,
    tag3: row.tag3,
    value: BigInt(row.value),
    valueDecimals: row.value_decimals,
    comment: row.comment,
    feedbackHash: row.feedback_hash,
    revoked: row.revoked === 1,
    blockNumber: row.block_number,
    txHash: row.tx_hash,
    timestamp: row.timestamp,
  };
}

function parseCategoryScores(json: string): CategoryScores {
  const parsed: unknown = JSON.parse(json);
  const result: CategoryScores = {};
  if (!parsed || typeof parsed !== 'object') return result;

  const entries: Array<[string, unknown]> = Object.entries(parsed);
  for (const [category, entry] of entries) {
    if (
      entry &&
      typeof entry === 'object' &&
      'score' in entry &&
      'count' in entry &&
      typeof entry.score === 'number' &&
      typeof entry.count === 'number'
    ) {
      result[category] = { score: entry.score, count: entry.count };
    }
  }
  return result;
}

function parseScore(row: ScoreRow): ComputedScore {
  return {
    agentId: row.agent_id,
    overallScore: row.overall_score,
    feedbackCount: row.feedback_count,
    positiveCount: row.positive_count,
    negativeCount: row.negative_count,
    categoryScores: parseCategoryScores(row.category_scores),
    computedAt: row.computed_at,
    pushedToChain: row.pushed_to_chain === 1,
    pushedAt: row.pushed_at,
  };
}

function clampLimit(limit: number | undefined, fallback: number, max: number): number {
  if (limit === undefined || !Number.isFinite(limit)) return fallback;
  return Math.max(1, Math.min(Math.floor(limit), max));
}

// ============== Agents ==============

export function getAgent(db: Database.Database, id: string): Agent | null {
  const row = db.prepare<[string], AgentRow>('SELECT * FROM agents WHERE id = ?').get(id);
  return row ? parseAgent(row) : null;
}

export function listAgents(db: Database.Database, options: AgentListOptions = {}): Agent[] {
  const limit = clampLimit(options.limit, 20, 100);
  const offset = Math.max(0, options.offset ?? 0);

  if (options.owner) {
    return db
      .prepare<[string, number, number], AgentRow>(
        'SELECT * FROM agents WHERE owner = ? COLLATE NOCASE ORDER BY created_at DESC, id ASC LIMIT ? OFFSET ?',
      )
      .all(options.owner, limit, offset)
      .map(parseAgent);
  }

  return db
    .prepare<[number, number], AgentRow>('SELECT * FROM agents ORDER BY created_at DESC, id ASC LIMIT ? OFFSET ?')
    .all(limit, offset)
    .map(parseAgent);
}

/** Insert a newly registered agent. Returns false if the id already exists. */
export function insertAgent(db: Database.Database, agent: Agent): boolean {
  const result = db.prepare(`
    INSERT OR IGNORE INTO agents (id, owner, metadata_uri, registration_block, registration_tx, last_event_block, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    agent.id,
    agent.owner,
    agent.metadataURI,
    agent.registrationBlock,
    agent.registrationTx,
    agent.lastEventBlock,
    agent.createdAt,
    agent.updatedAt,
  );
  return result.changes > 0;
}

/** Set metadata URI; updated_at and last_event_block only move forward. */
export function updateAgentUri(
  db: Database.Database,
  id: string,
  metadataURI: string,
  blockNumber: number,
  blockTime: number,
): void {
  db.prepare(`
    UPDATE agents
    SET metadata_uri = ?,
        last_event_block = MAX(last_event_block, ?),
        updated_at = MAX(updated_at, ?)
    WHERE id = ?
  `).run(metadataURI, blockNumber, blockTime, id);
}

export function touchAgent(db: Database.Database, id: string, blockNumber: number, blockTime: number): void {
  db.prepare(`
    UPDATE agents
    SET last_event_block = MAX(last_event_block, ?),
        updated_at = MAX(updated_at, ?)
    WHERE id = ?
  `).run(blockNumber, blockTime, id);
}

// ============== Feedback ==============

export function getFeedback(db: Database.Database, id: string): Feedback | null {
  const row = db.prepare<[string], FeedbackRow>('SELECT * FROM feedback WHERE id = ?').get(id);
  return row ? parseFeedback(row) : null;
}

/** Feedback about one agent, newest first. */
export function listFeedbackForAgent(
  db: Database.Database,
  subject: string,
  options: FeedbackListOptions = {},
): Feedback[] {
  const limit = clampLimit(options.limit, 50, 200);
  const offset = Math.max(0, options.offset ?? 0);
  const revokedClause = options.includeRevoked ? '' : 'AND revoked = 0';

  return db
    .prepare<[string, number, number], FeedbackRow>(`
      SELECT * FROM feedback
      WHERE subject = ? ${revokedClause}
      ORDER BY timestamp DESC, block_number DESC, id ASC
      LIMIT ? OFFSET ?
    `)
    .all(subject, limit, offset)
    .map(parseFeedback);
}

/** Every non-revoked feedback row for a subject, unpaged. */
export function listActiveFeedback(db: Database.Database, subject: string): Feedback[] {
  return db
    .prepare<[string], FeedbackRow>('SELECT * FROM feedback WHERE subject = ? AND revoked = 0 ORDER BY timestamp ASC, id ASC')
    .all(subject)
    .map(parseFeedback);
}

/** Distinct subjects that have at least one non-revoked feedback row. */
export function listScoredSubjects(db: Database.Database): string[] {
  return db
    .prepare<[], { subject: string }>('SELECT DISTINCT subject FROM feedback WHERE revoked = 0 ORDER BY subject')
    .all()
    .map((r) => r.subject);
}

/** Insert a feedback row. Returns false if the id already exists. */
export function insertFeedback(db: Database.Database, feedback: Feedback): boolean {
  const result = db.prepare(`
    INSERT OR IGNORE INTO feedback (id, subject, author, feedback_index, tag1, tag2, tag3, value, value_decimals, comment, feedback_hash, revoked, block_number, tx_hash, timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    feedback.id,
    feedback.subject,
    feedback.author,
    feedback.feedbackIndex,
    feedback.tag1,
    feedback.tag2,
    feedback.tag3,
    feedback.value.toString(),
    feedback.valueDecimals,
    feedback.comment,
    feedback.feedbackHash,
    feedback.revoked ? 1 : 0,
    feedback.blockNumber,
    feedback.txHash,
    feedback.timestamp,
  );
  return result.changes > 0;
}

/** One-way revoke. Returns true only when the row flipped from active to revoked. */
export function revokeFeedback(db: Database.Database, id: string): boolean {
  const result = db.prepare('UPDATE feedback SET revoked = 1 WHERE id = ? AND revoked = 0').run(id);
  return result.changes > 0;
}

// ============== Computed scores ==============

export function getComputedScore(db: Database.Database, agentId: string): ComputedScore | null {
  const row = db.prepare<[string], ScoreRow>('SELECT * FROM computed_scores WHERE agent_id = ?').get(agentId);
  return row ? parseScore(row) : null;
}

/**
 * Replace the cached score for an agent. Publication status is reset:
 * any recompute invalidates what was pushed before.
 */
export function saveComputedScore(db: Database.Database, score: ComputedScore): void {
  db.prepare(`
    INSERT INTO computed_scores (agent_id, overall_score, feedback_count, positive_count, negative_count, category_scores, computed_at, pushed_to_chain, pushed_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, 0, NULL)
    ON CONFLICT(agent_id) DO UPDATE SET
      overall_score = excluded.overall_score,
      feedback_count = excluded.feedback_count,
      positive_count = excluded.positive_count,
      negative_count = excluded.negative_count,
      category_scores = excluded.category_scores,
      computed_at = excluded.computed_at,
      pushed_to_chain = 0,
      pushed_at = NULL
  `).run(
    score.agentId,
    score.overallScore,
    score.feedbackCount,
    score.positiveCount,
    score.negativeCount,
    JSON.stringify(score.categoryScores),
    score.computedAt,
  );
}

/** Scores not yet confirmed on chain, oldest computation first. */
export function getUnpushedScores(db: Database.Database, limit: number): ComputedScore[] {
  return db
    .prepare<[number], ScoreRow>(
      'SELECT * FROM computed_scores WHERE pushed_to_chain = 0 ORDER BY computed_at ASC, agent_id ASC LIMIT ?',
    )
    .all(Math.max(1, Math.floor(limit)))
    .map(parseScore);
}

export function markScoresPushed(db: Database.Database, agentIds: string[], pushedAt: number): number {
  const stmt = db.prepare('UPDATE computed_scores SET pushed_to_chain = 1, pushed_at = ? WHERE agent_id = ?');
  const markAll = db.transaction((ids: string[]) => {
    let changed = 0;
    for (const id of ids) {
      changed += stmt.run(pushedAt, id).changes;
    }
    return changed;
  });
  return markAll(agentIds);
}

/** Highest scores first. */
export function getLeaderboard(db: Database.Database, options: LeaderboardOptions = {}): ComputedScore[] {
  const limit = clampLimit(options.limit, 20, 100);
  const offset = Math.max(0, options.offset ?? 0);
  const minFeedback = Math.max(0, options.minFeedback ?? 0);

  return db
    .prepare<[number, number, number], ScoreRow>(`
      SELECT * FROM computed_scores
      WHERE feedback_count >= ?
      ORDER BY overall_score DESC, feedback_count DESC, agent_id ASC
      LIMIT ? OFFSET ?
    `)
    .all(minFeedback, limit, offset)
    .map(parseScore);
}

// ============== Journal & stats ==============

export interface JournalEntry {
  blockNumber: number;
  txHash: string;
  logIndex: number;
  eventName: string;
  contract: string;
  data: unknown;
  blockTime: number;
  /** Insertion time; defaults to now */
  loggedAt?: number;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function logEvent(db: Database.Database, entry: JournalEntry): void {
  db.prepare(`
    INSERT INTO events (block_number, tx_hash, log_index, event_name, contract, data, block_time, timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?, COALESCE(?, strftime('%s', 'now')))
  `).run(
    entry.blockNumber,
    entry.txHash,
    entry.logIndex,
    entry.eventName,
    entry.contract,
    JSON.stringify(entry.data, jsonReplacer),
    entry.blockTime,
    entry.loggedAt ?? null,
  );
}

export function getStats(db: Database.Database): IndexerStats {
  const count = (sql: string): number => db.prepare<[], { cnt: number }>(sql).get()?.cnt ?? 0;

  return {
    totalAgents: count('SELECT COUNT(*) AS cnt FROM agents'),
    totalFeedback: count('SELECT COUNT(*) AS cnt FROM feedback WHERE revoked = 0'),
    revokedFeedback: count('SELECT COUNT(*) AS cnt FROM feedback WHERE revoked = 1'),
    scoredAgents: count('SELECT COUNT(*) AS cnt FROM computed_scores'),
    pendingPublication: count('SELECT COUNT(*) AS cnt FROM computed_scores WHERE pushed_to_chain = 0'),
    lastIndexedBlock: getCheckpoint(db) ?? 0,
  };
}
