import Database from 'better-sqlite3';

export function initDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  // WAL lets the API process read while the indexer writes
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    -- Registered agents (identity registry)
    CREATE TABLE IF NOT EXISTS agents (
      id TEXT PRIMARY KEY,
      owner TEXT NOT NULL,
      metadata_uri TEXT NOT NULL DEFAULT '',
      registration_block INTEGER NOT NULL,
      registration_tx TEXT NOT NULL,
      last_event_block INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_agents_owner ON agents(owner);

    -- Feedback signals (reputation registry). Append-only; revoked is the only mutable column.
    CREATE TABLE IF NOT EXISTS feedback (
      id TEXT PRIMARY KEY,
      subject TEXT NOT NULL,
      author TEXT NOT NULL,
      feedback_index TEXT NOT NULL,
      tag1 TEXT,
      tag2 TEXT,
      tag3 TEXT,
      value TEXT NOT NULL,
      value_decimals INTEGER NOT NULL DEFAULT 0,
      comment TEXT,
      feedback_hash TEXT,
      revoked INTEGER NOT NULL DEFAULT 0,
      block_number INTEGER NOT NULL,
      tx_hash TEXT NOT NULL,
      timestamp INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_feedback_subject_revoked ON feedback(subject, revoked);
    CREATE INDEX IF NOT EXISTS idx_feedback_author ON feedback(author);
    CREATE INDEX IF NOT EXISTS idx_feedback_timestamp ON feedback(timestamp);

    -- Derived trust scores, rebuilt by the aggregator at any time
    CREATE TABLE IF NOT EXISTS computed_scores (
      agent_id TEXT PRIMARY KEY,
      overall_score REAL NOT NULL,
      feedback_count INTEGER NOT NULL DEFAULT 0,
      positive_count INTEGER NOT NULL DEFAULT 0,
      negative_count INTEGER NOT NULL DEFAULT 0,
      category_scores TEXT NOT NULL DEFAULT '{}',
      computed_at INTEGER NOT NULL,
      pushed_to_chain INTEGER NOT NULL DEFAULT 0,
      pushed_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_computed_scores_pushed ON computed_scores(pushed_to_chain);
    CREATE INDEX IF NOT EXISTS idx_computed_scores_overall ON computed_scores(overall_score);

    -- Ingestion checkpoint
    CREATE TABLE IF NOT EXISTS indexer_state (
      id INTEGER PRIMARY KEY DEFAULT 1,
      last_indexed_block INTEGER NOT NULL DEFAULT 0,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    -- Journal of applied chain events
    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      block_number INTEGER,
      tx_hash TEXT,
      log_index INTEGER,
      event_name TEXT,
      contract TEXT,
      data TEXT,
      block_time INTEGER,
      timestamp INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE INDEX IF NOT EXISTS idx_events_contract ON events(contract);
    CREATE INDEX IF NOT EXISTS idx_events_name ON events(event_name);
  `);

  return db;
}

/**
 * Last fully processed block, or null if ingestion never completed a range.
 */
export function getCheckpoint(db: Database.Database): number | null {
  const row = db
    .prepare<[], { last_indexed_block: number }>('SELECT last_indexed_block FROM indexer_state WHERE id = 1')
    .get();
  return row ? row.last_indexed_block : null;
}

/**
 * Persist the checkpoint. Never moves it backwards.
 */
export function setCheckpoint(db: Database.Database, blockNumber: number): number {
  db.prepare(`
    INSERT INTO indexer_state (id, last_indexed_block, updated_at)
    VALUES (1, ?, strftime('%s', 'now'))
    ON CONFLICT(id) DO UPDATE SET
      last_indexed_block = MAX(last_indexed_block, excluded.last_indexed_block),
      updated_at = excluded.updated_at
  `).run(blockNumber);
  return getCheckpoint(db) ?? blockNumber;
}

/**
 * Prune journal entries written more than maxAgeSec seconds ago.
 * Returns the number of deleted rows.
 */
export function pruneEvents(db: Database.Database, maxAgeSec: number, now: number = Math.floor(Date.now() / 1000)): number {
  const cutoff = now - maxAgeSec;
  const result = db.prepare('DELETE FROM events WHERE timestamp < ?').run(cutoff);
  return result.changes;
}
