import 'dotenv/config';
import { ViemLedgerClient } from './chain/viem-ledger';
import { loadConfig, type IndexerConfig } from './config';
import { initDatabase, pruneEvents } from './db/schema';
import { getStats } from './db/queries';
import { ConfigError, errorMessage } from './errors';
import { createIdentityListener } from './handlers/identity';
import { createReputationListener } from './handlers/reputation';
import { OraclePublisher } from './oracle/publisher';
import { ChainPoller } from './poller';
import { ScoreAggregator } from './scoring/aggregator';

// Journal entries older than this are dropped at startup
const EVENT_RETENTION_SEC = 30 * 24 * 60 * 60;

function readConfig(): IndexerConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const config = readConfig();

  console.log('[indexer] Initializing database...');
  const db = initDatabase(config.dbPath);
  const pruned = pruneEvents(db, EVENT_RETENTION_SEC);
  if (pruned > 0) console.log(`[indexer] Pruned ${pruned} journal entries`);

  const aggregator = new ScoreAggregator(db, { halfLifeDays: config.halfLifeDays });

  if (args.includes('--scores')) {
    const summary = aggregator.computeAllScores();
    const stats = getStats(db);
    console.log(`[scoring] ${summary.computed} agents scored, ${stats.pendingPublication} pending publication`);
    db.close();
    process.exitCode = summary.failures.length > 0 ? 1 : 0;
    return;
  }

  const ledger = new ViemLedgerClient({
    rpcUrls: config.rpcUrls,
    chainId: config.chainId,
    privateKey: config.oracle?.privateKey,
  });

  const publisher = config.oracle ? new OraclePublisher(db, ledger, aggregator, config.oracle) : null;

  if (args.includes('--once')) {
    if (!publisher) {
      console.error('[oracle] ORACLE_CONTRACT is not set; nothing to publish');
      db.close();
      process.exitCode = 1;
      return;
    }
    const pushed = await publisher.runUpdateCycle();
    console.log(`[oracle] Update cycle complete: ${pushed} scores pushed`);
    db.close();
    return;
  }

  const poller = new ChainPoller(
    db,
    ledger,
    [
      createIdentityListener(db, config.contracts.identityRegistry),
      createReputationListener(db, config.contracts.reputationRegistry),
    ],
    { batchSize: config.batchSize, pollIntervalMs: config.pollIntervalMs, startBlock: config.startBlock },
  );

  const controller = new AbortController();
  const shutdown = (): void => {
    if (controller.signal.aborted) return;
    console.log('\n[indexer] Shutting down...');
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  if (publisher) {
    console.log(`[oracle] Publishing as ${ledger.signerAddress ?? 'unknown signer'}`);
  } else {
    console.log('[oracle] ORACLE_CONTRACT not set, publication disabled');
  }

  const stats = getStats(db);
  console.log(`[indexer] ${stats.totalAgents} agents, ${stats.totalFeedback} feedback, checkpoint ${stats.lastIndexedBlock}`);
  console.log('[indexer] Agent trust indexer started');

  await Promise.all([
    poller.run(controller.signal),
    publisher ? publisher.runDaemon(controller.signal) : Promise.resolve(),
  ]);

  db.close();
  console.log('[indexer] Database closed');
}

main()
  .then(() => process.exit())
  .catch((err: unknown) => {
    console.error(`[indexer] Fatal: ${errorMessage(err)}`);
    process.exit(1);
  });
