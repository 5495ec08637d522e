import { z } from 'zod';
import { isAddress, isHex, type Address, type Hex } from 'viem';
import { ConfigError } from './errors';

export interface OracleConfig {
  address: Address;
  privateKey: Hex;
  batchSize: number;
  minScoreChange: number;
  confirmTimeoutMs: number;
  batchDelayMs: number;
  updateIntervalMs: number;
}

export interface IndexerConfig {
  rpcUrls: string[];
  chainId: number;
  dbPath: string;
  contracts: {
    identityRegistry: Address;
    reputationRegistry: Address;
  };
  startBlock: number;
  batchSize: number;
  pollIntervalMs: number;
  halfLifeDays: number;
  /** Absent when no oracle contract is configured; publication is then disabled */
  oracle: OracleConfig | null;
}

const address = z
  .string()
  .trim()
  .refine((v): v is Address => isAddress(v, { strict: false }), { message: 'not a valid address' });

const privateKey = z
  .string()
  .trim()
  .refine((v): v is Hex => isHex(v) && v.length === 66, { message: 'must be a 0x-prefixed 32-byte hex key' });

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const num = (fallback: number) => z.coerce.number().positive().default(fallback);

const envSchema = z.object({
  RPC_URL: z
    .string()
    .default('http://127.0.0.1:8545')
    .transform((v) => v.split(',').map((u) => u.trim()).filter((u) => u.length > 0))
    .pipe(z.array(z.string().url()).min(1)),
  CHAIN_ID: int(1, 1),
  DB_PATH: z.string().min(1).default('./data/trust_scores.db'),
  IDENTITY_REGISTRY: address,
  REPUTATION_REGISTRY: address,
  ORACLE_CONTRACT: address.optional(),
  ORACLE_PRIVATE_KEY: privateKey.optional(),
  INDEXER_START_BLOCK: int(0),
  INDEXER_BATCH_SIZE: int(1000, 1),
  INDEXER_POLL_INTERVAL_MS: int(12_000, 1),
  SCORE_HALF_LIFE_DAYS: num(90),
  ORACLE_BATCH_SIZE: int(50, 1),
  ORACLE_MIN_SCORE_CHANGE: z.coerce.number().min(0).default(1.0),
  ORACLE_CONFIRM_TIMEOUT_MS: int(120_000, 1),
  ORACLE_BATCH_DELAY_MS: int(2_000),
  ORACLE_UPDATE_INTERVAL_MS: int(6 * 60 * 60 * 1000, 1),
});

/**
 * Build the process configuration from environment variables.
 * Empty strings count as unset. Every problem is reported at once.
 */
export function loadConfig(env: Record<string, string | undefined>): IndexerConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  if (e.ORACLE_CONTRACT && !e.ORACLE_PRIVATE_KEY) {
    throw new ConfigError(['ORACLE_PRIVATE_KEY: required when ORACLE_CONTRACT is set']);
  }

  return {
    rpcUrls: e.RPC_URL,
    chainId: e.CHAIN_ID,
    dbPath: e.DB_PATH,
    contracts: {
      identityRegistry: e.IDENTITY_REGISTRY,
      reputationRegistry: e.REPUTATION_REGISTRY,
    },
    startBlock: e.INDEXER_START_BLOCK,
    batchSize: e.INDEXER_BATCH_SIZE,
    pollIntervalMs: e.INDEXER_POLL_INTERVAL_MS,
    halfLifeDays: e.SCORE_HALF_LIFE_DAYS,
    oracle:
      e.ORACLE_CONTRACT && e.ORACLE_PRIVATE_KEY
        ? {
            address: e.ORACLE_CONTRACT,
            privateKey: e.ORACLE_PRIVATE_KEY,
            batchSize: e.ORACLE_BATCH_SIZE,
            minScoreChange: e.ORACLE_MIN_SCORE_CHANGE,
            confirmTimeoutMs: e.ORACLE_CONFIRM_TIMEOUT_MS,
            batchDelayMs: e.ORACLE_BATCH_DELAY_MS,
            updateIntervalMs: e.ORACLE_UPDATE_INTERVAL_MS,
          }
        : null,
  };
}
