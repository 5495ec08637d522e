// ============== Domain records ==============

export interface Agent {
  /** Registry token id as a base-10 string */
  id: string;
  owner: string;
  metadataURI: string;
  registrationBlock: number;
  registrationTx: string;
  /** Unix seconds */
  createdAt: number;
  /** Unix seconds, never moves backwards */
  updatedAt: number;
  lastEventBlock: number;
}

export interface Feedback {
  /** `${subject}-${author}-${feedbackIndex}` */
  id: string;
  subject: string;
  author: string;
  feedbackIndex: string;
  tag1: string | null;
  tag2: string | null;
  /** Endpoint the feedback was given for */
  tag3: string | null;
  value: bigint;
  valueDecimals: number;
  /** Feedback URI */
  comment: string | null;
  feedbackHash: string | null;
  revoked: boolean;
  blockNumber: number;
  txHash: string;
  /** Block time, unix seconds */
  timestamp: number;
}

export interface CategoryScore {
  score: number;
  count: number;
}

export type CategoryScores = Record<string, CategoryScore>;

export interface ComputedScore {
  agentId: string;
  /** 0-100, two decimals */
  overallScore: number;
  feedbackCount: number;
  positiveCount: number;
  negativeCount: number;
  categoryScores: CategoryScores;
  /** Unix seconds */
  computedAt: number;
  pushedToChain: boolean;
  pushedAt: number | null;
}

export interface IndexerStats {
  totalAgents: number;
  totalFeedback: number;
  revokedFeedback: number;
  scoredAgents: number;
  pendingPublication: number;
  lastIndexedBlock: number;
}

// ============== Query options ==============

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface AgentListOptions extends PageOptions {
  owner?: string;
}

export interface FeedbackListOptions extends PageOptions {
  includeRevoked?: boolean;
}

export interface LeaderboardOptions extends PageOptions {
  minFeedback?: number;
}

// ============== Outcomes ==============

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export function succeeded<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failed<T>(err: unknown): Outcome<T> {
  return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
}
