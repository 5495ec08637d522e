import Database from 'better-sqlite3';
import type { Address } from 'viem';
import { z } from 'zod';
import type { RawEvent } from '../chain/ledger';
import { FEEDBACK_REVOKED_EVENT, NEW_FEEDBACK_EVENT } from '../chain/abi';
import { getFeedback, insertFeedback, logEvent, revokeFeedback } from '../db/queries';
import type { Feedback } from '../types';
import { shortAddress, type EventListener, type HandleResult } from './listener';

const ZERO_HASH = `0x${'0'.repeat(64)}`;

export type ReputationMutation =
  | { kind: 'feedback'; feedback: Feedback }
  | { kind: 'revoke'; feedbackId: string; subject: string };

const newFeedbackArgs = z.object({
  agentId: z.bigint(),
  clientAddress: z.string(),
  feedbackIndex: z.bigint(),
  value: z.bigint(),
  valueDecimals: z.number().int().min(0).max(255),
  tag1: z.string().default(''),
  tag2: z.string().default(''),
  endpoint: z.string().default(''),
  feedbackURI: z.string().default(''),
  feedbackHash: z.string().optional(),
});

const feedbackRevokedArgs = z.object({
  agentId: z.bigint(),
  clientAddress: z.string(),
  feedbackIndex: z.bigint(),
});

/**
 * Feedback is keyed by (agent, client, index); the registry assigns the
 * index per client, so the triple is unique and stable across replays.
 */
export function makeFeedbackId(agentId: bigint | string, clientAddress: string, feedbackIndex: bigint | string): string {
  return `${agentId.toString()}-${clientAddress.toLowerCase()}-${feedbackIndex.toString()}`;
}

function optionalText(value: string): string | null {
  return value === '' ? null : value;
}

export function mapReputationEvent(event: RawEvent, blockTime: number): ReputationMutation | null {
  switch (event.eventName) {
    case 'NewFeedback': {
      const parsed = newFeedbackArgs.safeParse(event.args);
      if (!parsed.success) return null;
      const args = parsed.data;
      const hash = args.feedbackHash && args.feedbackHash !== ZERO_HASH ? args.feedbackHash : null;

      return {
        kind: 'feedback',
        feedback: {
          id: makeFeedbackId(args.agentId, args.clientAddress, args.feedbackIndex),
          subject: args.agentId.toString(),
          author: args.clientAddress.toLowerCase(),
          feedbackIndex: args.feedbackIndex.toString(),
          tag1: optionalText(args.tag1),
          tag2: optionalText(args.tag2),
          tag3: optionalText(args.endpoint),
          value: args.value,
          valueDecimals: args.valueDecimals,
          comment: optionalText(args.feedbackURI),
          feedbackHash: hash,
          revoked: false,
          blockNumber: event.blockNumber,
          txHash: event.transactionHash,
          timestamp: blockTime,
        },
      };
    }
    case 'FeedbackRevoked': {
      const parsed = feedbackRevokedArgs.safeParse(event.args);
      if (!parsed.success) return null;
      return {
        kind: 'revoke',
        feedbackId: makeFeedbackId(parsed.data.agentId, parsed.data.clientAddress, parsed.data.feedbackIndex),
        subject: parsed.data.agentId.toString(),
      };
    }
    default:
      return null;
  }
}

export function applyReputationMutation(db: Database.Database, mutation: ReputationMutation): HandleResult {
  switch (mutation.kind) {
    case 'feedback': {
      const { feedback } = mutation;
      if (!insertFeedback(db, feedback)) {
        return 'duplicate';
      }
      console.log(
        `[reputation] Feedback ${feedback.id}: ${shortAddress(feedback.author)} -> agent ${feedback.subject} (value ${feedback.value.toString()}, decimals ${feedback.valueDecimals})`,
      );
      return 'applied';
    }
    case 'revoke': {
      if (revokeFeedback(db, mutation.feedbackId)) {
        console.log(`[reputation] Feedback ${mutation.feedbackId} on agent ${mutation.subject} revoked`);
        return 'applied';
      }
      if (getFeedback(db, mutation.feedbackId)) {
        return 'duplicate';
      }
      console.warn(`[reputation] Revocation for unknown feedback: ${mutation.feedbackId}`);
      return 'missing';
    }
  }
}

export function handleReputationEvent(db: Database.Database, event: RawEvent, blockTime: number): HandleResult {
  const mutation = mapReputationEvent(event, blockTime);
  if (!mutation) {
    if (event.eventName === NEW_FEEDBACK_EVENT.name || event.eventName === FEEDBACK_REVOKED_EVENT.name) {
      console.warn(`[reputation] Skipping ${event.eventName} with unexpected arguments (tx ${event.transactionHash})`);
      return 'invalid';
    }
    console.log(`[reputation] Unknown reputation event: ${event.eventName}`);
    return 'ignored';
  }

  const apply = db.transaction((m: ReputationMutation): HandleResult => {
    const result = applyReputationMutation(db, m);
    if (result === 'applied') {
      logEvent(db, {
        blockNumber: event.blockNumber,
        txHash: event.transactionHash,
        logIndex: event.logIndex,
        eventName: event.eventName,
        contract: event.address,
        data: event.args,
        blockTime,
      });
    }
    return result;
  });

  return apply(mutation);
}

export function createReputationListener(db: Database.Database, address: Address): EventListener {
  return {
    name: 'reputation',
    address,
    events: [NEW_FEEDBACK_EVENT, FEEDBACK_REVOKED_EVENT],
    handle: (event, blockTime) => handleReputationEvent(db, event, blockTime),
  };
}
