import Database from 'better-sqlite3';
import type { Address } from 'viem';
import { z } from 'zod';
import type { RawEvent } from '../chain/ledger';
import { AGENT_URI_UPDATED_EVENT, METADATA_SET_EVENT, REGISTERED_EVENT, URI_UPDATED_EVENT } from '../chain/abi';
import { getAgent, insertAgent, logEvent, touchAgent, updateAgentUri } from '../db/queries';
import type { Agent } from '../types';
import { shortAddress, type EventListener, type HandleResult } from './listener';

export type IdentityMutation =
  | { kind: 'register'; agent: Agent }
  | { kind: 'uri'; agentId: string; metadataURI: string; blockNumber: number; blockTime: number }
  | { kind: 'metadata'; agentId: string; key: string; blockNumber: number; blockTime: number };

const registeredArgs = z.object({
  agentId: z.bigint(),
  agentURI: z.string().default(''),
  owner: z.string(),
});

const uriUpdatedArgs = z.object({
  agentId: z.bigint(),
  newURI: z.string().default(''),
});

const legacyUriUpdatedArgs = z.object({
  agentId: z.bigint(),
  agentURI: z.string().default(''),
});

const metadataSetArgs = z.object({
  agentId: z.bigint(),
  metadataKey: z.string().default(''),
});

/**
 * Map one identity-registry log to the store mutation it implies.
 * Returns null for unknown events or arguments that fail validation.
 */
export function mapIdentityEvent(event: RawEvent, blockTime: number): IdentityMutation | null {
  switch (event.eventName) {
    case 'Registered': {
      const args = registeredArgs.safeParse(event.args);
      if (!args.success) return null;
      return {
        kind: 'register',
        agent: {
          id: args.data.agentId.toString(),
          owner: args.data.owner.toLowerCase(),
          metadataURI: args.data.agentURI,
          registrationBlock: event.blockNumber,
          registrationTx: event.transactionHash,
          lastEventBlock: event.blockNumber,
          createdAt: blockTime,
          updatedAt: blockTime,
        },
      };
    }
    case 'URIUpdated': {
      const args = uriUpdatedArgs.safeParse(event.args);
      if (!args.success) return null;
      return {
        kind: 'uri',
        agentId: args.data.agentId.toString(),
        metadataURI: args.data.newURI,
        blockNumber: event.blockNumber,
        blockTime,
      };
    }
    case 'AgentURIUpdated': {
      const args = legacyUriUpdatedArgs.safeParse(event.args);
      if (!args.success) return null;
      return {
        kind: 'uri',
        agentId: args.data.agentId.toString(),
        metadataURI: args.data.agentURI,
        blockNumber: event.blockNumber,
        blockTime,
      };
    }
    case 'MetadataSet': {
      const args = metadataSetArgs.safeParse(event.args);
      if (!args.success) return null;
      return {
        kind: 'metadata',
        agentId: args.data.agentId.toString(),
        key: args.data.metadataKey,
        blockNumber: event.blockNumber,
        blockTime,
      };
    }
    default:
      return null;
  }
}

export function applyIdentityMutation(db: Database.Database, mutation: IdentityMutation): HandleResult {
  switch (mutation.kind) {
    case 'register':
      return applyRegister(db, mutation.agent);
    case 'uri':
      return applyUriUpdate(db, mutation.agentId, mutation.metadataURI, mutation.blockNumber, mutation.blockTime);
    case 'metadata':
      return applyMetadataSet(db, mutation.agentId, mutation.key, mutation.blockNumber, mutation.blockTime);
  }
}

function applyRegister(db: Database.Database, agent: Agent): HandleResult {
  const existing = getAgent(db, agent.id);
  if (!existing) {
    insertAgent(db, agent);
    console.log(`[identity] New agent registered: ${agent.id} (owner ${shortAddress(agent.owner)})`);
    return 'applied';
  }

  // Registration fields are immutable; a repeated Registered only refreshes the URI
  if (agent.registrationBlock < existing.lastEventBlock) return 'stale';
  if (existing.metadataURI === agent.metadataURI) {
    console.log(`[identity] Agent ${agent.id} already registered`);
    return 'duplicate';
  }

  updateAgentUri(db, agent.id, agent.metadataURI, agent.registrationBlock, agent.updatedAt);
  console.log(`[identity] Agent ${agent.id} re-registered, metadata URI refreshed`);
  return 'applied';
}

function applyUriUpdate(
  db: Database.Database,
  agentId: string,
  metadataURI: string,
  blockNumber: number,
  blockTime: number,
): HandleResult {
  const existing = getAgent(db, agentId);
  if (!existing) {
    console.warn(`[identity] URI update for unknown agent: ${agentId}`);
    return 'missing';
  }
  if (blockNumber < existing.lastEventBlock) return 'stale';
  if (existing.metadataURI === metadataURI) return 'duplicate';

  updateAgentUri(db, agentId, metadataURI, blockNumber, blockTime);
  console.log(`[identity] URI updated for agent: ${agentId}`);
  return 'applied';
}

function applyMetadataSet(
  db: Database.Database,
  agentId: string,
  key: string,
  blockNumber: number,
  blockTime: number,
): HandleResult {
  const existing = getAgent(db, agentId);
  if (!existing) {
    console.warn(`[identity] Metadata update for unknown agent: ${agentId}`);
    return 'missing';
  }
  if (blockNumber <= existing.lastEventBlock && blockTime <= existing.updatedAt) return 'duplicate';

  touchAgent(db, agentId, blockNumber, blockTime);
  console.log(`[identity] Metadata "${key}" set for agent: ${agentId}`);
  return 'applied';
}

export function handleIdentityEvent(db: Database.Database, event: RawEvent, blockTime: number): HandleResult {
  const mutation = mapIdentityEvent(event, blockTime);
  if (!mutation) {
    if (event.eventName === REGISTERED_EVENT.name || event.eventName === URI_UPDATED_EVENT.name ||
        event.eventName === AGENT_URI_UPDATED_EVENT.name || event.eventName === METADATA_SET_EVENT.name) {
      console.warn(`[identity] Skipping ${event.eventName} with unexpected arguments (tx ${event.transactionHash})`);
      return 'invalid';
    }
    console.log(`[identity] Unknown identity event: ${event.eventName}`);
    return 'ignored';
  }

  const apply = db.transaction((m: IdentityMutation): HandleResult => {
    const result = applyIdentityMutation(db, m);
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

export function createIdentityListener(db: Database.Database, address: Address): EventListener {
  return {
    name: 'identity',
    address,
    events: [REGISTERED_EVENT, URI_UPDATED_EVENT, AGENT_URI_UPDATED_EVENT, METADATA_SET_EVENT],
    handle: (event, blockTime) => handleIdentityEvent(db, event, blockTime),
  };
}
