/**
 * Amount and event encoding
 * Token amounts are bigint in memory and decimal strings everywhere else
 */

import type { StakeVoteEvent } from './types.js';
import { ErrorCodes, StakeVoteError } from './types.js';

const AMOUNT_PATTERN = /^\d+$/;

/**
 * Parse a non-negative decimal amount from user input
 */
export function parseAmount(value: unknown): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && AMOUNT_PATTERN.test(value.trim())) {
    return BigInt(value.trim());
  }
  throw new StakeVoteError(
    'Amount must be a non-negative integer (decimal string)',
    ErrorCodes.VALIDATION_ERROR
  );
}

/**
 * Reject page sizes below 1; undefined means no limit
 */
export function assertLimit(limit: number | undefined): void {
  if (limit !== undefined && (!Number.isSafeInteger(limit) || limit < 1)) {
    throw new StakeVoteError('Limit must be a positive integer', ErrorCodes.VALIDATION_ERROR);
  }
}

/**
 * JSON.stringify replacer that writes bigint as a decimal string
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, bigintReplacer);
}

// Stored event payloads (amounts as strings)
interface StoredVoteCast {
  participant: string;
  amount: string;
  stake: string;
  totalVotes: string;
}

interface StoredProjectFinalized {
  winner: string | null;
  winningStake: string;
  totalVotes: string;
}

interface StoredTokensUnstaked {
  participant: string;
  payout: string;
  isWinner: boolean;
}

interface StoredProjectCreated {
  name: string;
  startTime: number;
  endTime: number;
}

export interface EventRow {
  id: string;
  type: string;
  project_id: number;
  timestamp: number;
  payload: string;
}

export function encodeEvent(event: StakeVoteEvent): EventRow {
  return {
    id: event.id,
    type: event.type,
    project_id: event.projectId,
    timestamp: event.timestamp,
    payload: toJson(event.payload),
  };
}

export function decodeEvent(row: EventRow): StakeVoteEvent {
  const base = { id: row.id, projectId: row.project_id, timestamp: row.timestamp };

  switch (row.type) {
    case 'project-created': {
      const payload: StoredProjectCreated = JSON.parse(row.payload);
      return { ...base, type: 'project-created', payload };
    }
    case 'vote-cast': {
      const payload: StoredVoteCast = JSON.parse(row.payload);
      return {
        ...base,
        type: 'vote-cast',
        payload: {
          participant: payload.participant,
          amount: BigInt(payload.amount),
          stake: BigInt(payload.stake),
          totalVotes: BigInt(payload.totalVotes),
        },
      };
    }
    case 'project-finalized': {
      const payload: StoredProjectFinalized = JSON.parse(row.payload);
      return {
        ...base,
        type: 'project-finalized',
        payload: {
          winner: payload.winner,
          winningStake: BigInt(payload.winningStake),
          totalVotes: BigInt(payload.totalVotes),
        },
      };
    }
    case 'tokens-unstaked': {
      const payload: StoredTokensUnstaked = JSON.parse(row.payload);
      return {
        ...base,
        type: 'tokens-unstaked',
        payload: {
          participant: payload.participant,
          payout: BigInt(payload.payout),
          isWinner: payload.isWinner,
        },
      };
    }
    default:
      throw new Error(`Unknown event type: ${row.type}`);
  }
}
