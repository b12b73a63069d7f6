/**
 * StakeVote Core Types
 * Token-weighted staking and voting - stake behind a project, winner takes double
 */

// Identities
export type PublicKey = string;  // hex-encoded 32 bytes
export type PrivateKey = string; // hex-encoded 32 bytes
export type Signature = string;  // hex-encoded 64 bytes
export type Hash = string;       // hex-encoded 32 bytes

/** Participant identity as seen by the ledger (a public key on the HTTP surface) */
export type Participant = string;

export interface KeyPair {
  publicKey: PublicKey;
  privateKey: PrivateKey;
}

// Project lifecycle states (derived from flags and the clock)
export type ProjectStatus = 'scheduled' | 'voting' | 'awaiting-finalization' | 'finalized';

// A voting campaign
export interface Project {
  id: number;
  name: string;
  description: string;
  startTime: number;
  endTime: number;            // startTime + duration
  totalVotes: bigint;
  isActive: boolean;
  isFinalized: boolean;
  winner: Participant | null;
  createdAt: number;
  finalizedAt: number | null;
}

export type NewProject = Omit<Project, 'id'>;

// Per-project, per-participant stake
export interface StakeRecord {
  projectId: number;
  participant: Participant;
  amount: bigint;
  firstStakeTime: number;
  lastStakeTime: number;
  hasUnstaked: boolean;
}

/** Bookkeeping for one successful vote, applied atomically by the store */
export interface StakeEntry {
  projectId: number;
  participant: Participant;
  amount: bigint;
  timestamp: number;
}

export interface StakeOutcome {
  stake: StakeRecord;
  firstStake: boolean;
  totalVotes: bigint;
  totalStaked: bigint;
}

export interface Finalization {
  projectId: number;
  winner: Participant | null;
  finalizedAt: number;
}

// Observability events for external indexers
export interface ProjectCreatedPayload {
  name: string;
  startTime: number;
  endTime: number;
}

export interface VoteCastPayload {
  participant: Participant;
  amount: bigint;
  stake: bigint;
  totalVotes: bigint;
}

export interface ProjectFinalizedPayload {
  winner: Participant | null;
  winningStake: bigint;
  totalVotes: bigint;
}

export interface TokensUnstakedPayload {
  participant: Participant;
  payout: bigint;
  isWinner: boolean;
}

interface EventBase<T extends string, P> {
  id: string;
  type: T;
  projectId: number;
  timestamp: number;
  payload: P;
}

export type ProjectCreatedEvent = EventBase<'project-created', ProjectCreatedPayload>;
export type VoteCastEvent = EventBase<'vote-cast', VoteCastPayload>;
export type ProjectFinalizedEvent = EventBase<'project-finalized', ProjectFinalizedPayload>;
export type TokensUnstakedEvent = EventBase<'tokens-unstaked', TokensUnstakedPayload>;

export type StakeVoteEvent =
  | ProjectCreatedEvent
  | VoteCastEvent
  | ProjectFinalizedEvent
  | TokensUnstakedEvent;

export type StakeVoteEventType = StakeVoteEvent['type'];

export interface EventQuery {
  projectId?: number;
  type?: StakeVoteEventType;
  limit?: number;
}

// Storage interface
export interface StakeVoteStore {
  // Projects
  insertProject(project: NewProject): Promise<Project>;
  getProject(id: number): Promise<Project | null>;
  countProjects(): Promise<number>;
  listProjects(options?: { limit?: number }): Promise<Project[]>;
  finalizeProject(finalization: Finalization): Promise<void>;

  // Stakes
  recordStake(entry: StakeEntry): Promise<StakeOutcome>;
  getStake(projectId: number, participant: Participant): Promise<StakeRecord | null>;
  /** Stake records in voter insertion order */
  getStakesByProject(projectId: number): Promise<StakeRecord[]>;
  markUnstaked(projectId: number, participant: Participant): Promise<void>;
  revertUnstake(projectId: number, participant: Participant): Promise<void>;
  getTotalStaked(participant: Participant): Promise<bigint>;

  // Events
  saveEvent(event: StakeVoteEvent): Promise<void>;
  getEvents(query?: EventQuery): Promise<StakeVoteEvent[]>;

  close?(): void;
}

// Configuration
export interface StakeVoteConfig {
  /** Administrator public key (defaults to the node identity) */
  adminPublicKey?: string;

  // External ledger
  ledgerUrl: string;
  ledgerTimeoutMs?: number;

  // Limits
  maxNameLength: number;
  maxDescriptionLength: number;

  // Storage
  dataDir: string;
}

// API request/response types
export interface CreateProjectRequest {
  name: string;
  description: string;
  startTime: number;
  durationMs: number;
}

export interface CastStakeRequest {
  projectId: number;
  participant: Participant;
  amount: bigint;
}

export interface UnstakeReceipt {
  projectId: number;
  participant: Participant;
  amount: bigint;
  payout: bigint;
  isWinner: boolean;
}

export interface ProjectStatusReport {
  project: Project;
  status: ProjectStatus;
  voterCount: number;
  isAcceptingVotes: boolean;
  startsIn: number;
  timeRemaining: number;
}

// Error types
export class StakeVoteError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = 'StakeVoteError';
  }
}

export const ErrorCodes = {
  PROJECT_NOT_FOUND: 'PROJECT_NOT_FOUND',
  INVALID_SCHEDULE: 'INVALID_SCHEDULE',
  PROJECT_NOT_ACTIVE: 'PROJECT_NOT_ACTIVE',
  PROJECT_ALREADY_FINALIZED: 'PROJECT_ALREADY_FINALIZED',
  INVALID_VOTING_PERIOD: 'INVALID_VOTING_PERIOD',
  INSUFFICIENT_ALLOWANCE: 'INSUFFICIENT_ALLOWANCE',
  NO_VOTES_CAST: 'NO_VOTES_CAST',
  ALREADY_UNSTAKED: 'ALREADY_UNSTAKED',
  PROJECT_NOT_FINALIZED: 'PROJECT_NOT_FINALIZED',
  UNAUTHORIZED: 'UNAUTHORIZED',
  REENTRANT_CALL: 'REENTRANT_CALL',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  LEDGER_ERROR: 'LEDGER_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/** Payout multiplier applied to the winner's stake */
export const WINNER_MULTIPLIER = 2n;
