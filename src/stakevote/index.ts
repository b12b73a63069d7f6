/**
 * StakeVote - Token-weighted staking and voting
 *
 * Participants lock tokens behind a project while its window is open.
 * The administrator finalizes it afterwards; the largest stake wins.
 * Everyone withdraws their principal, the winner withdraws double.
 */

import { Crypto } from './crypto.js';
import { systemClock, type Clock } from './clock.js';
import { AdminGate, type GateRequirements } from './access.js';
import { EventLog, type EventHandler } from './events.js';
import { ExecutionGuard } from './guard.js';
import { ProjectManager, type ProjectManagerConfig } from './project.js';
import { VoteManager } from './vote.js';
import { TallyManager } from './tally.js';
import { UnstakeManager } from './unstake.js';
import { SQLiteStore, InMemoryStore } from './storage.js';
import {
  HttpLedgerAdapter,
  InMemoryLedger,
  type LedgerAdapter,
} from './adapters/ledger.js';
import type {
  Project,
  ProjectStatus,
  ProjectStatusReport,
  StakeRecord,
  StakeOutcome,
  StakeVoteEvent,
  EventQuery,
  KeyPair,
  Participant,
  StakeVoteStore,
  StakeVoteConfig,
  CreateProjectRequest,
  CastStakeRequest,
  UnstakeReceipt,
} from './types.js';

export interface StakeVoteOptions {
  config: StakeVoteConfig;
  identity?: KeyPair;
  store?: StakeVoteStore;
  ledger?: LedgerAdapter;
  clock?: Clock;
}

/**
 * Main StakeVote class - coordinates all staking operations
 */
export class StakeVote {
  readonly identity: KeyPair;
  readonly store: StakeVoteStore;
  readonly ledger: LedgerAdapter;
  readonly clock: Clock;

  readonly projectManager: ProjectManager;
  readonly voteManager: VoteManager;
  readonly tallyManager: TallyManager;
  readonly unstakeManager: UnstakeManager;
  readonly events: EventLog;

  readonly adminGate: AdminGate;
  private guard = new ExecutionGuard();

  private config: StakeVoteConfig;

  constructor(options: StakeVoteOptions) {
    this.config = options.config;

    // Generate or use provided identity
    this.identity = options.identity ?? Crypto.generateKeyPair();

    this.store = options.store ?? this.createStore();
    this.ledger = options.ledger ?? this.createLedgerAdapter();
    this.clock = options.clock ?? systemClock;

    this.adminGate = new AdminGate(this.config.adminPublicKey ?? this.identity.publicKey);
    this.events = new EventLog(this.store);

    const projectConfig: ProjectManagerConfig = {
      maxNameLength: this.config.maxNameLength,
      maxDescriptionLength: this.config.maxDescriptionLength,
    };

    this.projectManager = new ProjectManager(
      this.store,
      this.events,
      this.guard,
      this.adminGate,
      this.clock,
      projectConfig
    );

    this.voteManager = new VoteManager(
      this.store,
      this.projectManager,
      this.ledger,
      this.events,
      this.guard,
      this.clock
    );

    this.tallyManager = new TallyManager(
      this.store,
      this.projectManager,
      this.events,
      this.guard,
      this.adminGate,
      this.clock
    );

    this.unstakeManager = new UnstakeManager(
      this.store,
      this.projectManager,
      this.ledger,
      this.events,
      this.guard,
      this.clock
    );
  }

  /**
   * Release the store
   */
  stop(): void {
    this.store.close?.();
    console.log('StakeVote node stopped');
  }

  // ============= Project Operations =============

  /**
   * Create a new project
   * @param caller - Public key of the caller (defaults to instance identity)
   */
  async createProject(request: CreateProjectRequest, caller?: string): Promise<Project> {
    return this.projectManager.createProject(request, caller ?? this.identity.publicKey);
  }

  /**
   * Get a project by ID (throws PROJECT_NOT_FOUND)
   */
  async getProject(id: number): Promise<Project> {
    return this.projectManager.getProject(id);
  }

  async getTotalProjects(): Promise<number> {
    return this.projectManager.getTotalProjects();
  }

  async listProjects(options?: { status?: ProjectStatus; limit?: number }): Promise<Project[]> {
    return this.projectManager.listProjects(options);
  }

  /**
   * Get project status information
   */
  async getProjectStatus(id: number): Promise<ProjectStatusReport> {
    const project = await this.projectManager.getProject(id);
    const voters = await this.tallyManager.getVoters(id);
    const now = this.clock.now();
    const status = this.projectManager.computeStatus(project, now);

    return {
      project,
      status,
      voterCount: voters.length,
      isAcceptingVotes: this.projectManager.isAcceptingVotes(project, now),
      startsIn: project.startTime > now ? project.startTime - now : 0,
      timeRemaining: status === 'voting' ? project.endTime - now : 0,
    };
  }

  async getVoters(projectId: number): Promise<Participant[]> {
    return this.tallyManager.getVoters(projectId);
  }

  // ============= Staking Operations =============

  /**
   * Stake tokens on a project
   */
  async vote(request: CastStakeRequest): Promise<StakeOutcome> {
    return this.voteManager.castVote(request);
  }

  /**
   * Close voting and record the winner
   * @param caller - Public key of the caller (defaults to instance identity)
   */
  async finalizeProject(projectId: number, caller?: string): Promise<Project> {
    return this.tallyManager.finalizeProject(projectId, caller ?? this.identity.publicKey);
  }

  /**
   * Withdraw a stake after finalization
   */
  async unstakeTokens(projectId: number, participant: Participant): Promise<UnstakeReceipt> {
    return this.unstakeManager.unstakeTokens(projectId, participant);
  }

  async getUnstakeableBalance(projectId: number, participant: Participant): Promise<bigint> {
    return this.unstakeManager.getUnstakeableBalance(projectId, participant);
  }

  async getStake(projectId: number, participant: Participant): Promise<StakeRecord | null> {
    await this.projectManager.getProject(projectId);
    return this.store.getStake(projectId, participant);
  }

  async getTotalStaked(participant: Participant): Promise<bigint> {
    return this.store.getTotalStaked(participant);
  }

  // ============= Events =============

  async getEvents(query?: EventQuery): Promise<StakeVoteEvent[]> {
    return this.events.list(query);
  }

  subscribe(handler: EventHandler): () => void {
    return this.events.subscribe(handler);
  }

  // ============= Utilities =============

  getAdminRequirements(): GateRequirements {
    return this.adminGate.getRequirements();
  }

  /**
   * Health check all services
   */
  async healthCheck(): Promise<HealthStatus> {
    const ledgerOk = await this.ledger.healthCheck().catch(() => false);

    return {
      healthy: ledgerOk,
      ledger: ledgerOk,
      identity: this.identity.publicKey,
      admin: this.adminGate.adminKey,
    };
  }

  // ============= Private Methods =============

  private createStore(): StakeVoteStore {
    return new SQLiteStore(`${this.config.dataDir}/stakevote.db`);
  }

  private createLedgerAdapter(): LedgerAdapter {
    return new HttpLedgerAdapter({
      url: this.config.ledgerUrl,
      timeout: this.config.ledgerTimeoutMs,
    });
  }
}

/**
 * Health check status
 */
export interface HealthStatus {
  healthy: boolean;
  ledger: boolean;
  identity: string;
  admin: string;
}

/**
 * Create a StakeVote instance with default configuration
 */
export function createStakeVote(
  configOverrides?: Partial<StakeVoteConfig>,
  options?: Omit<StakeVoteOptions, 'config'>
): StakeVote {
  const config: StakeVoteConfig = {
    adminPublicKey: process.env.ADMIN_PUBLIC_KEY,
    ledgerUrl: process.env.LEDGER_URL ?? 'http://localhost:8545',
    ledgerTimeoutMs: process.env.LEDGER_TIMEOUT_MS
      ? parseInt(process.env.LEDGER_TIMEOUT_MS, 10)
      : undefined,
    maxNameLength: parseInt(process.env.MAX_NAME_LENGTH ?? '200', 10),
    maxDescriptionLength: parseInt(process.env.MAX_DESCRIPTION_LENGTH ?? '2000', 10),
    dataDir: process.env.DATA_DIR ?? './data',
    ...configOverrides,
  };

  const identity = options?.identity ?? (process.env.NODE_PRIVATE_KEY
    ? Crypto.keyPairFromPrivateKey(process.env.NODE_PRIVATE_KEY)
    : undefined);

  if (!identity) {
    console.log('  Identity: ephemeral (no NODE_PRIVATE_KEY configured)');
  }

  return new StakeVote({ ...options, config, identity });
}

/**
 * Create a StakeVote instance for testing (in-memory store and ledger)
 */
export function createTestStakeVote(options?: Omit<StakeVoteOptions, 'config'> & {
  config?: Partial<StakeVoteConfig>;
}): StakeVote {
  const config: StakeVoteConfig = {
    ledgerUrl: 'http://mock',
    maxNameLength: 100,
    maxDescriptionLength: 500,
    dataDir: './test-data',
    ...options?.config,
  };

  return new StakeVote({
    config,
    identity: options?.identity,
    store: options?.store ?? new InMemoryStore(),
    ledger: options?.ledger ?? new InMemoryLedger(),
    clock: options?.clock,
  });
}

// Re-export types and utilities
export { Crypto } from './crypto.js';
export type * from './types.js';
export { StakeVoteError, ErrorCodes, WINNER_MULTIPLIER } from './types.js';
export { ManualClock, systemClock, type Clock } from './clock.js';
export { AdminGate, type GateResult, type GateRequirements } from './access.js';
export { EventLog, type EventHandler, type UnsavedEvent } from './events.js';
export { ExecutionGuard, GuardError } from './guard.js';
export { ProjectManager, ProjectError } from './project.js';
export { VoteManager, VoteError } from './vote.js';
export { TallyManager, TallyError, selectWinner, type WinnerSelection } from './tally.js';
export { UnstakeManager, UnstakeError, computePayout } from './unstake.js';
export { SQLiteStore, InMemoryStore } from './storage.js';
export { parseAmount, toJson, bigintReplacer } from './codec.js';
export {
  HttpLedgerAdapter,
  InMemoryLedger,
  LedgerError,
  type LedgerAdapter,
  type LedgerConfig,
} from './adapters/ledger.js';
