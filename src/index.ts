/**
 * StakeVote - Token-weighted staking and voting
 *
 * Stake behind the project you back. The biggest backer of each project
 * doubles their stake; everyone else gets theirs back.
 */

export {
  StakeVote,
  createStakeVote,
  createTestStakeVote,
  Crypto,
  ManualClock,
  systemClock,
  AdminGate,
  EventLog,
  ExecutionGuard,
  ProjectManager,
  VoteManager,
  TallyManager,
  UnstakeManager,
  SQLiteStore,
  InMemoryStore,
  HttpLedgerAdapter,
  InMemoryLedger,
  StakeVoteError,
  ProjectError,
  VoteError,
  TallyError,
  UnstakeError,
  GuardError,
  LedgerError,
  ErrorCodes,
  WINNER_MULTIPLIER,
  selectWinner,
  computePayout,
  parseAmount,
  toJson,
} from './stakevote/index.js';

export type {
  Project,
  ProjectStatus,
  ProjectStatusReport,
  StakeRecord,
  StakeOutcome,
  StakeVoteEvent,
  StakeVoteEventType,
  EventQuery,
  KeyPair,
  Participant,
  StakeVoteStore,
  StakeVoteConfig,
  StakeVoteOptions,
  CreateProjectRequest,
  CastStakeRequest,
  UnstakeReceipt,
  HealthStatus,
  Clock,
  LedgerAdapter,
  LedgerConfig,
  EventHandler,
  GateResult,
  GateRequirements,
  WinnerSelection,
} from './stakevote/index.js';

export { createApp, type AppOptions } from './web/app.js';
export { requireSignature, signRequest } from './web/middleware/auth.js';
