/**
 * Stake withdrawal after finalization
 *
 * The stake is marked withdrawn before the ledger credit is attempted, so a
 * credit that calls back into the engine sees it as already unstaked.
 * A credit the ledger refuses reverts the mark. A credit that throws may have
 * been applied, so the mark stays and the payout is settled through its
 * reference on the ledger side.
 */

import type {
  Participant,
  Project,
  StakeRecord,
  StakeVoteStore,
  UnstakeReceipt,
} from './types.js';
import { ErrorCodes, StakeVoteError, WINNER_MULTIPLIER, type ErrorCode } from './types.js';
import type { Clock } from './clock.js';
import type { EventLog } from './events.js';
import type { ExecutionGuard } from './guard.js';
import type { ProjectManager } from './project.js';
import { LedgerError, type LedgerAdapter } from './adapters/ledger.js';

/**
 * Payout owed for a stake on a finalized project
 */
export function computePayout(project: Project, stake: StakeRecord): bigint {
  return project.winner === stake.participant
    ? stake.amount * WINNER_MULTIPLIER
    : stake.amount;
}

/**
 * Ledger reference for a payout; one per stake, so a repeat is never paid twice
 */
export function payoutReference(projectId: number, participant: Participant): string {
  return `unstake:${projectId}:${participant}`;
}

export class UnstakeManager {
  constructor(
    private store: StakeVoteStore,
    private projectManager: ProjectManager,
    private ledger: LedgerAdapter,
    private events: EventLog,
    private guard: ExecutionGuard,
    private clock: Clock
  ) {}

  /**
   * Withdraw a participant's stake (plus the winner bonus, if any)
   */
  async unstakeTokens(projectId: number, participant: Participant): Promise<UnstakeReceipt> {
    return this.guard.run('unstakeTokens', async () => {
      const project = await this.projectManager.getProject(projectId);

      const now = this.clock.now();
      if (!this.projectManager.hasEnded(project, now)) {
        throw new UnstakeError(
          `Voting period ends at ${new Date(project.endTime).toISOString()}`,
          ErrorCodes.INVALID_VOTING_PERIOD,
          409
        );
      }

      if (!project.isFinalized) {
        throw new UnstakeError('Project has not been finalized', ErrorCodes.PROJECT_NOT_FINALIZED, 409);
      }

      const stake = await this.store.getStake(projectId, participant);
      if (!stake || stake.amount <= 0n) {
        throw new UnstakeError('No stake to withdraw on this project', ErrorCodes.NO_VOTES_CAST, 409);
      }

      if (stake.hasUnstaked) {
        throw new UnstakeError('Stake has already been withdrawn', ErrorCodes.ALREADY_UNSTAKED, 409);
      }

      const payout = computePayout(project, stake);
      const isWinner = project.winner === participant;

      // Effects before the external call
      await this.store.markUnstaked(projectId, participant);

      const reference = payoutReference(projectId, participant);
      let credited: boolean;
      try {
        credited = await this.ledger.credit(participant, payout, reference);
      } catch (error) {
        console.error(`[Unstake] Payout ${reference} outcome unknown, stake stays withdrawn:`, error);
        throw error;
      }

      if (!credited) {
        await this.store.revertUnstake(projectId, participant);
        throw new LedgerError(`Payout of ${payout} to ${participant} was rejected by the ledger`);
      }

      await this.events.record({
        type: 'tokens-unstaked',
        projectId,
        timestamp: now,
        payload: { participant, payout, isWinner },
      });

      return { projectId, participant, amount: stake.amount, payout, isWinner };
    });
  }

  /**
   * What unstakeTokens would pay right now; 0 when nothing is withdrawable
   */
  async getUnstakeableBalance(projectId: number, participant: Participant): Promise<bigint> {
    const project = await this.projectManager.getProject(projectId);

    if (!this.projectManager.hasEnded(project) || !project.isFinalized) {
      return 0n;
    }

    const stake = await this.store.getStake(projectId, participant);
    if (!stake || stake.hasUnstaked) {
      return 0n;
    }

    return computePayout(project, stake);
  }
}

/**
 * Unstake-specific error
 */
export class UnstakeError extends StakeVoteError {
  constructor(message: string, code: ErrorCode, statusCode: number = 400) {
    super(message, code, statusCode);
    this.name = 'UnstakeError';
  }
}
