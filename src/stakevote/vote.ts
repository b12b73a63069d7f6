/**
 * Vote casting logic
 * A vote locks tokens behind a project; the stake is the vote's weight
 *
 * Order of operations:
 * 1. Gate checks (project state, voting window, amount)
 * 2. Ledger debit - nothing is written if it fails
 * 3. Stake bookkeeping in one store transaction
 */

import type {
  CastStakeRequest,
  StakeOutcome,
  StakeVoteStore,
} from './types.js';
import { ErrorCodes, StakeVoteError, type ErrorCode } from './types.js';
import type { Clock } from './clock.js';
import type { EventLog } from './events.js';
import type { ExecutionGuard } from './guard.js';
import type { ProjectManager } from './project.js';
import { v4 as uuidv4 } from 'uuid';
import { LedgerError, type LedgerAdapter } from './adapters/ledger.js';

export class VoteManager {
  constructor(
    private store: StakeVoteStore,
    private projectManager: ProjectManager,
    private ledger: LedgerAdapter,
    private events: EventLog,
    private guard: ExecutionGuard,
    private clock: Clock
  ) {}

  /**
   * Stake `amount` on a project on behalf of `participant`
   */
  async castVote(request: CastStakeRequest): Promise<StakeOutcome> {
    return this.guard.run('vote', async () => {
      const { projectId, participant, amount } = request;

      // 1. Get and validate project
      const project = await this.projectManager.getProject(projectId);

      if (project.isFinalized) {
        throw new VoteError('Project is already finalized', ErrorCodes.PROJECT_ALREADY_FINALIZED, 409);
      }

      if (!project.isActive) {
        throw new VoteError('Project is not active', ErrorCodes.PROJECT_NOT_ACTIVE, 409);
      }

      // 2. Check the voting window
      const now = this.clock.now();
      if (now < project.startTime || now > project.endTime) {
        throw new VoteError(
          `Voting is open from ${new Date(project.startTime).toISOString()} to ${new Date(project.endTime).toISOString()}`,
          ErrorCodes.INVALID_VOTING_PERIOD,
          409
        );
      }

      // 3. Validate amount and participant
      if (typeof amount !== 'bigint' || amount <= 0n) {
        throw new VoteError('Stake amount must be greater than zero', ErrorCodes.NO_VOTES_CAST);
      }

      if (typeof participant !== 'string' || !participant) {
        throw new VoteError('Participant is required', ErrorCodes.VALIDATION_ERROR);
      }

      // 4. Pull the tokens
      const reference = `vote:${uuidv4()}`;
      const debited = await this.ledger.debit(participant, amount, reference);
      if (!debited) {
        throw new VoteError(
          'Ledger rejected the debit: insufficient allowance or balance',
          ErrorCodes.INSUFFICIENT_ALLOWANCE,
          402
        );
      }

      // 5. Record the stake
      let outcome: StakeOutcome;
      try {
        outcome = await this.store.recordStake({ projectId, participant, amount, timestamp: now });
      } catch (error) {
        await this.refund(participant, amount, reference, error);
        throw error;
      }

      await this.events.record({
        type: 'vote-cast',
        projectId,
        timestamp: now,
        payload: {
          participant,
          amount,
          stake: outcome.stake.amount,
          totalVotes: outcome.totalVotes,
        },
      });

      return outcome;
    });
  }

  /**
   * Return a debited amount after bookkeeping failed
   */
  private async refund(participant: string, amount: bigint, reference: string, cause: unknown): Promise<void> {
    const credited = await this.ledger.credit(participant, amount, `refund:${reference}`);
    if (!credited) {
      throw new LedgerError(
        `Refund of ${amount} to ${participant} failed after bookkeeping error: ${
          cause instanceof Error ? cause.message : String(cause)
        }`
      );
    }
  }
}

/**
 * Vote-specific error
 */
export class VoteError extends StakeVoteError {
  constructor(message: string, code: ErrorCode, statusCode: number = 400) {
    super(message, code, statusCode);
    this.name = 'VoteError';
  }
}
