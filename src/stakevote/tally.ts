/**
 * Finalization and winner selection
 */

import type {
  Project,
  Participant,
  StakeRecord,
  StakeVoteStore,
} from './types.js';
import { ErrorCodes, StakeVoteError, type ErrorCode } from './types.js';
import type { Clock } from './clock.js';
import type { AdminGate } from './access.js';
import type { EventLog } from './events.js';
import type { ExecutionGuard } from './guard.js';
import type { ProjectManager } from './project.js';

export interface WinnerSelection {
  winner: Participant | null;
  winningStake: bigint;
}

/**
 * Single pass over stakes in voter order. Only a strictly larger stake
 * replaces the current leader, so a tie goes to whoever staked first.
 */
export function selectWinner(stakes: StakeRecord[]): WinnerSelection {
  let winner: Participant | null = null;
  let winningStake = 0n;

  for (const stake of stakes) {
    if (stake.amount > winningStake) {
      winner = stake.participant;
      winningStake = stake.amount;
    }
  }

  return { winner, winningStake };
}

export class TallyManager {
  constructor(
    private store: StakeVoteStore,
    private projectManager: ProjectManager,
    private events: EventLog,
    private guard: ExecutionGuard,
    private adminGate: AdminGate,
    private clock: Clock
  ) {}

  /**
   * Close a project and record its winner (admin only)
   */
  async finalizeProject(projectId: number, caller: string): Promise<Project> {
    return this.guard.run('finalizeProject', async () => {
      this.adminGate.assert(caller, 'finalizeProject');

      const project = await this.projectManager.getProject(projectId);

      if (project.isFinalized) {
        throw new TallyError('Project is already finalized', ErrorCodes.PROJECT_ALREADY_FINALIZED, 409);
      }

      const now = this.clock.now();
      if (!this.projectManager.hasEnded(project, now)) {
        throw new TallyError(
          `Voting period ends at ${new Date(project.endTime).toISOString()}`,
          ErrorCodes.INVALID_VOTING_PERIOD,
          409
        );
      }

      if (project.totalVotes <= 0n) {
        throw new TallyError('No votes have been cast on this project', ErrorCodes.NO_VOTES_CAST, 409);
      }

      const stakes = await this.store.getStakesByProject(projectId);
      const { winner, winningStake } = selectWinner(stakes);

      await this.store.finalizeProject({ projectId, winner, finalizedAt: now });

      await this.events.record({
        type: 'project-finalized',
        projectId,
        timestamp: now,
        payload: {
          winner,
          winningStake,
          totalVotes: project.totalVotes,
        },
      });

      return {
        ...project,
        isActive: false,
        isFinalized: true,
        winner,
        finalizedAt: now,
      };
    });
  }

  /**
   * Voters in the order they first staked
   */
  async getVoters(projectId: number): Promise<Participant[]> {
    await this.projectManager.getProject(projectId);
    const stakes = await this.store.getStakesByProject(projectId);
    return stakes.map(s => s.participant);
  }
}

/**
 * Finalization error
 */
export class TallyError extends StakeVoteError {
  constructor(message: string, code: ErrorCode, statusCode: number = 400) {
    super(message, code, statusCode);
    this.name = 'TallyError';
  }
}
