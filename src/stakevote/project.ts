/**
 * Project creation and registry
 */

import type {
  Project,
  ProjectStatus,
  StakeVoteStore,
  CreateProjectRequest,
} from './types.js';
import { ErrorCodes, StakeVoteError, type ErrorCode } from './types.js';
import { assertLimit } from './codec.js';
import type { Clock } from './clock.js';
import type { AdminGate } from './access.js';
import type { EventLog } from './events.js';
import type { ExecutionGuard } from './guard.js';

export interface ProjectManagerConfig {
  maxNameLength: number;
  maxDescriptionLength: number;
}

export class ProjectManager {
  constructor(
    private store: StakeVoteStore,
    private events: EventLog,
    private guard: ExecutionGuard,
    private adminGate: AdminGate,
    private clock: Clock,
    private config: ProjectManagerConfig
  ) {}

  /**
   * Create a new project (admin only)
   * The voting window is [startTime, startTime + durationMs]
   */
  async createProject(request: CreateProjectRequest, caller: string): Promise<Project> {
    return this.guard.run('createProject', async () => {
      this.adminGate.assert(caller, 'createProject');

      const now = this.clock.now();
      this.validateProjectRequest(request, now);

      const project = await this.store.insertProject({
        name: request.name.trim(),
        description: request.description.trim(),
        startTime: request.startTime,
        endTime: request.startTime + request.durationMs,
        totalVotes: 0n,
        isActive: true,
        isFinalized: false,
        winner: null,
        createdAt: now,
        finalizedAt: null,
      });

      await this.events.record({
        type: 'project-created',
        projectId: project.id,
        timestamp: now,
        payload: {
          name: project.name,
          startTime: project.startTime,
          endTime: project.endTime,
        },
      });

      return project;
    });
  }

  /**
   * Get a project by ID, or null if the ID was never assigned
   */
  async findProject(id: number): Promise<Project | null> {
    if (!Number.isSafeInteger(id) || id < 1) {
      return null;
    }
    return this.store.getProject(id);
  }

  /**
   * Get a project by ID
   */
  async getProject(id: number): Promise<Project> {
    const project = await this.findProject(id);
    if (!project) {
      throw new ProjectError(`Project ${id} not found`, ErrorCodes.PROJECT_NOT_FOUND, 404);
    }
    return project;
  }

  async getTotalProjects(): Promise<number> {
    return this.store.countProjects();
  }

  /**
   * List projects, newest first
   */
  async listProjects(options?: { status?: ProjectStatus; limit?: number }): Promise<Project[]> {
    assertLimit(options?.limit);

    if (!options?.status) {
      return this.store.listProjects({ limit: options?.limit });
    }

    const now = this.clock.now();
    const matching = (await this.store.listProjects())
      .filter(p => this.computeStatus(p, now) === options.status);

    return options.limit ? matching.slice(0, options.limit) : matching;
  }

  /**
   * Compute project status based on current time
   */
  computeStatus(project: Project, now: number = this.clock.now()): ProjectStatus {
    if (project.isFinalized) {
      return 'finalized';
    }
    if (now < project.startTime) {
      return 'scheduled';
    }
    if (now <= project.endTime) {
      return 'voting';
    }
    return 'awaiting-finalization';
  }

  /**
   * Check if a project is accepting stakes (window bounds are inclusive)
   */
  isAcceptingVotes(project: Project, now: number = this.clock.now()): boolean {
    return project.isActive && !project.isFinalized &&
      now >= project.startTime && now <= project.endTime;
  }

  /**
   * Check if the voting window has closed
   */
  hasEnded(project: Project, now: number = this.clock.now()): boolean {
    return now > project.endTime;
  }

  // Private methods

  private validateProjectRequest(request: CreateProjectRequest, now: number): void {
    if (typeof request.name !== 'string' || !request.name.trim()) {
      throw new ProjectError('Name is required', ErrorCodes.VALIDATION_ERROR);
    }

    if (request.name.trim().length > this.config.maxNameLength) {
      throw new ProjectError(
        `Name must be ${this.config.maxNameLength} characters or less`,
        ErrorCodes.VALIDATION_ERROR
      );
    }

    if (typeof request.description !== 'string') {
      throw new ProjectError('Description must be a string', ErrorCodes.VALIDATION_ERROR);
    }

    if (request.description.trim().length > this.config.maxDescriptionLength) {
      throw new ProjectError(
        `Description must be ${this.config.maxDescriptionLength} characters or less`,
        ErrorCodes.VALIDATION_ERROR
      );
    }

    if (!Number.isSafeInteger(request.startTime) || request.startTime <= now) {
      throw new ProjectError('Start time must be in the future', ErrorCodes.INVALID_SCHEDULE);
    }

    if (!Number.isSafeInteger(request.durationMs) || request.durationMs <= 0) {
      throw new ProjectError('Duration must be greater than zero', ErrorCodes.INVALID_SCHEDULE);
    }

    if (!Number.isSafeInteger(request.startTime + request.durationMs)) {
      throw new ProjectError('Voting window is out of range', ErrorCodes.INVALID_SCHEDULE);
    }
  }
}

/**
 * Project registry error
 */
export class ProjectError extends StakeVoteError {
  constructor(message: string, code: ErrorCode, statusCode: number = 400) {
    super(message, code, statusCode);
    this.name = 'ProjectError';
  }
}
