/**
 * StakeVote HTTP API
 * Express app for project creation, staking, finalization and withdrawal
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import {
  ErrorCodes,
  StakeVoteError,
  bigintReplacer,
  parseAmount,
  type StakeVote,
} from '../stakevote/index.js';
import type {
  CreateProjectRequest,
  ProjectStatus,
  StakeVoteEventType,
} from '../stakevote/types.js';
import { securityHeaders, requestLogging, rateLimiter, clientAddress } from './middleware/security.js';
import { requireSignature, getCaller, captureRawBody, type SignedRequestOptions } from './middleware/auth.js';

export interface AppOptions {
  /** Mutating requests allowed per verified caller per minute */
  rateLimitRequests?: number;
  /** Mutating requests allowed per client address per minute, counted before signatures are checked */
  addressRateLimitRequests?: number;
  disableLogging?: boolean;
  enableHSTS?: boolean;
  signature?: SignedRequestOptions;
}

const PROJECT_STATUSES: readonly ProjectStatus[] = ['scheduled', 'voting', 'awaiting-finalization', 'finalized'];
const EVENT_TYPES: readonly StakeVoteEventType[] = ['project-created', 'vote-cast', 'project-finalized', 'tokens-unstaked'];

function isProjectStatus(value: unknown): value is ProjectStatus {
  return PROJECT_STATUSES.some(s => s === value);
}

function isEventType(value: unknown): value is StakeVoteEventType {
  return EVENT_TYPES.some(t => t === value);
}

function parseOptionalInt(value: unknown, name: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = typeof value === 'string' && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new StakeVoteError(`${name} must be a positive integer`, ErrorCodes.VALIDATION_ERROR);
  }
  return parsed;
}

/**
 * Send an error response; StakeVoteErrors carry their own status code
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof StakeVoteError) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }
  console.error(`Error ${context}:`, error);
  res.status(500).json({ error: 'Internal server error' });
}

export function createApp(stakevote: StakeVote, options: AppOptions = {}): express.Express {
  const app = express();

  // Token amounts are bigint; send them as decimal strings
  app.set('json replacer', bigintReplacer);

  // ============= Middleware =============

  app.use(securityHeaders({ enableHSTS: options.enableHSTS ?? false }));
  app.use(cors());
  app.use(express.json({ verify: captureRawBody }));
  app.use(requestLogging(options.disableLogging));

  // Unverified traffic is counted by address; the per-caller budget is only
  // spent once the signature checks out
  const addressLimiter = rateLimiter(60000, options.addressRateLimitRequests ?? 120, clientAddress);
  const callerLimiter = rateLimiter(60000, options.rateLimitRequests ?? 30, (_req, res) => `key:${getCaller(res)}`);
  const signed = [addressLimiter, requireSignature(options.signature), callerLimiter];

  // ============= Health & Info =============

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const status = await stakevote.healthCheck();
      res.status(status.healthy ? 200 : 503).json(status);
    } catch (error) {
      sendError(res, error, 'checking health');
    }
  });

  app.get('/api/info', (_req: Request, res: Response) => {
    res.json({
      name: 'StakeVote',
      version: '0.1.0',
      description: 'Token-weighted staking and voting',
      identity: stakevote.identity.publicKey,
      admin: stakevote.getAdminRequirements(),
      adminKey: stakevote.adminGate.adminKey,
    });
  });

  // ============= Project Endpoints =============

  /**
   * POST /api/projects - Create a project (admin)
   */
  app.post('/api/projects', signed, async (req: Request, res: Response) => {
    try {
      const request: CreateProjectRequest = {
        name: req.body.name,
        description: req.body.description ?? '',
        startTime: req.body.startTime,
        durationMs: req.body.durationMs,
      };

      const project = await stakevote.createProject(request, getCaller(res));
      res.status(201).json(project);
    } catch (error) {
      sendError(res, error, 'creating project');
    }
  });

  /**
   * GET /api/projects - List projects, newest first
   */
  app.get('/api/projects', async (req: Request, res: Response) => {
    try {
      const status = req.query.status;
      if (status !== undefined && !isProjectStatus(status)) {
        res.status(400).json({ error: `Unknown status: ${String(status)}`, code: 'VALIDATION_ERROR' });
        return;
      }

      const projects = await stakevote.listProjects({
        status,
        limit: parseOptionalInt(req.query.limit, 'limit'),
      });
      res.json(projects);
    } catch (error) {
      sendError(res, error, 'listing projects');
    }
  });

  app.get('/api/projects/count', async (_req: Request, res: Response) => {
    try {
      res.json({ total: await stakevote.getTotalProjects() });
    } catch (error) {
      sendError(res, error, 'counting projects');
    }
  });

  app.get('/api/projects/:id', async (req: Request, res: Response) => {
    try {
      res.json(await stakevote.getProject(parseInt(req.params.id, 10)));
    } catch (error) {
      sendError(res, error, 'getting project');
    }
  });

  app.get('/api/projects/:id/status', async (req: Request, res: Response) => {
    try {
      res.json(await stakevote.getProjectStatus(parseInt(req.params.id, 10)));
    } catch (error) {
      sendError(res, error, 'getting project status');
    }
  });

  app.get('/api/projects/:id/voters', async (req: Request, res: Response) => {
    try {
      res.json(await stakevote.getVoters(parseInt(req.params.id, 10)));
    } catch (error) {
      sendError(res, error, 'getting voters');
    }
  });

  // ============= Staking Endpoints =============

  /**
   * POST /api/projects/:id/vote - Stake tokens as the signing key
   */
  app.post('/api/projects/:id/vote', signed, async (req: Request, res: Response) => {
    try {
      const outcome = await stakevote.vote({
        projectId: parseInt(req.params.id, 10),
        participant: getCaller(res),
        amount: parseAmount(req.body.amount),
      });
      res.status(201).json(outcome);
    } catch (error) {
      sendError(res, error, 'casting vote');
    }
  });

  /**
   * POST /api/projects/:id/finalize - Close voting and pick the winner (admin)
   */
  app.post('/api/projects/:id/finalize', signed, async (req: Request, res: Response) => {
    try {
      const project = await stakevote.finalizeProject(parseInt(req.params.id, 10), getCaller(res));
      res.json(project);
    } catch (error) {
      sendError(res, error, 'finalizing project');
    }
  });

  /**
   * POST /api/projects/:id/unstake - Withdraw the signing key's stake
   */
  app.post('/api/projects/:id/unstake', signed, async (req: Request, res: Response) => {
    try {
      const receipt = await stakevote.unstakeTokens(parseInt(req.params.id, 10), getCaller(res));
      res.json(receipt);
    } catch (error) {
      sendError(res, error, 'unstaking');
    }
  });

  app.get('/api/projects/:id/stakes/:participant', async (req: Request, res: Response) => {
    try {
      const projectId = parseInt(req.params.id, 10);
      const stake = await stakevote.getStake(projectId, req.params.participant);
      const unstakeable = await stakevote.getUnstakeableBalance(projectId, req.params.participant);
      res.json({ stake, unstakeable });
    } catch (error) {
      sendError(res, error, 'getting stake');
    }
  });

  app.get('/api/participants/:participant', async (req: Request, res: Response) => {
    try {
      const totalStaked = await stakevote.getTotalStaked(req.params.participant);
      res.json({ participant: req.params.participant, totalStaked });
    } catch (error) {
      sendError(res, error, 'getting participant');
    }
  });

  // ============= Events =============

  app.get('/api/events', async (req: Request, res: Response) => {
    try {
      const type = req.query.type;
      if (type !== undefined && !isEventType(type)) {
        res.status(400).json({ error: `Unknown event type: ${String(type)}`, code: 'VALIDATION_ERROR' });
        return;
      }

      const events = await stakevote.getEvents({
        projectId: parseOptionalInt(req.query.projectId, 'projectId'),
        type,
        limit: parseOptionalInt(req.query.limit, 'limit'),
      });
      res.json(events);
    } catch (error) {
      sendError(res, error, 'listing events');
    }
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
