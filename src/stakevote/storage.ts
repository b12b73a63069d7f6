/**
 * Storage implementation using SQLite
 *
 * Amounts are stored as decimal TEXT so that bigint values round-trip exactly.
 * Every multi-row update runs inside a single transaction.
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type {
  Project,
  NewProject,
  StakeRecord,
  StakeEntry,
  StakeOutcome,
  Finalization,
  StakeVoteEvent,
  EventQuery,
  StakeVoteStore,
  Participant,
} from './types.js';
import { decodeEvent, encodeEvent, type EventRow } from './codec.js';

export class SQLiteStore implements StakeVoteStore {
  private db: Database.Database;
  private applyStake: (entry: StakeEntry) => StakeOutcome;
  private setUnstaked: (projectId: number, participant: Participant, unstaked: boolean) => void;

  constructor(dbPath: string) {
    // Ensure the directory exists
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initialize();

    this.applyStake = this.db.transaction((entry: StakeEntry) => this.applyStakeRows(entry));
    this.setUnstaked = this.db.transaction(
      (projectId: number, participant: Participant, unstaked: boolean) =>
        this.setUnstakedRows(projectId, participant, unstaked)
    );
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        description TEXT NOT NULL,
        start_time INTEGER NOT NULL,
        end_time INTEGER NOT NULL,
        total_votes TEXT NOT NULL DEFAULT '0',
        is_active INTEGER NOT NULL DEFAULT 1,
        is_finalized INTEGER NOT NULL DEFAULT 0,
        winner TEXT,
        created_at INTEGER NOT NULL,
        finalized_at INTEGER
      );

      CREATE TABLE IF NOT EXISTS stakes (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        project_id INTEGER NOT NULL,
        participant TEXT NOT NULL,
        amount TEXT NOT NULL,
        first_stake_time INTEGER NOT NULL,
        last_stake_time INTEGER NOT NULL,
        has_unstaked INTEGER NOT NULL DEFAULT 0,
        FOREIGN KEY (project_id) REFERENCES projects(id),
        UNIQUE(project_id, participant)
      );

      CREATE INDEX IF NOT EXISTS idx_stakes_project ON stakes(project_id, seq);

      CREATE TABLE IF NOT EXISTS participant_totals (
        participant TEXT PRIMARY KEY,
        total_staked TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        type TEXT NOT NULL,
        project_id INTEGER NOT NULL,
        timestamp INTEGER NOT NULL,
        payload TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_events_project ON events(project_id);
    `);
  }

  // Project operations

  async insertProject(project: NewProject): Promise<Project> {
    const stmt = this.db.prepare(`
      INSERT INTO projects
      (name, description, start_time, end_time, total_votes, is_active, is_finalized, winner, created_at, finalized_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const info = stmt.run(
      project.name,
      project.description,
      project.startTime,
      project.endTime,
      project.totalVotes.toString(),
      project.isActive ? 1 : 0,
      project.isFinalized ? 1 : 0,
      project.winner,
      project.createdAt,
      project.finalizedAt
    );

    return { ...project, id: Number(info.lastInsertRowid) };
  }

  async getProject(id: number): Promise<Project | null> {
    const stmt = this.db.prepare('SELECT * FROM projects WHERE id = ?');
    const row = stmt.get(id) as ProjectRow | undefined;

    if (!row) return null;

    return this.rowToProject(row);
  }

  async countProjects(): Promise<number> {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM projects').get() as { count: number };
    return row.count;
  }

  async listProjects(options?: { limit?: number }): Promise<Project[]> {
    let query = 'SELECT * FROM projects ORDER BY id DESC';
    const params: number[] = [];

    if (options?.limit) {
      query += ' LIMIT ?';
      params.push(options.limit);
    }

    const rows = this.db.prepare(query).all(...params) as ProjectRow[];
    return rows.map(row => this.rowToProject(row));
  }

  async finalizeProject(finalization: Finalization): Promise<void> {
    const stmt = this.db.prepare(`
      UPDATE projects
      SET is_active = 0, is_finalized = 1, winner = ?, finalized_at = ?
      WHERE id = ? AND is_finalized = 0
    `);
    const info = stmt.run(finalization.winner, finalization.finalizedAt, finalization.projectId);
    if (info.changes !== 1) {
      throw new Error(`Project ${finalization.projectId} is missing or already finalized`);
    }
  }

  // Stake operations

  async recordStake(entry: StakeEntry): Promise<StakeOutcome> {
    return this.applyStake(entry);
  }

  async getStake(projectId: number, participant: Participant): Promise<StakeRecord | null> {
    const stmt = this.db.prepare('SELECT * FROM stakes WHERE project_id = ? AND participant = ?');
    const row = stmt.get(projectId, participant) as StakeRow | undefined;

    if (!row) return null;

    return this.rowToStake(row);
  }

  async getStakesByProject(projectId: number): Promise<StakeRecord[]> {
    const stmt = this.db.prepare('SELECT * FROM stakes WHERE project_id = ? ORDER BY seq');
    const rows = stmt.all(projectId) as StakeRow[];

    return rows.map(row => this.rowToStake(row));
  }

  async markUnstaked(projectId: number, participant: Participant): Promise<void> {
    this.setUnstaked(projectId, participant, true);
  }

  async revertUnstake(projectId: number, participant: Participant): Promise<void> {
    this.setUnstaked(projectId, participant, false);
  }

  async getTotalStaked(participant: Participant): Promise<bigint> {
    return this.readTotal(participant);
  }

  // Event operations

  async saveEvent(event: StakeVoteEvent): Promise<void> {
    const row = encodeEvent(event);
    const stmt = this.db.prepare(`
      INSERT INTO events (id, type, project_id, timestamp, payload)
      VALUES (?, ?, ?, ?, ?)
    `);

    stmt.run(row.id, row.type, row.project_id, row.timestamp, row.payload);
  }

  async getEvents(query?: EventQuery): Promise<StakeVoteEvent[]> {
    const clauses: string[] = [];
    const params: (string | number)[] = [];

    if (query?.projectId !== undefined) {
      clauses.push('project_id = ?');
      params.push(query.projectId);
    }
    if (query?.type) {
      clauses.push('type = ?');
      params.push(query.type);
    }

    let sql = 'SELECT id, type, project_id, timestamp, payload FROM events';
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`;
    }
    sql += ' ORDER BY seq';
    if (query?.limit) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    const rows = this.db.prepare(sql).all(...params) as EventRow[];
    return rows.map(decodeEvent);
  }

  // Transaction bodies

  private applyStakeRows(entry: StakeEntry): StakeOutcome {
    const project = this.db
      .prepare('SELECT total_votes FROM projects WHERE id = ?')
      .get(entry.projectId) as { total_votes: string } | undefined;
    if (!project) {
      throw new Error(`Project ${entry.projectId} not found`);
    }

    const existing = this.db
      .prepare('SELECT * FROM stakes WHERE project_id = ? AND participant = ?')
      .get(entry.projectId, entry.participant) as StakeRow | undefined;

    const firstStake = !existing || BigInt(existing.amount) === 0n;
    const amount = (existing ? BigInt(existing.amount) : 0n) + entry.amount;

    if (existing) {
      this.db.prepare(`
        UPDATE stakes SET amount = ?, last_stake_time = ?, has_unstaked = 0
        WHERE project_id = ? AND participant = ?
      `).run(amount.toString(), entry.timestamp, entry.projectId, entry.participant);
    } else {
      this.db.prepare(`
        INSERT INTO stakes (project_id, participant, amount, first_stake_time, last_stake_time, has_unstaked)
        VALUES (?, ?, ?, ?, ?, 0)
      `).run(entry.projectId, entry.participant, amount.toString(), entry.timestamp, entry.timestamp);
    }

    const totalVotes = BigInt(project.total_votes) + entry.amount;
    this.db
      .prepare('UPDATE projects SET total_votes = ? WHERE id = ?')
      .run(totalVotes.toString(), entry.projectId);

    const totalStaked = this.readTotal(entry.participant) + entry.amount;
    this.writeTotal(entry.participant, totalStaked);

    const row = this.db
      .prepare('SELECT * FROM stakes WHERE project_id = ? AND participant = ?')
      .get(entry.projectId, entry.participant) as StakeRow;

    return { stake: this.rowToStake(row), firstStake, totalVotes, totalStaked };
  }

  private setUnstakedRows(projectId: number, participant: Participant, unstaked: boolean): void {
    const row = this.db
      .prepare('SELECT * FROM stakes WHERE project_id = ? AND participant = ?')
      .get(projectId, participant) as StakeRow | undefined;
    if (!row) {
      throw new Error(`No stake for ${participant} on project ${projectId}`);
    }
    if ((row.has_unstaked === 1) === unstaked) {
      throw new Error(`Stake for ${participant} on project ${projectId} is already in that state`);
    }

    this.db
      .prepare('UPDATE stakes SET has_unstaked = ? WHERE seq = ?')
      .run(unstaked ? 1 : 0, row.seq);

    const amount = BigInt(row.amount);
    const total = this.readTotal(participant);
    this.writeTotal(participant, unstaked ? total - amount : total + amount);
  }

  private readTotal(participant: Participant): bigint {
    const row = this.db
      .prepare('SELECT total_staked FROM participant_totals WHERE participant = ?')
      .get(participant) as { total_staked: string } | undefined;
    return row ? BigInt(row.total_staked) : 0n;
  }

  private writeTotal(participant: Participant, total: bigint): void {
    this.db.prepare(`
      INSERT INTO participant_totals (participant, total_staked) VALUES (?, ?)
      ON CONFLICT(participant) DO UPDATE SET total_staked = excluded.total_staked
    `).run(participant, total.toString());
  }

  // Utilities

  private rowToProject(row: ProjectRow): Project {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      startTime: row.start_time,
      endTime: row.end_time,
      totalVotes: BigInt(row.total_votes),
      isActive: row.is_active === 1,
      isFinalized: row.is_finalized === 1,
      winner: row.winner,
      createdAt: row.created_at,
      finalizedAt: row.finalized_at,
    };
  }

  private rowToStake(row: StakeRow): StakeRecord {
    return {
      projectId: row.project_id,
      participant: row.participant,
      amount: BigInt(row.amount),
      firstStakeTime: row.first_stake_time,
      lastStakeTime: row.last_stake_time,
      hasUnstaked: row.has_unstaked === 1,
    };
  }

  close(): void {
    this.db.close();
  }
}

/**
 * In-memory store for testing
 */
export class InMemoryStore implements StakeVoteStore {
  private projects = new Map<number, Project>();
  // Map iteration order is insertion order, which is the voter order
  private stakes = new Map<number, Map<Participant, StakeRecord>>();
  private totals = new Map<Participant, bigint>();
  private events: StakeVoteEvent[] = [];
  private nextId = 1;

  async insertProject(project: NewProject): Promise<Project> {
    const stored: Project = { ...project, id: this.nextId++ };
    this.projects.set(stored.id, stored);
    return { ...stored };
  }

  async getProject(id: number): Promise<Project | null> {
    const project = this.projects.get(id);
    return project ? { ...project } : null;
  }

  async countProjects(): Promise<number> {
    return this.projects.size;
  }

  async listProjects(options?: { limit?: number }): Promise<Project[]> {
    let projects = Array.from(this.projects.values())
      .sort((a, b) => b.id - a.id)
      .map(p => ({ ...p }));

    if (options?.limit) {
      projects = projects.slice(0, options.limit);
    }

    return projects;
  }

  async finalizeProject(finalization: Finalization): Promise<void> {
    const project = this.projects.get(finalization.projectId);
    if (!project || project.isFinalized) {
      throw new Error(`Project ${finalization.projectId} is missing or already finalized`);
    }
    project.isActive = false;
    project.isFinalized = true;
    project.winner = finalization.winner;
    project.finalizedAt = finalization.finalizedAt;
  }

  async recordStake(entry: StakeEntry): Promise<StakeOutcome> {
    const project = this.projects.get(entry.projectId);
    if (!project) {
      throw new Error(`Project ${entry.projectId} not found`);
    }

    const byParticipant = this.stakes.get(entry.projectId) ?? new Map<Participant, StakeRecord>();
    const existing = byParticipant.get(entry.participant);
    const firstStake = !existing || existing.amount === 0n;

    const stake: StakeRecord = existing ?? {
      projectId: entry.projectId,
      participant: entry.participant,
      amount: 0n,
      firstStakeTime: entry.timestamp,
      lastStakeTime: entry.timestamp,
      hasUnstaked: false,
    };
    stake.amount += entry.amount;
    stake.lastStakeTime = entry.timestamp;
    stake.hasUnstaked = false;

    byParticipant.set(entry.participant, stake);
    this.stakes.set(entry.projectId, byParticipant);

    project.totalVotes += entry.amount;
    const totalStaked = (this.totals.get(entry.participant) ?? 0n) + entry.amount;
    this.totals.set(entry.participant, totalStaked);

    return { stake: { ...stake }, firstStake, totalVotes: project.totalVotes, totalStaked };
  }

  async getStake(projectId: number, participant: Participant): Promise<StakeRecord | null> {
    const stake = this.stakes.get(projectId)?.get(participant);
    return stake ? { ...stake } : null;
  }

  async getStakesByProject(projectId: number): Promise<StakeRecord[]> {
    const byParticipant = this.stakes.get(projectId);
    return byParticipant ? Array.from(byParticipant.values(), s => ({ ...s })) : [];
  }

  async markUnstaked(projectId: number, participant: Participant): Promise<void> {
    this.setUnstaked(projectId, participant, true);
  }

  async revertUnstake(projectId: number, participant: Participant): Promise<void> {
    this.setUnstaked(projectId, participant, false);
  }

  async getTotalStaked(participant: Participant): Promise<bigint> {
    return this.totals.get(participant) ?? 0n;
  }

  async saveEvent(event: StakeVoteEvent): Promise<void> {
    this.events.push(event);
  }

  async getEvents(query?: EventQuery): Promise<StakeVoteEvent[]> {
    let events = this.events.filter(e =>
      (query?.projectId === undefined || e.projectId === query.projectId) &&
      (!query?.type || e.type === query.type)
    );

    if (query?.limit) {
      events = events.slice(0, query.limit);
    }

    return events;
  }

  clear(): void {
    this.projects.clear();
    this.stakes.clear();
    this.totals.clear();
    this.events = [];
    this.nextId = 1;
  }

  private setUnstaked(projectId: number, participant: Participant, unstaked: boolean): void {
    const stake = this.stakes.get(projectId)?.get(participant);
    if (!stake) {
      throw new Error(`No stake for ${participant} on project ${projectId}`);
    }
    if (stake.hasUnstaked === unstaked) {
      throw new Error(`Stake for ${participant} on project ${projectId} is already in that state`);
    }

    stake.hasUnstaked = unstaked;
    const total = this.totals.get(participant) ?? 0n;
    this.totals.set(participant, unstaked ? total - stake.amount : total + stake.amount);
  }
}

// Row types for SQLite
interface ProjectRow {
  id: number;
  name: string;
  description: string;
  start_time: number;
  end_time: number;
  total_votes: string;
  is_active: number;
  is_finalized: number;
  winner: string | null;
  created_at: number;
  finalized_at: number | null;
}

interface StakeRow {
  seq: number;
  project_id: number;
  participant: string;
  amount: string;
  first_stake_time: number;
  last_stake_time: number;
  has_unstaked: number;
}
