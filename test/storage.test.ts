/**
 * Store tests, run against both backends
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SQLiteStore, InMemoryStore } from '../src/stakevote/storage.js';
import type { NewProject, StakeVoteStore } from '../src/stakevote/types.js';

const T0 = 1_735_689_600_000;

function newProject(name: string): NewProject {
  return {
    name,
    description: '',
    startTime: T0 + 1000,
    endTime: T0 + 2000,
    totalVotes: 0n,
    isActive: true,
    isFinalized: false,
    winner: null,
    createdAt: T0,
    finalizedAt: null,
  };
}

const backends: [string, () => StakeVoteStore][] = [
  ['InMemoryStore', () => new InMemoryStore()],
  ['SQLiteStore', () => new SQLiteStore(':memory:')],
];

describe.each(backends)('%s', (_name, createStore) => {
  let store: StakeVoteStore;

  beforeEach(() => {
    store = createStore();
  });

  afterEach(() => {
    store.close?.();
  });

  describe('projects', () => {
    it('should assign sequential ids starting at 1', async () => {
      const first = await store.insertProject(newProject('First'));
      const second = await store.insertProject(newProject('Second'));

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(await store.countProjects()).toBe(2);
    });

    it('should round-trip every field', async () => {
      const created = await store.insertProject(newProject('Round trip'));

      expect(await store.getProject(created.id)).toEqual({ ...newProject('Round trip'), id: 1 });
      expect(await store.getProject(99)).toBeNull();
    });

    it('should list newest first', async () => {
      await store.insertProject(newProject('A'));
      await store.insertProject(newProject('B'));
      await store.insertProject(newProject('C'));

      const all = await store.listProjects();
      expect(all.map(p => p.name)).toEqual(['C', 'B', 'A']);

      const limited = await store.listProjects({ limit: 2 });
      expect(limited.map(p => p.id)).toEqual([3, 2]);
    });

    it('should finalize a project once', async () => {
      const project = await store.insertProject(newProject('Final'));

      await store.finalizeProject({ projectId: project.id, winner: 'alice', finalizedAt: T0 + 3000 });

      expect(await store.getProject(project.id)).toMatchObject({
        isActive: false,
        isFinalized: true,
        winner: 'alice',
        finalizedAt: T0 + 3000,
      });
      await expect(
        store.finalizeProject({ projectId: project.id, winner: 'bob', finalizedAt: T0 + 4000 })
      ).rejects.toThrow('is missing or already finalized');
      expect((await store.getProject(project.id))?.winner).toBe('alice');
    });
  });

  describe('stakes', () => {
    beforeEach(async () => {
      await store.insertProject(newProject('Staked'));
      await store.insertProject(newProject('Other'));
    });

    it('should record a first stake', async () => {
      const outcome = await store.recordStake({ projectId: 1, participant: 'alice', amount: 6n, timestamp: T0 + 1100 });

      expect(outcome).toEqual({
        stake: {
          projectId: 1,
          participant: 'alice',
          amount: 6n,
          firstStakeTime: T0 + 1100,
          lastStakeTime: T0 + 1100,
          hasUnstaked: false,
        },
        firstStake: true,
        totalVotes: 6n,
        totalStaked: 6n,
      });
    });

    it('should accumulate repeat stakes', async () => {
      await store.recordStake({ projectId: 1, participant: 'alice', amount: 2n, timestamp: T0 + 1100 });
      const outcome = await store.recordStake({ projectId: 1, participant: 'alice', amount: 3n, timestamp: T0 + 1200 });

      expect(outcome.firstStake).toBe(false);
      expect(outcome.stake.amount).toBe(5n);
      expect(outcome.stake.firstStakeTime).toBe(T0 + 1100);
      expect(outcome.stake.lastStakeTime).toBe(T0 + 1200);
      expect((await store.getProject(1))?.totalVotes).toBe(5n);
    });

    it('should list stakes in the order participants first staked', async () => {
      await store.recordStake({ projectId: 1, participant: 'carol', amount: 1n, timestamp: T0 + 1100 });
      await store.recordStake({ projectId: 1, participant: 'alice', amount: 1n, timestamp: T0 + 1200 });
      await store.recordStake({ projectId: 1, participant: 'carol', amount: 1n, timestamp: T0 + 1300 });
      await store.recordStake({ projectId: 1, participant: 'bob', amount: 1n, timestamp: T0 + 1400 });

      const stakes = await store.getStakesByProject(1);
      expect(stakes.map(s => s.participant)).toEqual(['carol', 'alice', 'bob']);
      expect(stakes.map(s => s.amount)).toEqual([2n, 1n, 1n]);
    });

    it('should keep a running total per participant across projects', async () => {
      await store.recordStake({ projectId: 1, participant: 'alice', amount: 4n, timestamp: T0 + 1100 });
      const outcome = await store.recordStake({ projectId: 2, participant: 'alice', amount: 3n, timestamp: T0 + 1200 });

      expect(outcome.totalStaked).toBe(7n);
      expect(await store.getTotalStaked('alice')).toBe(7n);
      expect(await store.getTotalStaked('nobody')).toBe(0n);
    });

    it('should reject a stake on a missing project', async () => {
      await expect(
        store.recordStake({ projectId: 42, participant: 'alice', amount: 1n, timestamp: T0 })
      ).rejects.toThrow('Project 42 not found');
      expect(await store.getTotalStaked('alice')).toBe(0n);
    });

    it('should mark and revert a withdrawal', async () => {
      await store.recordStake({ projectId: 1, participant: 'alice', amount: 6n, timestamp: T0 + 1100 });
      await store.recordStake({ projectId: 2, participant: 'alice', amount: 1n, timestamp: T0 + 1100 });

      await store.markUnstaked(1, 'alice');
      expect((await store.getStake(1, 'alice'))?.hasUnstaked).toBe(true);
      expect(await store.getTotalStaked('alice')).toBe(1n);
      await expect(store.markUnstaked(1, 'alice')).rejects.toThrow('already in that state');

      await store.revertUnstake(1, 'alice');
      expect((await store.getStake(1, 'alice'))?.hasUnstaked).toBe(false);
      expect(await store.getTotalStaked('alice')).toBe(7n);
    });

    it('should refuse to mark a missing stake', async () => {
      await expect(store.markUnstaked(1, 'nobody')).rejects.toThrow('No stake for nobody on project 1');
    });
  });

  describe('events', () => {
    beforeEach(async () => {
      await store.saveEvent({
        id: 'evt-1',
        type: 'project-created',
        projectId: 1,
        timestamp: T0,
        payload: { name: 'One', startTime: T0 + 1000, endTime: T0 + 2000 },
      });
      await store.saveEvent({
        id: 'evt-2',
        type: 'vote-cast',
        projectId: 1,
        timestamp: T0 + 1100,
        payload: { participant: 'alice', amount: 6n, stake: 6n, totalVotes: 6n },
      });
      await store.saveEvent({
        id: 'evt-3',
        type: 'project-finalized',
        projectId: 2,
        timestamp: T0 + 2100,
        payload: { winner: null, winningStake: 0n, totalVotes: 0n },
      });
    });

    it('should return events in the order they were saved', async () => {
      const events = await store.getEvents();
      expect(events.map(e => e.id)).toEqual(['evt-1', 'evt-2', 'evt-3']);
    });

    it('should restore bigint payloads', async () => {
      const [event] = await store.getEvents({ type: 'vote-cast' });

      expect(event).toEqual({
        id: 'evt-2',
        type: 'vote-cast',
        projectId: 1,
        timestamp: T0 + 1100,
        payload: { participant: 'alice', amount: 6n, stake: 6n, totalVotes: 6n },
      });
    });

    it('should filter by project and limit', async () => {
      expect((await store.getEvents({ projectId: 1 })).map(e => e.id)).toEqual(['evt-1', 'evt-2']);
      expect((await store.getEvents({ projectId: 2 })).map(e => e.id)).toEqual(['evt-3']);
      expect((await store.getEvents({ limit: 1 })).map(e => e.id)).toEqual(['evt-1']);
    });
  });
});
