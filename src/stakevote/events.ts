/**
 * Event log for external indexers
 * Each successful mutating operation records exactly one event, after its
 * effects are committed
 */

import { v4 as uuidv4 } from 'uuid';
import type { EventQuery, StakeVoteEvent, StakeVoteStore } from './types.js';
import { assertLimit } from './codec.js';

export type EventHandler = (event: StakeVoteEvent) => void;

/** An event before it has been assigned an id */
type Unsaved<E> = E extends unknown ? Omit<E, 'id'> : never;
export type UnsavedEvent = Unsaved<StakeVoteEvent>;

export class EventLog {
  private handlers: Set<EventHandler> = new Set();

  constructor(private store: StakeVoteStore) {}

  /**
   * Persist an event and hand it to subscribers.
   * Called once the operation's effects are committed, so a failed save is
   * logged and the operation still succeeds.
   */
  async record(event: UnsavedEvent): Promise<StakeVoteEvent> {
    const saved: StakeVoteEvent = { ...event, id: uuidv4() };
    try {
      await this.store.saveEvent(saved);
    } catch (e) {
      console.error(`[Events] Failed to save ${saved.type} for project ${saved.projectId}:`, e);
    }

    for (const handler of this.handlers) {
      try {
        handler(saved);
      } catch (e) {
        console.error(`[Events] Handler error for ${saved.type}:`, e);
      }
    }

    return saved;
  }

  /**
   * Subscribe to new events; returns the unsubscribe function
   */
  subscribe(handler: EventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async list(query?: EventQuery): Promise<StakeVoteEvent[]> {
    assertLimit(query?.limit);
    return this.store.getEvents(query);
  }
}
