/**
 * In-memory wrapper event log.
 *
 * Append-only, gap-free sequence numbers starting at 1. Subscribers are
 * dispatched synchronously, in subscription order, after the events of
 * a call are appended.
 */

import type { Address } from "viem";
import type { WrapperEvent, WrapperEventBody, WrapperEventType } from "@wardwrap/types";

export type EventHandler = (event: WrapperEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface EventQuery {
  readonly type?: WrapperEventType | undefined;
  /** Only events with a sequence greater than this. */
  readonly after?: number | undefined;
  readonly limit?: number | undefined;
}

export class EventLog {
  private readonly _events: WrapperEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();

  /**
   * Append the events produced by one call and notify subscribers.
   */
  publish(bodies: readonly WrapperEventBody[], caller: Address): readonly WrapperEvent[] {
    const timestamp = new Date().toISOString();
    const published = bodies.map((body) => {
      const event: WrapperEvent = {
        ...body,
        metadata: { sequence: this._events.length + 1, timestamp, caller },
      };
      this._events.push(event);
      return event;
    });

    for (const handler of this._subscribers) {
      for (const event of published) {
        handler(event);
      }
    }

    return published;
  }

  /**
   * Handlers run after the producing call has committed, in subscription
   * order. They must not throw: an exception reaches the caller of that
   * call and skips the remaining handlers, but nothing is rolled back.
   */
  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  /**
   * Events in sequence order, optionally filtered.
   */
  query(filter?: EventQuery): readonly WrapperEvent[] {
    let results: readonly WrapperEvent[] = this._events;

    if (filter?.after !== undefined) {
      const after = filter.after;
      results = results.filter((e) => e.metadata.sequence > after);
    }
    if (filter?.type !== undefined) {
      const type = filter.type;
      results = results.filter((e) => e.type === type);
    }
    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  get size(): number {
    return this._events.length;
  }
}
