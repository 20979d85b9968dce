/**
 * Kernel event publisher.
 *
 * Numbers and timestamps every event, persists it in the event store,
 * forwards it to sinks (the JSONL log file) and delivers it to subscribers.
 */

import { JsonValue } from '../domain/artifact';
import { Clock, isoAt, systemClock } from '../domain/clock';
import { errorMessage } from '../domain/errors';
import { EventQueryOptions, EventSubscription, KernelEvent, KernelEventType } from '../domain/events';
import { ListResult, Store, toListResult } from '../storage/store';
import { Logger, logger as rootLogger } from '../logger';

/** Destination that receives every published event in order. */
export interface EventSink {
  write(event: KernelEvent): Promise<void>;
  close?(): Promise<void>;
}

export type EventFields = Record<string, JsonValue | undefined>;

export class EventPublisher {
  private subscriptions: EventSubscription[] = [];
  private nextEventNumber = 1;
  private log: Logger;

  constructor(
    private store: Store,
    private clock: Clock = systemClock,
    private sinks: EventSink[] = [],
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'publisher' });
  }

  /** Publish an event. Undefined fields are dropped. */
  async publish(eventType: KernelEventType, fields: EventFields = {}): Promise<KernelEvent> {
    const event: KernelEvent = {
      event_number: this.nextEventNumber++,
      event_type: eventType,
      timestamp: isoAt(this.clock),
    };
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined && !(key in event)) event[key] = value;
    }

    await this.store.events.append(event);

    for (const sink of this.sinks) {
      try {
        await sink.write(event);
      } catch (error) {
        this.log.error('Event sink write failed', {
          eventNumber: event.event_number,
          eventType,
          error: errorMessage(error),
        });
      }
    }

    for (const sub of this.subscriptions) {
      if (!sub.eventTypes?.length || sub.eventTypes.includes(event.event_type)) {
        try {
          sub.callback(event);
        } catch (error) {
          this.log.warn('Event subscriber threw', { subscriptionId: sub.id, error: errorMessage(error) });
        }
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  addSink(sink: EventSink): void {
    this.sinks.push(sink);
  }

  async query(options: EventQueryOptions = {}): Promise<ListResult<KernelEvent>> {
    const [items, total] = await Promise.all([
      this.store.events.list(options),
      this.store.events.count({ types: options.types, after: options.after }),
    ]);
    return toListResult(items, total, options);
  }

  async close(): Promise<void> {
    for (const sink of this.sinks) {
      if (sink.close) await sink.close();
    }
  }
}
