/**
 * Factory Event Log
 *
 * Append-only log of factory events with an outbox mode: events emitted inside
 * an AtomicScope are held back and published only when the scope commits, so
 * a rolled-back operation never produces an event.
 */

import { createId } from '@paralleldrive/cuid2';
import type { AtomicScope } from '../atomic/index.js';
import { createServiceLogger, log } from '../logging/index.js';
import type { ServiceLogger } from '../logging/index.js';
import type {
  FactoryEvent,
  FactoryEventListener,
  FactoryEventOf,
  FactoryEventRecord,
  FactoryEventType,
} from './types.js';

export class FactoryEventLog {
  private readonly records: FactoryEventRecord[] = [];
  private readonly listeners = new Set<FactoryEventListener>();
  private readonly logger: ServiceLogger = createServiceLogger('FactoryEventLog');

  /**
   * Emit an event.
   *
   * With a scope, publication is deferred until the scope commits.
   */
  emit(event: FactoryEvent, scope?: AtomicScope): void {
    if (scope) {
      scope.onCommit(() => this.publish(event));
      return;
    }
    this.publish(event);
  }

  /**
   * Subscribe to published events.
   *
   * @returns Unsubscribe function
   */
  subscribe(listener: FactoryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * All published events, oldest first.
   */
  getEvents(): readonly FactoryEventRecord[] {
    return [...this.records];
  }

  /**
   * Published events of one type, oldest first.
   */
  getEventsOfType<T extends FactoryEventType>(type: T): FactoryEventRecord<FactoryEventOf<T>>[] {
    return this.records.filter((record): record is FactoryEventRecord<FactoryEventOf<T>> =>
      isEventOfType(record.event, type)
    );
  }

  get size(): number {
    return this.records.length;
  }

  private publish(event: FactoryEvent): void {
    const record: FactoryEventRecord = {
      id: createId(),
      sequence: this.records.length + 1,
      emittedAt: new Date(),
      event,
    };
    this.records.push(record);

    this.logger.info(
      { eventId: record.id, sequence: record.sequence, eventType: event.type },
      'Factory event emitted'
    );

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        // A faulty subscriber must not undo a committed operation
        log.methodError(this.logger, 'publish', error, {
          eventId: record.id,
          eventType: event.type,
        });
      }
    }
  }
}

function isEventOfType<T extends FactoryEventType>(
  event: FactoryEvent,
  type: T
): event is FactoryEventOf<T> {
  return event.type === type;
}
