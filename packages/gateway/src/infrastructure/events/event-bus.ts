/**
 * @file packages/gateway/src/infrastructure/events/event-bus.ts
 * @description In-process event bus for mission, report and transport activity.
 */

import { EventEmitter } from 'node:events';
import { singleton } from 'tsyringe';
import type { EventType, FieldLinkEvent } from '@fieldlink/shared';
import { v4 as uuidv4 } from 'uuid';

@singleton()
export class EventBusService extends EventEmitter {
  constructor() {
    super();
    // One subscriber per agent plus dashboards.
    this.setMaxListeners(50);
  }

  /**
   * Publishes an event to all subscribers.
   */
  publish<T>(type: EventType, payload: T, source: string, correlationId?: string): FieldLinkEvent<T> {
    const event: FieldLinkEvent<T> = {
      id: uuidv4(),
      type,
      payload,
      source,
      timestamp: Date.now(),
      correlationId,
    };

    this.emit(type, event);
    // Wildcard for global listeners (recorders, bridges).
    this.emit('*', event);
    return event;
  }

  /**
   * Subscribes to a specific event type. Returns an unsubscribe function.
   */
  subscribe<T>(type: EventType, handler: (event: FieldLinkEvent<T>) => void): () => void {
    this.on(type, handler);
    return () => this.off(type, handler);
  }

  /**
   * Subscribes to all events (wildcard).
   */
  subscribeAll(handler: (event: FieldLinkEvent) => void): () => void {
    this.on('*', handler);
    return () => this.off('*', handler);
  }
}
