// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { CleanupEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: CleanupEvent) => void;
}

/**
 * Typed event bus for cleanup progress.
 * Wraps eventemitter3 with typed CleanupEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed event, auto-injecting the timestamp if empty. */
  emitEvent(event: CleanupEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}
