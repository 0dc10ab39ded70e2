// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { SweepEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: SweepEvent) => void;
}

/**
 * Typed event bus for session lifecycle events.
 * Wraps eventemitter3 with typed SweepEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  emitEvent(event: SweepEvent): void {
    this.emit('event', event);
  }
}
