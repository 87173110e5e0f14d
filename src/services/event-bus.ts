import { EventEmitter } from 'node:events';
import type { EngineEvent, EngineEventType } from '../types/events.js';
import type { Logger } from '../infra/logger.js';

type EventHandler = (event: EngineEvent) => void | Promise<void>;

export class EventBus {
  private readonly emitter: EventEmitter;
  private readonly logger: Logger;
  private readonly wrapped = new Map<EventHandler, (event: EngineEvent) => void>();

  constructor(logger: Logger) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(50);
    this.logger = logger;
  }

  emit(event: EngineEvent): void {
    this.logger.info({ record: event }, `Engine record: ${event.type}`);
    this.emitter.emit('event', event);
    this.emitter.emit(event.type, event);
  }

  on(handler: EventHandler): void {
    this.emitter.on('event', this.wrap(handler));
  }

  onType(type: EngineEventType, handler: EventHandler): void {
    this.emitter.on(type, this.wrap(handler));
  }

  off(handler: EventHandler): void {
    const listener = this.wrapped.get(handler);
    if (!listener) return;
    this.emitter.off('event', listener);
    this.wrapped.delete(handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
    this.wrapped.clear();
  }

  private wrap(handler: EventHandler): (event: EngineEvent) => void {
    const existing = this.wrapped.get(handler);
    if (existing) return existing;

    const fail = (err: unknown, event: EngineEvent): void => {
      this.logger.error({ err, eventId: event.id, eventType: event.type }, 'Event handler failed');
    };
    const listener = (event: EngineEvent): void => {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => fail(err, event));
        }
      } catch (err) {
        fail(err, event);
      }
    };
    this.wrapped.set(handler, listener);
    return listener;
  }
}
