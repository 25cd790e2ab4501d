import type { Logger } from 'pino';
import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type Listener = (event: DomainEvent) => void;

function isEventOf<T extends EventType>(type: T, event: DomainEvent): event is EventPayload<T> {
  return event.type === type;
}

/** Typed event bus for parser events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // Keyed by the caller's handler so that off() can find the wrapping listener
  private readonly handlers = new Map<EventType, Map<unknown, Listener>>();
  private readonly wildcardHandlers = new Set<Listener>();
  private readonly logger: Logger | null;

  constructor(logger?: Logger) {
    this.logger = logger ?? null;
  }

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, Listener>();
    existing.set(handler, (event) => {
      if (isEventOf(type, event)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: Listener): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: Listener): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit an event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const listeners = this.handlers.get(event.type);
    if (listeners) {
      for (const listener of listeners.values()) {
        this.invoke(listener, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.invoke(handler, event);
    }
  }

  private invoke(listener: Listener, event: DomainEvent): void {
    try {
      listener(event);
    } catch (error) {
      // A broken subscriber must not abort the parse
      this.logger?.warn({ err: error, event: event.type }, 'Event handler threw');
    }
  }
}
