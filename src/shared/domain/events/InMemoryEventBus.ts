/**
 * In-memory event bus implementation
 */

import { DomainEvent } from './DomainEvent';
import { EventBus, EventHandler, EventType } from './EventBus';

export class InMemoryEventBus implements EventBus {
  private handlers = new Map<string, Array<(event: DomainEvent) => Promise<void> | void>>();

  /**
   * Subscribe to an event type
   */
  subscribe<T extends DomainEvent>(eventType: EventType<T>, handler: EventHandler<T>): void {
    const handlers = this.handlers.get(eventType.name) ?? [];
    handlers.push(this.wrap(eventType, handler));
    this.handlers.set(eventType.name, handlers);
  }

  /**
   * Publish a single event
   */
  async publish(event: DomainEvent): Promise<void> {
    const handlers = this.handlers.get(event.constructor.name) || [];

    if (handlers.length === 0) {
      return;
    }

    // Every handler runs even when an earlier one throws
    await Promise.all(handlers.map(async handler => handler(event)));
  }

  /**
   * Publish multiple events, in order
   */
  async publishAll(events: DomainEvent[]): Promise<void> {
    for (const event of events) {
      await this.publish(event);
    }
  }

  /**
   * Unsubscribe from an event type
   */
  unsubscribe<T extends DomainEvent>(eventType: EventType<T>, handler: EventHandler<T>): void {
    const handlers = this.handlers.get(eventType.name);
    if (!handlers) {
      return;
    }
    const index = handlers.findIndex(wrapped => this.originals.get(wrapped) === handler);
    if (index > -1) {
      this.originals.delete(handlers[index]);
      handlers.splice(index, 1);
    }
  }

  /**
   * Clear all handlers
   */
  clear(): void {
    this.handlers.clear();
  }

  /**
   * Get handler count for an event type
   */
  getHandlerCount<T extends DomainEvent>(eventType: EventType<T>): number {
    return this.handlers.get(eventType.name)?.length || 0;
  }

  private originals = new WeakMap<(event: DomainEvent) => Promise<void> | void, object>();

  // Handlers are stored untyped; the instanceof guard restores the event type
  private wrap<T extends DomainEvent>(eventType: EventType<T>, handler: EventHandler<T>): (event: DomainEvent) => Promise<void> | void {
    const wrapped = (event: DomainEvent): Promise<void> | void => {
      if (event instanceof eventType) {
        return handler(event);
      }
    };
    this.originals.set(wrapped, handler);
    return wrapped;
  }
}
