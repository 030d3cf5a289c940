/**
 * Event bus interface
 */

import { DomainEvent } from './DomainEvent';

export type EventHandler<T extends DomainEvent = DomainEvent> = (event: T) => Promise<void> | void;

export type EventType<T extends DomainEvent> = abstract new (...args: never[]) => T;

export interface EventBus {
  subscribe<T extends DomainEvent>(eventType: EventType<T>, handler: EventHandler<T>): void;
  publish(event: DomainEvent): Promise<void>;
  publishAll(events: DomainEvent[]): Promise<void>;
  unsubscribe<T extends DomainEvent>(eventType: EventType<T>, handler: EventHandler<T>): void;
}
