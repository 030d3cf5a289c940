import { DomainEvent } from '../events/DomainEvent';

/**
 * Base Aggregate Root class
 * 
 * Collects domain events raised while the aggregate is mutated so the
 * application layer can publish them once the operation has completed.
 */
export abstract class AggregateRoot {
  private _domainEvents: DomainEvent[] = [];

  get domainEvents(): DomainEvent[] {
    return [...this._domainEvents];
  }

  protected addDomainEvent(event: DomainEvent): void {
    this._domainEvents.push(event);
  }

  clearDomainEvents(): void {
    this._domainEvents = [];
  }

  /**
   * Returns the pending events and clears them
   */
  pullDomainEvents(): DomainEvent[] {
    const events = this._domainEvents;
    this._domainEvents = [];
    return events;
  }
}
