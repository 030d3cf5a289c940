import { randomUUID } from 'crypto';

/**
 * Base Domain Event class
 * 
 * All domain events should extend this class to ensure consistent
 * event structure and metadata.
 */
export abstract class DomainEvent {
  public readonly occurredOn: Date;
  public readonly eventId: string;

  constructor(public readonly aggregateId: string) {
    this.occurredOn = new Date();
    this.eventId = randomUUID();
  }
}
