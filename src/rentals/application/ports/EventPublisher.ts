import { DomainEvent } from "../../../shared/messaging/DomainEvent";

export type { DomainEvent };

export class PublishError extends Error {
  constructor(
    message: string,
    public readonly topic: string
  ) {
    super(message);
    this.name = "PublishError";
  }
}

export interface EventPublisher {
  /** Enqueues one message on the event's topic; rejects with PublishError. */
  publish(event: DomainEvent): Promise<void>;
}
