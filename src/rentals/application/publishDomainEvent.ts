import { EventPublisher } from "./ports/EventPublisher";
import { createDomainEvent, CreateDomainEventInput, DomainEvent } from "../../shared/messaging/DomainEvent";
import { Logger } from "../../shared/observability/logger";

/**
 * Builds the event for a committed state change and publishes it.
 *
 * A ValidationError propagates: it means the caller assembled a bad event.
 * A publish failure is logged and swallowed, since the record is already
 * stored and the request must still succeed.
 */
export const publishDomainEvent = async (
  eventPublisher: EventPublisher,
  logger: Logger,
  input: CreateDomainEventInput
): Promise<DomainEvent> => {
  const event = createDomainEvent(input);
  try {
    await eventPublisher.publish(event);
  } catch (error) {
    logger.error("Failed to publish domain event", {
      eventType: event.eventType,
      subjectId: event.subjectId,
      error: String(error)
    });
  }
  return event;
};
