import { publishDomainEvent } from "../../../src/rentals/application/publishDomainEvent";
import { PublishError } from "../../../src/rentals/application/ports/EventPublisher";
import { ValidationError } from "../../../src/shared/messaging/DomainEvent";
import { createTestLogger, RecordingEventPublisher } from "../../support/fakes";

describe("publishDomainEvent", () => {
  it("publica o evento criado", async () => {
    const publisher = new RecordingEventPublisher();

    const event = await publishDomainEvent(publisher, createTestLogger(), {
      eventType: "BranchCreated",
      subjectId: "b1",
      payload: { branchId: "b1" }
    });

    expect(publisher.events).toEqual([event]);
  });

  it("registra e segue quando a publicação falha", async () => {
    const publisher = new RecordingEventPublisher();
    publisher.failure = new PublishError("Kafka publish failed: timeout", "branch_events");
    const logger = createTestLogger();

    const event = await publishDomainEvent(publisher, logger, {
      eventType: "BranchDeleted",
      subjectId: "b1"
    });

    expect(event.eventType).toBe("BranchDeleted");
    expect(logger.error).toHaveBeenCalledWith("Failed to publish domain event", {
      eventType: "BranchDeleted",
      subjectId: "b1",
      error: "PublishError: Kafka publish failed: timeout"
    });
  });

  it("propaga erro de validação sem publicar", async () => {
    const publisher = new RecordingEventPublisher();

    await expect(
      publishDomainEvent(publisher, createTestLogger(), {
        eventType: "RentalApproved",
        subjectId: "r1",
        targetUserIds: []
      })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(publisher.events).toEqual([]);
  });
});
