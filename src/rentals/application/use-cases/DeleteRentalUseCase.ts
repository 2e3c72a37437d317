import { RentalRepository } from "../../domain/repositories/RentalRepository";
import { EventPublisher } from "../ports/EventPublisher";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class DeleteRentalUseCase {
  constructor(
    private readonly rentalRepository: RentalRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(rentalId: string): Promise<void> {
    this.logger.info("Delete rental started", { rentalId });
    try {
      const deleted = await this.rentalRepository.deleteById(rentalId);
      if (!deleted) {
        throw new AppError("NOT_FOUND", 404, "Rental not found");
      }
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "RentalDeleted",
        subjectId: rentalId,
        payload: { rentalId }
      });
      this.logger.info("Delete rental completed", { rentalId });
    } catch (error) {
      this.logger.error("Delete rental failed", { rentalId, error: String(error) });
      throw error;
    }
  }
}
