import { VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { EventPublisher } from "../ports/EventPublisher";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class DeleteVehicleUseCase {
  constructor(
    private readonly vehicleRepository: VehicleRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(vehicleId: string): Promise<void> {
    this.logger.info("Delete vehicle started", { vehicleId });
    try {
      const deleted = await this.vehicleRepository.deleteById(vehicleId);
      if (!deleted) {
        throw new AppError("NOT_FOUND", 404, "Vehicle not found");
      }
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "VehicleDeleted",
        subjectId: vehicleId,
        payload: { vehicleId }
      });
      this.logger.info("Delete vehicle completed", { vehicleId });
    } catch (error) {
      this.logger.error("Delete vehicle failed", { vehicleId, error: String(error) });
      throw error;
    }
  }
}
