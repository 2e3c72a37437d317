import { VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { AvailabilityStatus, Vehicle } from "../../domain/entities/Vehicle";
import { EventPublisher } from "../ports/EventPublisher";
import { NotificationAudience } from "../NotificationAudience";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class UpdateVehicleStatusUseCase {
  constructor(
    private readonly vehicleRepository: VehicleRepository,
    private readonly audience: NotificationAudience,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(vehicleId: string, status: AvailabilityStatus): Promise<Vehicle> {
    this.logger.info("Update vehicle status started", { vehicleId, status });
    try {
      const vehicle = await this.vehicleRepository.updateById(vehicleId, {
        availabilityStatus: status
      });
      if (!vehicle) {
        throw new AppError("NOT_FOUND", 404, "Vehicle not found");
      }
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "VehicleStatusChanged",
        subjectId: vehicle.id,
        targetUserIds: await this.audience.everyone(),
        payload: { vehicleId: vehicle.id, availabilityStatus: status }
      });
      this.logger.info("Update vehicle status completed", { vehicleId, status });
      return vehicle;
    } catch (error) {
      this.logger.error("Update vehicle status failed", { vehicleId, error: String(error) });
      throw error;
    }
  }
}
