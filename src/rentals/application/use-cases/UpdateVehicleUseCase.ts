import { UpdateVehicleInput, VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { Vehicle } from "../../domain/entities/Vehicle";
import { EventPublisher } from "../ports/EventPublisher";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class UpdateVehicleUseCase {
  constructor(
    private readonly vehicleRepository: VehicleRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(vehicleId: string, changes: UpdateVehicleInput): Promise<Vehicle> {
    const fields = Object.keys(changes);
    this.logger.info("Update vehicle started", { vehicleId, fields });
    try {
      if (fields.length === 0) {
        throw new AppError("INVALID_INPUT", 400, "No fields to update");
      }
      const vehicle = await this.vehicleRepository.updateById(vehicleId, changes);
      if (!vehicle) {
        throw new AppError("NOT_FOUND", 404, "Vehicle not found");
      }
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "VehicleUpdated",
        subjectId: vehicle.id,
        payload: { vehicleId: vehicle.id, updatedFields: { ...changes } }
      });
      this.logger.info("Update vehicle completed", { vehicleId });
      return vehicle;
    } catch (error) {
      this.logger.error("Update vehicle failed", { vehicleId, error: String(error) });
      throw error;
    }
  }
}
