import { randomUUID } from "crypto";
import { CreateVehicleInput, VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { Vehicle } from "../../domain/entities/Vehicle";
import { EventPublisher } from "../ports/EventPublisher";
import { publishDomainEvent } from "../publishDomainEvent";
import { Logger } from "../../../shared/observability/logger";

export class CreateVehicleUseCase {
  constructor(
    private readonly vehicleRepository: VehicleRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(input: Omit<CreateVehicleInput, "id">): Promise<Vehicle> {
    this.logger.info("Create vehicle started", { vehicleType: input.vehicleType });
    try {
      const vehicle = await this.vehicleRepository.create({ ...input, id: randomUUID() });
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "VehicleCreated",
        subjectId: vehicle.id,
        payload: {
          vehicleId: vehicle.id,
          name: vehicle.name,
          model: vehicle.model,
          vehicleType: vehicle.vehicleType,
          rentalPricePerDay: vehicle.rentalPricePerDay,
          availabilityStatus: vehicle.availabilityStatus,
          location: vehicle.location
        }
      });
      this.logger.info("Create vehicle completed", { vehicleId: vehicle.id });
      return vehicle;
    } catch (error) {
      this.logger.error("Create vehicle failed", { error: String(error) });
      throw error;
    }
  }
}
