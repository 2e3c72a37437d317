import { VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { Vehicle } from "../../domain/entities/Vehicle";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class GetVehicleUseCase {
  constructor(
    private readonly vehicleRepository: VehicleRepository,
    private readonly logger: Logger
  ) {}

  async execute(vehicleId: string): Promise<Vehicle> {
    this.logger.info("Get vehicle started", { vehicleId });
    try {
      const vehicle = await this.vehicleRepository.findById(vehicleId);
      if (!vehicle) {
        throw new AppError("NOT_FOUND", 404, "Vehicle not found");
      }
      this.logger.info("Get vehicle completed", { vehicleId });
      return vehicle;
    } catch (error) {
      this.logger.error("Get vehicle failed", { vehicleId, error: String(error) });
      throw error;
    }
  }
}
