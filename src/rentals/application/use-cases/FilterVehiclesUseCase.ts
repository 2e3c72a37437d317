import { VehicleFilter, VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { Vehicle } from "../../domain/entities/Vehicle";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class FilterVehiclesUseCase {
  constructor(
    private readonly vehicleRepository: VehicleRepository,
    private readonly logger: Logger
  ) {}

  async execute(filter: VehicleFilter): Promise<Vehicle[]> {
    this.logger.info("Filter vehicles started", { filter });
    try {
      if (
        filter.minPrice !== undefined &&
        filter.maxPrice !== undefined &&
        filter.minPrice > filter.maxPrice
      ) {
        throw new AppError("INVALID_INPUT", 400, "min_price must not exceed max_price");
      }
      const vehicles = await this.vehicleRepository.find(filter);
      this.logger.info("Filter vehicles completed", { count: vehicles.length });
      return vehicles;
    } catch (error) {
      this.logger.error("Filter vehicles failed", { error: String(error) });
      throw error;
    }
  }
}
