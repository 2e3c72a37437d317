import { RentalRepository } from "../../domain/repositories/RentalRepository";
import { Rental } from "../../domain/entities/Rental";
import { Logger } from "../../../shared/observability/logger";

/** Completed rentals of one vehicle. */
export class GetVehicleRentalHistoryUseCase {
  constructor(
    private readonly rentalRepository: RentalRepository,
    private readonly logger: Logger
  ) {}

  async execute(vehicleId: string): Promise<Rental[]> {
    this.logger.info("Get vehicle rental history started", { vehicleId });
    try {
      const rentals = await this.rentalRepository.find({ vehicleId, status: "COMPLETED" });
      this.logger.info("Get vehicle rental history completed", {
        vehicleId,
        count: rentals.length
      });
      return rentals;
    } catch (error) {
      this.logger.error("Get vehicle rental history failed", { vehicleId, error: String(error) });
      throw error;
    }
  }
}
