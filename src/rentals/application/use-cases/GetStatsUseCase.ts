import { VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { RentalRepository } from "../../domain/repositories/RentalRepository";
import { BranchRepository } from "../../domain/repositories/BranchRepository";
import { Logger } from "../../../shared/observability/logger";

export type RentalStats = {
  availableVehicles: number;
  branchCount: number;
  activeRentals: number;
};

export class GetStatsUseCase {
  constructor(
    private readonly vehicleRepository: VehicleRepository,
    private readonly rentalRepository: RentalRepository,
    private readonly branchRepository: BranchRepository,
    private readonly logger: Logger
  ) {}

  async execute(): Promise<RentalStats> {
    try {
      const [availableVehicles, branchCount, activeRentals] = await Promise.all([
        this.vehicleRepository.countByStatus("AVAILABLE"),
        this.branchRepository.count(),
        this.rentalRepository.countByStatus("APPROVED")
      ]);
      return { availableVehicles, branchCount, activeRentals };
    } catch (error) {
      this.logger.error("Get stats failed", { error: String(error) });
      throw error;
    }
  }
}
