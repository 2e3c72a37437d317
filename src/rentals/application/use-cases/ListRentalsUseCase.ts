import { RentalRepository } from "../../domain/repositories/RentalRepository";
import { Rental } from "../../domain/entities/Rental";
import { Logger } from "../../../shared/observability/logger";

export class ListRentalsUseCase {
  constructor(
    private readonly rentalRepository: RentalRepository,
    private readonly logger: Logger
  ) {}

  async execute(): Promise<Rental[]> {
    this.logger.info("List rentals started");
    try {
      const rentals = await this.rentalRepository.find({});
      this.logger.info("List rentals completed", { count: rentals.length });
      return rentals;
    } catch (error) {
      this.logger.error("List rentals failed", { error: String(error) });
      throw error;
    }
  }
}
