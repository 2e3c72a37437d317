import { RentalRepository } from "../../domain/repositories/RentalRepository";
import { Rental } from "../../domain/entities/Rental";
import { UserRole } from "../../domain/entities/User";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export type RentalRequester = {
  userId: string;
  role: UserRole;
};

export class GetRentalUseCase {
  constructor(
    private readonly rentalRepository: RentalRepository,
    private readonly logger: Logger
  ) {}

  async execute(rentalId: string, requester: RentalRequester): Promise<Rental> {
    this.logger.info("Get rental started", { rentalId, userId: requester.userId });
    try {
      const rental = await this.rentalRepository.findById(rentalId);
      if (!rental) {
        throw new AppError("NOT_FOUND", 404, "Rental not found");
      }
      if (requester.role === "CUSTOMER" && rental.customerId !== requester.userId) {
        throw new AppError("FORBIDDEN", 403, "Forbidden");
      }
      this.logger.info("Get rental completed", { rentalId });
      return rental;
    } catch (error) {
      this.logger.error("Get rental failed", { rentalId, error: String(error) });
      throw error;
    }
  }
}
