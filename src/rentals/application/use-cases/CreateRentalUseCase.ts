import { randomUUID } from "crypto";
import { RentalRepository } from "../../domain/repositories/RentalRepository";
import { VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { UserRepository } from "../../domain/repositories/UserRepository";
import { Rental, rentalDays } from "../../domain/entities/Rental";
import { EventPublisher } from "../ports/EventPublisher";
import { NotificationAudience } from "../NotificationAudience";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export type CreateRentalInput = {
  customerId: string;
  vehicleId: string;
  startDate: Date;
  endDate: Date;
};

export class CreateRentalUseCase {
  constructor(
    private readonly rentalRepository: RentalRepository,
    private readonly vehicleRepository: VehicleRepository,
    private readonly userRepository: UserRepository,
    private readonly audience: NotificationAudience,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(input: CreateRentalInput): Promise<Rental> {
    this.logger.info("Create rental started", {
      customerId: input.customerId,
      vehicleId: input.vehicleId
    });
    try {
      if (input.endDate.getTime() < input.startDate.getTime()) {
        throw new AppError(
          "INVALID_INPUT",
          400,
          "rental_end_date must not precede rental_start_date"
        );
      }

      const vehicle = await this.vehicleRepository.findById(input.vehicleId);
      if (!vehicle) {
        throw new AppError("NOT_FOUND", 404, "Vehicle not found");
      }
      if (!vehicle.isAvailable()) {
        throw new AppError("VEHICLE_UNAVAILABLE", 400, "Vehicle is not available for rent");
      }

      const customer = await this.userRepository.findById(input.customerId);
      if (!customer) {
        throw new AppError("NOT_FOUND", 404, "Customer not found");
      }

      const rental = await this.rentalRepository.create({
        id: randomUUID(),
        vehicleId: vehicle.id,
        customerId: customer.id,
        startDate: input.startDate,
        endDate: input.endDate,
        totalCost: vehicle.calculateRentalCost(rentalDays(input.startDate, input.endDate))
      });

      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "RentalRequested",
        subjectId: rental.id,
        targetUserIds: await this.audience.customerAndEmployees(rental.customerId),
        payload: {
          rentalId: rental.id,
          vehicleId: rental.vehicleId,
          customerId: rental.customerId,
          status: rental.status,
          totalCost: rental.totalCost,
          rentalStartDate: rental.startDate.toISOString(),
          rentalEndDate: rental.endDate.toISOString()
        }
      });

      this.logger.info("Create rental completed", { rentalId: rental.id });
      return rental;
    } catch (error) {
      this.logger.error("Create rental failed", {
        customerId: input.customerId,
        vehicleId: input.vehicleId,
        error: String(error)
      });
      throw error;
    }
  }
}
