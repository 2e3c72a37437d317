import { RentalRepository } from "../../domain/repositories/RentalRepository";
import { VehicleRepository } from "../../domain/repositories/VehicleRepository";
import { Rental, RentalStatus } from "../../domain/entities/Rental";
import { AvailabilityStatus } from "../../domain/entities/Vehicle";
import { EventPublisher } from "../ports/EventPublisher";
import { NotificationAudience } from "../NotificationAudience";
import { publishDomainEvent } from "../publishDomainEvent";
import { DomainEventType } from "../../../shared/messaging/DomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

const rentalEventTypes: Record<RentalStatus, DomainEventType> = {
  PENDING: "RentalStatusUpdated",
  APPROVED: "RentalApproved",
  REJECTED: "RentalRejected",
  COMPLETED: "RentalCompleted"
};

const vehicleStatusAfter: Partial<Record<RentalStatus, AvailabilityStatus>> = {
  APPROVED: "RENTED",
  COMPLETED: "AVAILABLE"
};

export class UpdateRentalStatusUseCase {
  constructor(
    private readonly rentalRepository: RentalRepository,
    private readonly vehicleRepository: VehicleRepository,
    private readonly audience: NotificationAudience,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(rentalId: string, status: RentalStatus): Promise<Rental> {
    this.logger.info("Update rental status started", { rentalId, status });
    try {
      const rental = await this.rentalRepository.updateStatus(rentalId, status);
      if (!rental) {
        throw new AppError("NOT_FOUND", 404, "Rental not found");
      }

      const targetUserIds = await this.audience.customerAndEmployees(rental.customerId);
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: rentalEventTypes[status],
        subjectId: rental.id,
        targetUserIds,
        payload: {
          rentalId: rental.id,
          vehicleId: rental.vehicleId,
          customerId: rental.customerId,
          status
        }
      });

      const availabilityStatus = vehicleStatusAfter[status];
      if (availabilityStatus) {
        await this.updateVehicle(rental, availabilityStatus, targetUserIds);
      }

      this.logger.info("Update rental status completed", { rentalId, status });
      return rental;
    } catch (error) {
      this.logger.error("Update rental status failed", { rentalId, error: String(error) });
      throw error;
    }
  }

  private async updateVehicle(
    rental: Rental,
    availabilityStatus: AvailabilityStatus,
    targetUserIds: string[]
  ): Promise<void> {
    const vehicle = await this.vehicleRepository.updateById(rental.vehicleId, {
      availabilityStatus
    });
    if (!vehicle) {
      this.logger.warn("Rental vehicle no longer exists", {
        rentalId: rental.id,
        vehicleId: rental.vehicleId
      });
      return;
    }
    await publishDomainEvent(this.eventPublisher, this.logger, {
      eventType: "VehicleStatusChanged",
      subjectId: vehicle.id,
      targetUserIds,
      payload: { vehicleId: vehicle.id, availabilityStatus, rentalId: rental.id }
    });
  }
}
