import { BranchRepository } from "../../domain/repositories/BranchRepository";
import { EventPublisher } from "../ports/EventPublisher";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class DeleteBranchUseCase {
  constructor(
    private readonly branchRepository: BranchRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(branchId: string): Promise<void> {
    this.logger.info("Delete branch started", { branchId });
    try {
      const deleted = await this.branchRepository.deleteById(branchId);
      if (!deleted) {
        throw new AppError("NOT_FOUND", 404, "Branch not found");
      }
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "BranchDeleted",
        subjectId: branchId,
        payload: { branchId }
      });
      this.logger.info("Delete branch completed", { branchId });
    } catch (error) {
      this.logger.error("Delete branch failed", { branchId, error: String(error) });
      throw error;
    }
  }
}
