import { BranchRepository, UpdateBranchInput } from "../../domain/repositories/BranchRepository";
import { Branch } from "../../domain/entities/Branch";
import { EventPublisher } from "../ports/EventPublisher";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class UpdateBranchUseCase {
  constructor(
    private readonly branchRepository: BranchRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(branchId: string, changes: UpdateBranchInput): Promise<Branch> {
    const fields = Object.keys(changes);
    this.logger.info("Update branch started", { branchId, fields });
    try {
      if (fields.length === 0) {
        throw new AppError("INVALID_INPUT", 400, "No fields to update");
      }
      const branch = await this.branchRepository.updateById(branchId, changes);
      if (!branch) {
        throw new AppError("NOT_FOUND", 404, "Branch not found");
      }
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "BranchUpdated",
        subjectId: branch.id,
        payload: { branchId: branch.id, updatedFields: { ...changes } }
      });
      this.logger.info("Update branch completed", { branchId });
      return branch;
    } catch (error) {
      this.logger.error("Update branch failed", { branchId, error: String(error) });
      throw error;
    }
  }
}
