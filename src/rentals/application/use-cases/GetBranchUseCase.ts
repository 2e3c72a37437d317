import { BranchRepository } from "../../domain/repositories/BranchRepository";
import { Branch } from "../../domain/entities/Branch";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class GetBranchUseCase {
  constructor(
    private readonly branchRepository: BranchRepository,
    private readonly logger: Logger
  ) {}

  async execute(branchId: string): Promise<Branch> {
    this.logger.info("Get branch started", { branchId });
    try {
      const branch = await this.branchRepository.findById(branchId);
      if (!branch) {
        throw new AppError("NOT_FOUND", 404, "Branch not found");
      }
      this.logger.info("Get branch completed", { branchId });
      return branch;
    } catch (error) {
      this.logger.error("Get branch failed", { branchId, error: String(error) });
      throw error;
    }
  }
}
