import { BranchRepository } from "../../domain/repositories/BranchRepository";
import { Branch } from "../../domain/entities/Branch";
import { Logger } from "../../../shared/observability/logger";

export class ListBranchesUseCase {
  constructor(
    private readonly branchRepository: BranchRepository,
    private readonly logger: Logger
  ) {}

  async execute(): Promise<Branch[]> {
    this.logger.info("List branches started");
    try {
      const branches = await this.branchRepository.findAll();
      this.logger.info("List branches completed", { count: branches.length });
      return branches;
    } catch (error) {
      this.logger.error("List branches failed", { error: String(error) });
      throw error;
    }
  }
}
