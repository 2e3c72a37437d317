import { randomUUID } from "crypto";
import { BranchRepository, CreateBranchInput } from "../../domain/repositories/BranchRepository";
import { Branch } from "../../domain/entities/Branch";
import { EventPublisher } from "../ports/EventPublisher";
import { publishDomainEvent } from "../publishDomainEvent";
import { Logger } from "../../../shared/observability/logger";

export class CreateBranchUseCase {
  constructor(
    private readonly branchRepository: BranchRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(input: Omit<CreateBranchInput, "id">): Promise<Branch> {
    this.logger.info("Create branch started");
    try {
      const branch = await this.branchRepository.create({ ...input, id: randomUUID() });
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "BranchCreated",
        subjectId: branch.id,
        payload: {
          branchId: branch.id,
          name: branch.name,
          location: branch.location,
          contactNumber: branch.contactNumber
        }
      });
      this.logger.info("Create branch completed", { branchId: branch.id });
      return branch;
    } catch (error) {
      this.logger.error("Create branch failed", { error: String(error) });
      throw error;
    }
  }
}
