import { UserRepository } from "../../domain/repositories/UserRepository";
import { User } from "../../domain/entities/User";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class GetUserUseCase {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly logger: Logger
  ) {}

  async execute(userId: string): Promise<User> {
    this.logger.info("Get user started", { userId });
    try {
      const user = await this.userRepository.findById(userId);
      if (!user) {
        throw new AppError("NOT_FOUND", 404, "User not found");
      }
      this.logger.info("Get user completed", { userId });
      return user;
    } catch (error) {
      this.logger.error("Get user failed", { userId, error: String(error) });
      throw error;
    }
  }
}
