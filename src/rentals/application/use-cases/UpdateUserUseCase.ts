import { UpdateUserInput, UserRepository } from "../../domain/repositories/UserRepository";
import { User } from "../../domain/entities/User";
import { EventPublisher } from "../ports/EventPublisher";
import { PasswordHasher } from "../ports/PasswordHasher";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export class UpdateUserUseCase {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly passwordHasher: PasswordHasher,
    private readonly eventPublisher: EventPublisher,
    private readonly logger: Logger
  ) {}

  async execute(userId: string, changes: UpdateUserInput): Promise<User> {
    const fields = Object.keys(changes);
    this.logger.info("Update user started", { userId, fields });
    try {
      if (fields.length === 0) {
        throw new AppError("INVALID_INPUT", 400, "No fields to update");
      }
      const currentUser = await this.userRepository.findById(userId);
      if (!currentUser) {
        throw new AppError("NOT_FOUND", 404, "User not found");
      }

      const update: UpdateUserInput = { ...changes };
      if (changes.email !== undefined) {
        const normalizedEmail = changes.email.toLowerCase();
        if (normalizedEmail !== currentUser.email) {
          const existingUser = await this.userRepository.findByEmail(normalizedEmail);
          if (existingUser && existingUser.id !== userId) {
            throw new AppError("CONFLICT", 409, "Email already in use");
          }
        }
        update.email = normalizedEmail;
      }
      if (changes.password !== undefined) {
        update.password = await this.passwordHasher.hash(changes.password);
      }

      const user = await this.userRepository.updateById(userId, update);
      if (!user) {
        throw new AppError("NOT_FOUND", 404, "User not found");
      }

      // the hash never leaves the service
      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "UserUpdated",
        subjectId: user.id,
        payload: {
          userId: user.id,
          updatedFields: fields,
          name: user.name,
          email: user.email,
          role: user.role
        }
      });
      this.logger.info("Update user completed", { userId });
      return user;
    } catch (error) {
      this.logger.error("Update user failed", { userId, error: String(error) });
      throw error;
    }
  }
}
