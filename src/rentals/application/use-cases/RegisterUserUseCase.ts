import { randomUUID } from "crypto";
import { UserRepository } from "../../domain/repositories/UserRepository";
import { User, UserRole } from "../../domain/entities/User";
import { EventPublisher } from "../ports/EventPublisher";
import { PasswordHasher } from "../ports/PasswordHasher";
import { publishDomainEvent } from "../publishDomainEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";

export type RegisterUserInput = {
  name: string;
  email: string;
  password: string;
  role: UserRole;
};

export class RegisterUserUseCase {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly eventPublisher: EventPublisher,
    private readonly passwordHasher: PasswordHasher,
    private readonly logger: Logger
  ) {}

  async execute(input: RegisterUserInput): Promise<User> {
    this.logger.info("User registration started", { role: input.role });

    try {
      const existing = await this.userRepository.findByEmail(input.email);
      if (existing) {
        throw new AppError("CONFLICT", 409, "Email already registered");
      }

      const hashedPassword = await this.passwordHasher.hash(input.password);
      const user = await this.userRepository.create({
        id: randomUUID(),
        name: input.name,
        email: input.email,
        password: hashedPassword,
        role: input.role
      });

      await publishDomainEvent(this.eventPublisher, this.logger, {
        eventType: "UserCreated",
        subjectId: user.id,
        payload: {
          userId: user.id,
          name: user.name,
          email: user.email,
          role: user.role
        }
      });

      this.logger.info("User registration completed", { userId: user.id });
      return user;
    } catch (error) {
      this.logger.error("User registration failed", { error: String(error) });
      throw error;
    }
  }
}
