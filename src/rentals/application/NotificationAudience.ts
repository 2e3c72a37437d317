import { UserRepository } from "../domain/repositories/UserRepository";

/** Resolves which users a domain event is addressed to. */
export class NotificationAudience {
  constructor(private readonly userRepository: UserRepository) {}

  async customerAndEmployees(customerId: string): Promise<string[]> {
    const employeeIds = await this.userRepository.listIds("EMPLOYEE");
    return Array.from(new Set([customerId, ...employeeIds]));
  }

  async everyone(): Promise<string[]> {
    return this.userRepository.listIds();
  }
}
