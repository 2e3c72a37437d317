import { compare, hash } from "bcryptjs";
import { PasswordHasher } from "../../application/ports/PasswordHasher";

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly rounds = 10) {}

  async hash(password: string): Promise<string> {
    return hash(password, this.rounds);
  }

  async compare(password: string, passwordHash: string): Promise<boolean> {
    return compare(password, passwordHash);
  }
}
