import { UserRole, userRoles } from "../../../shared/http/authMiddleware";

export { userRoles };
export type { UserRole };
export type UserId = string;

export class User {
  constructor(
    public readonly id: UserId,
    public readonly name: string,
    public readonly email: string,
    public readonly password: string,
    public readonly role: UserRole,
    public readonly createdAt: Date
  ) {}

  isEmployee(): boolean {
    return this.role === "EMPLOYEE";
  }

  isCustomer(): boolean {
    return this.role === "CUSTOMER";
  }
}
