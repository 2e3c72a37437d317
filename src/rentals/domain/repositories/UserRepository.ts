import { User, UserRole } from "../entities/User";

export type CreateUserInput = {
  id?: string;
  name: string;
  email: string;
  password: string;
  role: UserRole;
};

export type UpdateUserInput = Partial<Omit<CreateUserInput, "id">>;

export interface UserRepository {
  create(input: CreateUserInput): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findAll(): Promise<User[]>;
  /** Ids of every user, or of the users holding `role` when given. */
  listIds(role?: UserRole): Promise<string[]>;
  updateById(id: string, input: UpdateUserInput): Promise<User | null>;
  deleteById(id: string): Promise<boolean>;
}
