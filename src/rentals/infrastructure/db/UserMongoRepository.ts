import { randomUUID } from "crypto";
import { CreateUserInput, UpdateUserInput, UserRepository } from "../../domain/repositories/UserRepository";
import { User, UserRole } from "../../domain/entities/User";
import { isDuplicateKeyError, UserDocument, UserModel } from "./mongoose";
import { createTimedQuery, TimedQuery } from "./timedQuery";
import { Metrics } from "../../../shared/observability/metrics";
import { AppError } from "../../../shared/http/AppError";

const toUser = (doc: UserDocument): User =>
  new User(doc._id, doc.name, doc.email, doc.password, doc.role, new Date(doc.createdAt));

export class UserMongoRepository implements UserRepository {
  private readonly timed: TimedQuery;

  constructor(metrics: Pick<Metrics, "recordDbQuery">) {
    this.timed = createTimedQuery(metrics);
  }

  async create(input: CreateUserInput): Promise<User> {
    const user = new User(
      input.id ?? randomUUID(),
      input.name,
      input.email.toLowerCase(),
      input.password,
      input.role,
      new Date()
    );
    try {
      await this.timed("create_user", () =>
        UserModel.create({
          _id: user.id,
          name: user.name,
          email: user.email,
          password: user.password,
          role: user.role,
          createdAt: user.createdAt
        })
      );
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new AppError("CONFLICT", 409, "Email already registered");
      }
      throw error;
    }
    return user;
  }

  async findById(id: string): Promise<User | null> {
    const doc = await this.timed("find_user_by_id", () => UserModel.findById(id).lean());
    return doc ? toUser(doc) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const doc = await this.timed("find_user_by_email", () =>
      UserModel.findOne({ email: email.toLowerCase() }).lean()
    );
    return doc ? toUser(doc) : null;
  }

  async findAll(): Promise<User[]> {
    const docs = await this.timed("find_users", () => UserModel.find().lean());
    return docs.map(toUser);
  }

  async listIds(role?: UserRole): Promise<string[]> {
    const docs = await this.timed("list_user_ids", () =>
      UserModel.find(role ? { role } : {}, { _id: 1 }).lean()
    );
    return docs.map((doc) => doc._id);
  }

  async updateById(id: string, input: UpdateUserInput): Promise<User | null> {
    const changes = input.email ? { ...input, email: input.email.toLowerCase() } : input;
    try {
      const doc = await this.timed("update_user", () =>
        UserModel.findByIdAndUpdate(id, { $set: changes }, { new: true, runValidators: true }).lean()
      );
      return doc ? toUser(doc) : null;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new AppError("CONFLICT", 409, "Email already in use");
      }
      throw error;
    }
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.timed("delete_user", () => UserModel.deleteOne({ _id: id }));
    return result.deletedCount > 0;
  }
}
