import { randomUUID } from "crypto";
import {
  BranchRepository,
  CreateBranchInput,
  UpdateBranchInput
} from "../../domain/repositories/BranchRepository";
import { Branch } from "../../domain/entities/Branch";
import { BranchDocument, BranchModel } from "./mongoose";
import { createTimedQuery, TimedQuery } from "./timedQuery";
import { Metrics } from "../../../shared/observability/metrics";

const toBranch = (doc: BranchDocument): Branch =>
  new Branch(doc._id, doc.name, doc.location, doc.contactNumber);

export class BranchMongoRepository implements BranchRepository {
  private readonly timed: TimedQuery;

  constructor(metrics: Pick<Metrics, "recordDbQuery">) {
    this.timed = createTimedQuery(metrics);
  }

  async create(input: CreateBranchInput): Promise<Branch> {
    const branch = new Branch(
      input.id ?? randomUUID(),
      input.name,
      input.location,
      input.contactNumber
    );
    await this.timed("create_branch", () =>
      BranchModel.create({
        _id: branch.id,
        name: branch.name,
        location: branch.location,
        contactNumber: branch.contactNumber
      })
    );
    return branch;
  }

  async findById(id: string): Promise<Branch | null> {
    const doc = await this.timed("find_branch_by_id", () => BranchModel.findById(id).lean());
    return doc ? toBranch(doc) : null;
  }

  async findAll(): Promise<Branch[]> {
    const docs = await this.timed("find_branches", () => BranchModel.find().lean());
    return docs.map(toBranch);
  }

  async updateById(id: string, input: UpdateBranchInput): Promise<Branch | null> {
    const doc = await this.timed("update_branch", () =>
      BranchModel.findByIdAndUpdate(id, { $set: input }, { new: true, runValidators: true }).lean()
    );
    return doc ? toBranch(doc) : null;
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.timed("delete_branch", () => BranchModel.deleteOne({ _id: id }));
    return result.deletedCount > 0;
  }

  async count(): Promise<number> {
    return this.timed("count_branches", () => BranchModel.countDocuments());
  }
}
