import { Branch } from "../entities/Branch";

export type CreateBranchInput = {
  id?: string;
  name: string;
  location: string;
  contactNumber: string;
};

export type UpdateBranchInput = Partial<Omit<CreateBranchInput, "id">>;

export interface BranchRepository {
  create(input: CreateBranchInput): Promise<Branch>;
  findById(id: string): Promise<Branch | null>;
  findAll(): Promise<Branch[]>;
  updateById(id: string, input: UpdateBranchInput): Promise<Branch | null>;
  deleteById(id: string): Promise<boolean>;
  count(): Promise<number>;
}
