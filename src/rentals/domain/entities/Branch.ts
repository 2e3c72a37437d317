export type BranchId = string;

export class Branch {
  constructor(
    public readonly id: BranchId,
    public readonly name: string,
    public readonly location: string,
    public readonly contactNumber: string
  ) {}
}
