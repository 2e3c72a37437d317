import { Response } from "express";
import { z } from "zod";
import { CreateBranchUseCase } from "../../application/use-cases/CreateBranchUseCase";
import { ListBranchesUseCase } from "../../application/use-cases/ListBranchesUseCase";
import { GetBranchUseCase } from "../../application/use-cases/GetBranchUseCase";
import { UpdateBranchUseCase } from "../../application/use-cases/UpdateBranchUseCase";
import { DeleteBranchUseCase } from "../../application/use-cases/DeleteBranchUseCase";
import { UpdateBranchInput } from "../../domain/repositories/BranchRepository";
import { AuthenticatedRequest } from "../../../shared/http/authMiddleware";
import { parseInput, pathParam } from "./validation";
import { toBranchResponse } from "./presenters";

const branchSchema = z.object({
  name: z.string().trim().min(1),
  location: z.string().trim().min(1),
  contact_number: z.string().trim().min(1)
});

const updateSchema = branchSchema.partial().strict();

export class BranchesController {
  constructor(
    private readonly createBranchUseCase: CreateBranchUseCase,
    private readonly listBranchesUseCase: ListBranchesUseCase,
    private readonly getBranchUseCase: GetBranchUseCase,
    private readonly updateBranchUseCase: UpdateBranchUseCase,
    private readonly deleteBranchUseCase: DeleteBranchUseCase
  ) {}

  create = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const data = parseInput(branchSchema, req.body);
    const branch = await this.createBranchUseCase.execute({
      name: data.name,
      location: data.location,
      contactNumber: data.contact_number
    });
    res.status(201).json(toBranchResponse(branch));
  };

  list = async (_req: AuthenticatedRequest, res: Response): Promise<void> => {
    const branches = await this.listBranchesUseCase.execute();
    res.status(200).json(branches.map(toBranchResponse));
  };

  getById = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const branch = await this.getBranchUseCase.execute(pathParam(req, "id"));
    res.status(200).json(toBranchResponse(branch));
  };

  update = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const branchId = pathParam(req, "id");
    const data = parseInput(updateSchema, req.body);
    const changes: UpdateBranchInput = {};
    if (data.name !== undefined) changes.name = data.name;
    if (data.location !== undefined) changes.location = data.location;
    if (data.contact_number !== undefined) changes.contactNumber = data.contact_number;
    const branch = await this.updateBranchUseCase.execute(branchId, changes);
    res.status(200).json(toBranchResponse(branch));
  };

  remove = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    await this.deleteBranchUseCase.execute(pathParam(req, "id"));
    res.status(204).send();
  };
}
