import { Response } from "express";
import { z } from "zod";
import { CreateRentalUseCase } from "../../application/use-cases/CreateRentalUseCase";
import { ListRentalsUseCase } from "../../application/use-cases/ListRentalsUseCase";
import { GetRentalUseCase } from "../../application/use-cases/GetRentalUseCase";
import { UpdateRentalStatusUseCase } from "../../application/use-cases/UpdateRentalStatusUseCase";
import { DeleteRentalUseCase } from "../../application/use-cases/DeleteRentalUseCase";
import { rentalStatuses } from "../../domain/entities/Rental";
import { AuthenticatedRequest } from "../../../shared/http/authMiddleware";
import { parseInput, pathParam, requester } from "./validation";
import { toRentalResponse } from "./presenters";

const createSchema = z.object({
  vehicle_id: z.string().trim().min(1),
  rental_start_date: z.coerce.date(),
  rental_end_date: z.coerce.date()
});

const statusSchema = z.object({
  rental_status: z.enum(rentalStatuses)
});

export class RentalsController {
  constructor(
    private readonly createRentalUseCase: CreateRentalUseCase,
    private readonly listRentalsUseCase: ListRentalsUseCase,
    private readonly getRentalUseCase: GetRentalUseCase,
    private readonly updateRentalStatusUseCase: UpdateRentalStatusUseCase,
    private readonly deleteRentalUseCase: DeleteRentalUseCase
  ) {}

  create = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const { userId } = requester(req);
    const data = parseInput(createSchema, req.body);
    const rental = await this.createRentalUseCase.execute({
      customerId: userId,
      vehicleId: data.vehicle_id,
      startDate: data.rental_start_date,
      endDate: data.rental_end_date
    });
    res.status(201).json(toRentalResponse(rental));
  };

  list = async (_req: AuthenticatedRequest, res: Response): Promise<void> => {
    const rentals = await this.listRentalsUseCase.execute();
    res.status(200).json(rentals.map(toRentalResponse));
  };

  getById = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const rental = await this.getRentalUseCase.execute(pathParam(req, "id"), requester(req));
    res.status(200).json(toRentalResponse(rental));
  };

  updateStatus = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const rentalId = pathParam(req, "id");
    const data = parseInput(statusSchema, req.body);
    const rental = await this.updateRentalStatusUseCase.execute(rentalId, data.rental_status);
    res.status(200).json(toRentalResponse(rental));
  };

  remove = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    await this.deleteRentalUseCase.execute(pathParam(req, "id"));
    res.status(204).send();
  };
}
