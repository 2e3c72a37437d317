import { Response } from "express";
import { z } from "zod";
import { CreateVehicleUseCase } from "../../application/use-cases/CreateVehicleUseCase";
import { GetVehicleUseCase } from "../../application/use-cases/GetVehicleUseCase";
import { FilterVehiclesUseCase } from "../../application/use-cases/FilterVehiclesUseCase";
import { UpdateVehicleUseCase } from "../../application/use-cases/UpdateVehicleUseCase";
import { UpdateVehicleStatusUseCase } from "../../application/use-cases/UpdateVehicleStatusUseCase";
import { DeleteVehicleUseCase } from "../../application/use-cases/DeleteVehicleUseCase";
import { GetVehicleRentalHistoryUseCase } from "../../application/use-cases/GetVehicleRentalHistoryUseCase";
import { availabilityStatuses, vehicleTypes } from "../../domain/entities/Vehicle";
import { UpdateVehicleInput } from "../../domain/repositories/VehicleRepository";
import { AuthenticatedRequest } from "../../../shared/http/authMiddleware";
import { parseInput, pathParam } from "./validation";
import { toRentalResponse, toVehicleResponse } from "./presenters";

const vehicleFields = {
  name: z.string().trim().min(1),
  model: z.string().trim().min(1),
  vehicle_type: z.enum(vehicleTypes),
  rental_price_per_day: z.number().positive(),
  availability_status: z.enum(availabilityStatuses),
  location: z.string().trim().min(1)
};

const createSchema = z.object({
  ...vehicleFields,
  availability_status: vehicleFields.availability_status.default("AVAILABLE")
});

const updateSchema = z.object(vehicleFields).partial().strict();

const statusSchema = z.object({
  availability_status: z.enum(availabilityStatuses)
});

const filterSchema = z.object({
  vehicle_type: z.enum(vehicleTypes).optional(),
  availability_status: z.enum(availabilityStatuses).optional(),
  location: z.string().trim().min(1).optional(),
  min_price: z.coerce.number().nonnegative().optional(),
  max_price: z.coerce.number().nonnegative().optional()
});

const toChanges = (data: z.infer<typeof updateSchema>): UpdateVehicleInput => {
  const changes: UpdateVehicleInput = {};
  if (data.name !== undefined) changes.name = data.name;
  if (data.model !== undefined) changes.model = data.model;
  if (data.vehicle_type !== undefined) changes.vehicleType = data.vehicle_type;
  if (data.rental_price_per_day !== undefined) changes.rentalPricePerDay = data.rental_price_per_day;
  if (data.availability_status !== undefined) changes.availabilityStatus = data.availability_status;
  if (data.location !== undefined) changes.location = data.location;
  return changes;
};

export class VehiclesController {
  constructor(
    private readonly createVehicleUseCase: CreateVehicleUseCase,
    private readonly getVehicleUseCase: GetVehicleUseCase,
    private readonly filterVehiclesUseCase: FilterVehiclesUseCase,
    private readonly updateVehicleUseCase: UpdateVehicleUseCase,
    private readonly updateVehicleStatusUseCase: UpdateVehicleStatusUseCase,
    private readonly deleteVehicleUseCase: DeleteVehicleUseCase,
    private readonly getVehicleRentalHistoryUseCase: GetVehicleRentalHistoryUseCase
  ) {}

  create = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const data = parseInput(createSchema, req.body);
    const vehicle = await this.createVehicleUseCase.execute({
      name: data.name,
      model: data.model,
      vehicleType: data.vehicle_type,
      rentalPricePerDay: data.rental_price_per_day,
      availabilityStatus: data.availability_status,
      location: data.location
    });
    res.status(201).json(toVehicleResponse(vehicle));
  };

  list = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const query = parseInput(filterSchema, req.query);
    const vehicles = await this.filterVehiclesUseCase.execute({
      vehicleType: query.vehicle_type,
      availabilityStatus: query.availability_status,
      location: query.location,
      minPrice: query.min_price,
      maxPrice: query.max_price
    });
    res.status(200).json(vehicles.map(toVehicleResponse));
  };

  getById = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const vehicle = await this.getVehicleUseCase.execute(pathParam(req, "id"));
    res.status(200).json(toVehicleResponse(vehicle));
  };

  rentalHistory = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const rentals = await this.getVehicleRentalHistoryUseCase.execute(pathParam(req, "id"));
    res.status(200).json(rentals.map(toRentalResponse));
  };

  update = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const vehicleId = pathParam(req, "id");
    const data = parseInput(updateSchema, req.body);
    const vehicle = await this.updateVehicleUseCase.execute(vehicleId, toChanges(data));
    res.status(200).json(toVehicleResponse(vehicle));
  };

  updateStatus = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const vehicleId = pathParam(req, "id");
    const data = parseInput(statusSchema, req.body);
    const vehicle = await this.updateVehicleStatusUseCase.execute(vehicleId, data.availability_status);
    res.status(200).json(toVehicleResponse(vehicle));
  };

  remove = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    await this.deleteVehicleUseCase.execute(pathParam(req, "id"));
    res.status(204).send();
  };
}
