import { randomUUID } from "crypto";
import { FilterQuery } from "mongoose";
import {
  CreateVehicleInput,
  UpdateVehicleInput,
  VehicleFilter,
  VehicleRepository
} from "../../domain/repositories/VehicleRepository";
import { AvailabilityStatus, Vehicle } from "../../domain/entities/Vehicle";
import { VehicleDocument, VehicleModel } from "./mongoose";
import { createTimedQuery, TimedQuery } from "./timedQuery";
import { Metrics } from "../../../shared/observability/metrics";

const toVehicle = (doc: VehicleDocument): Vehicle =>
  new Vehicle(
    doc._id,
    doc.name,
    doc.model,
    doc.vehicleType,
    doc.rentalPricePerDay,
    doc.availabilityStatus,
    doc.location
  );

const toQuery = (filter: VehicleFilter): FilterQuery<VehicleDocument> => {
  const query: FilterQuery<VehicleDocument> = {};
  if (filter.vehicleType) {
    query.vehicleType = filter.vehicleType;
  }
  if (filter.availabilityStatus) {
    query.availabilityStatus = filter.availabilityStatus;
  }
  if (filter.location) {
    query.location = filter.location;
  }
  if (filter.minPrice !== undefined || filter.maxPrice !== undefined) {
    query.rentalPricePerDay = {
      ...(filter.minPrice !== undefined ? { $gte: filter.minPrice } : {}),
      ...(filter.maxPrice !== undefined ? { $lte: filter.maxPrice } : {})
    };
  }
  return query;
};

export class VehicleMongoRepository implements VehicleRepository {
  private readonly timed: TimedQuery;

  constructor(metrics: Pick<Metrics, "recordDbQuery">) {
    this.timed = createTimedQuery(metrics);
  }

  async create(input: CreateVehicleInput): Promise<Vehicle> {
    const vehicle = new Vehicle(
      input.id ?? randomUUID(),
      input.name,
      input.model,
      input.vehicleType,
      input.rentalPricePerDay,
      input.availabilityStatus,
      input.location
    );
    await this.timed("create_vehicle", () =>
      VehicleModel.create({
        _id: vehicle.id,
        name: vehicle.name,
        model: vehicle.model,
        vehicleType: vehicle.vehicleType,
        rentalPricePerDay: vehicle.rentalPricePerDay,
        availabilityStatus: vehicle.availabilityStatus,
        location: vehicle.location
      })
    );
    return vehicle;
  }

  async findById(id: string): Promise<Vehicle | null> {
    const doc = await this.timed("find_vehicle_by_id", () => VehicleModel.findById(id).lean());
    return doc ? toVehicle(doc) : null;
  }

  async find(filter: VehicleFilter): Promise<Vehicle[]> {
    const docs = await this.timed("find_vehicles", () => VehicleModel.find(toQuery(filter)).lean());
    return docs.map(toVehicle);
  }

  async updateById(id: string, input: UpdateVehicleInput): Promise<Vehicle | null> {
    const doc = await this.timed("update_vehicle", () =>
      VehicleModel.findByIdAndUpdate(id, { $set: input }, { new: true, runValidators: true }).lean()
    );
    return doc ? toVehicle(doc) : null;
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.timed("delete_vehicle", () => VehicleModel.deleteOne({ _id: id }));
    return result.deletedCount > 0;
  }

  async countByStatus(status: AvailabilityStatus): Promise<number> {
    return this.timed("count_vehicles", () =>
      VehicleModel.countDocuments({ availabilityStatus: status })
    );
  }
}
