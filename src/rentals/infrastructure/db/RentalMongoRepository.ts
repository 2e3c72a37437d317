import { randomUUID } from "crypto";
import { FilterQuery } from "mongoose";
import {
  CreateRentalInput,
  RentalFilter,
  RentalRepository
} from "../../domain/repositories/RentalRepository";
import { Rental, RentalStatus } from "../../domain/entities/Rental";
import { RentalDocument, RentalModel } from "./mongoose";
import { createTimedQuery, TimedQuery } from "./timedQuery";
import { Metrics } from "../../../shared/observability/metrics";

const toRental = (doc: RentalDocument): Rental =>
  new Rental(
    doc._id,
    doc.vehicleId,
    doc.customerId,
    new Date(doc.startDate),
    new Date(doc.endDate),
    doc.totalCost,
    doc.status,
    new Date(doc.createdAt)
  );

export class RentalMongoRepository implements RentalRepository {
  private readonly timed: TimedQuery;

  constructor(metrics: Pick<Metrics, "recordDbQuery">) {
    this.timed = createTimedQuery(metrics);
  }

  async create(input: CreateRentalInput): Promise<Rental> {
    const rental = new Rental(
      input.id ?? randomUUID(),
      input.vehicleId,
      input.customerId,
      input.startDate,
      input.endDate,
      input.totalCost,
      "PENDING",
      new Date()
    );
    await this.timed("create_rental", () =>
      RentalModel.create({
        _id: rental.id,
        vehicleId: rental.vehicleId,
        customerId: rental.customerId,
        startDate: rental.startDate,
        endDate: rental.endDate,
        totalCost: rental.totalCost,
        status: rental.status,
        createdAt: rental.createdAt
      })
    );
    return rental;
  }

  async findById(id: string): Promise<Rental | null> {
    const doc = await this.timed("find_rental_by_id", () => RentalModel.findById(id).lean());
    return doc ? toRental(doc) : null;
  }

  async find(filter: RentalFilter): Promise<Rental[]> {
    const query: FilterQuery<RentalDocument> = {};
    if (filter.vehicleId) {
      query.vehicleId = filter.vehicleId;
    }
    if (filter.customerId) {
      query.customerId = filter.customerId;
    }
    if (filter.status) {
      query.status = filter.status;
    }
    const docs = await this.timed("find_rentals", () =>
      RentalModel.find(query).sort({ createdAt: 1 }).lean()
    );
    return docs.map(toRental);
  }

  async updateStatus(id: string, status: RentalStatus): Promise<Rental | null> {
    const doc = await this.timed("update_rental_status", () =>
      RentalModel.findByIdAndUpdate(id, { $set: { status } }, { new: true }).lean()
    );
    return doc ? toRental(doc) : null;
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.timed("delete_rental", () => RentalModel.deleteOne({ _id: id }));
    return result.deletedCount > 0;
  }

  async countByStatus(status: RentalStatus): Promise<number> {
    return this.timed("count_rentals", () => RentalModel.countDocuments({ status }));
  }
}
