import { Rental, RentalStatus } from "../entities/Rental";

export type CreateRentalInput = {
  id?: string;
  vehicleId: string;
  customerId: string;
  startDate: Date;
  endDate: Date;
  totalCost: number;
};

export type RentalFilter = {
  vehicleId?: string;
  customerId?: string;
  status?: RentalStatus;
};

export interface RentalRepository {
  create(input: CreateRentalInput): Promise<Rental>;
  findById(id: string): Promise<Rental | null>;
  find(filter: RentalFilter): Promise<Rental[]>;
  updateStatus(id: string, status: RentalStatus): Promise<Rental | null>;
  deleteById(id: string): Promise<boolean>;
  countByStatus(status: RentalStatus): Promise<number>;
}
