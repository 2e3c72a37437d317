import { AvailabilityStatus, Vehicle, VehicleType } from "../entities/Vehicle";

export type CreateVehicleInput = {
  id?: string;
  name: string;
  model: string;
  vehicleType: VehicleType;
  rentalPricePerDay: number;
  availabilityStatus: AvailabilityStatus;
  location: string;
};

export type UpdateVehicleInput = Partial<Omit<CreateVehicleInput, "id">>;

export type VehicleFilter = {
  vehicleType?: VehicleType;
  availabilityStatus?: AvailabilityStatus;
  location?: string;
  minPrice?: number;
  maxPrice?: number;
};

export interface VehicleRepository {
  create(input: CreateVehicleInput): Promise<Vehicle>;
  findById(id: string): Promise<Vehicle | null>;
  find(filter: VehicleFilter): Promise<Vehicle[]>;
  updateById(id: string, input: UpdateVehicleInput): Promise<Vehicle | null>;
  deleteById(id: string): Promise<boolean>;
  countByStatus(status: AvailabilityStatus): Promise<number>;
}
