import { User } from "../../domain/entities/User";
import { Vehicle } from "../../domain/entities/Vehicle";
import { Rental } from "../../domain/entities/Rental";
import { Branch } from "../../domain/entities/Branch";
import { RentalStats } from "../../application/use-cases/GetStatsUseCase";

export const toUserResponse = (user: User) => ({
  id: user.id,
  name: user.name,
  email: user.email,
  role: user.role,
  created_at: user.createdAt.toISOString()
});

export const toVehicleResponse = (vehicle: Vehicle) => ({
  id: vehicle.id,
  name: vehicle.name,
  model: vehicle.model,
  vehicle_type: vehicle.vehicleType,
  rental_price_per_day: vehicle.rentalPricePerDay,
  availability_status: vehicle.availabilityStatus,
  location: vehicle.location
});

export const toRentalResponse = (rental: Rental) => ({
  id: rental.id,
  vehicle_id: rental.vehicleId,
  customer_id: rental.customerId,
  rental_start_date: rental.startDate.toISOString(),
  rental_end_date: rental.endDate.toISOString(),
  total_cost: rental.totalCost,
  rental_status: rental.status,
  created_at: rental.createdAt.toISOString()
});

export const toBranchResponse = (branch: Branch) => ({
  id: branch.id,
  name: branch.name,
  location: branch.location,
  contact_number: branch.contactNumber
});

export const toStatsResponse = (stats: RentalStats) => ({
  available_vehicles: stats.availableVehicles,
  branch_count: stats.branchCount,
  active_rentals: stats.activeRentals
});
