export type VehicleId = string;
export const vehicleTypes = ["CAR", "TRUCK", "SUV", "VAN", "MOTORCYCLE"] as const;
export const availabilityStatuses = ["AVAILABLE", "RENTED", "MAINTENANCE"] as const;

export type VehicleType = (typeof vehicleTypes)[number];
export type AvailabilityStatus = (typeof availabilityStatuses)[number];

export class Vehicle {
  constructor(
    public readonly id: VehicleId,
    public readonly name: string,
    public readonly model: string,
    public readonly vehicleType: VehicleType,
    public readonly rentalPricePerDay: number,
    public readonly availabilityStatus: AvailabilityStatus,
    public readonly location: string
  ) {}

  isAvailable(): boolean {
    return this.availabilityStatus === "AVAILABLE";
  }

  calculateRentalCost(days: number): number {
    return this.rentalPricePerDay * Math.max(0, days);
  }
}
