export type RentalId = string;
export const rentalStatuses = ["PENDING", "APPROVED", "REJECTED", "COMPLETED"] as const;

export type RentalStatus = (typeof rentalStatuses)[number];

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Whole days between two instants, rounded down. */
export const rentalDays = (startDate: Date, endDate: Date): number =>
  Math.floor((endDate.getTime() - startDate.getTime()) / MS_PER_DAY);

export class Rental {
  constructor(
    public readonly id: RentalId,
    public readonly vehicleId: string,
    public readonly customerId: string,
    public readonly startDate: Date,
    public readonly endDate: Date,
    public readonly totalCost: number,
    public readonly status: RentalStatus,
    public readonly createdAt: Date
  ) {}
}
