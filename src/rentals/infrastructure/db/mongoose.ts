import mongoose, { Schema, model } from "mongoose";
import { UserRole, userRoles } from "../../domain/entities/User";
import {
  AvailabilityStatus,
  availabilityStatuses,
  VehicleType,
  vehicleTypes
} from "../../domain/entities/Vehicle";
import { RentalStatus, rentalStatuses } from "../../domain/entities/Rental";

export type MongoConfig = {
  uri: string;
};

export const connectMongo = async (config: MongoConfig): Promise<void> => {
  await mongoose.connect(config.uri);
};

export type UserDocument = {
  _id: string;
  name: string;
  email: string;
  password: string;
  role: UserRole;
  createdAt: Date;
};

export type VehicleDocument = {
  _id: string;
  name: string;
  model: string;
  vehicleType: VehicleType;
  rentalPricePerDay: number;
  availabilityStatus: AvailabilityStatus;
  location: string;
};

export type RentalDocument = {
  _id: string;
  vehicleId: string;
  customerId: string;
  startDate: Date;
  endDate: Date;
  totalCost: number;
  status: RentalStatus;
  createdAt: Date;
};

export type BranchDocument = {
  _id: string;
  name: string;
  location: string;
  contactNumber: string;
};

const UserSchema = new Schema<UserDocument>(
  {
    _id: { type: String, required: true },
    name: { type: String, required: true },
    email: { type: String, required: true, unique: true },
    password: { type: String, required: true },
    role: { type: String, required: true, enum: [...userRoles], index: true },
    createdAt: { type: Date, required: true }
  },
  { versionKey: false }
);

const VehicleSchema = new Schema<VehicleDocument>(
  {
    _id: { type: String, required: true },
    name: { type: String, required: true },
    model: { type: String, required: true },
    vehicleType: { type: String, required: true, enum: [...vehicleTypes] },
    rentalPricePerDay: { type: Number, required: true, min: 0 },
    availabilityStatus: { type: String, required: true, enum: [...availabilityStatuses], index: true },
    location: { type: String, required: true }
  },
  { versionKey: false }
);

const RentalSchema = new Schema<RentalDocument>(
  {
    _id: { type: String, required: true },
    vehicleId: { type: String, required: true, index: true },
    customerId: { type: String, required: true, index: true },
    startDate: { type: Date, required: true },
    endDate: { type: Date, required: true },
    totalCost: { type: Number, required: true },
    status: { type: String, required: true, enum: [...rentalStatuses] },
    createdAt: { type: Date, required: true }
  },
  { versionKey: false }
);

const BranchSchema = new Schema<BranchDocument>(
  {
    _id: { type: String, required: true },
    name: { type: String, required: true },
    location: { type: String, required: true },
    contactNumber: { type: String, required: true }
  },
  { versionKey: false }
);

export const UserModel = model<UserDocument>("User", UserSchema);
export const VehicleModel = model<VehicleDocument>("Vehicle", VehicleSchema);
export const RentalModel = model<RentalDocument>("Rental", RentalSchema);
export const BranchModel = model<BranchDocument>("Branch", BranchSchema);

export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === 11000;
