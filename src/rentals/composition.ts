import { UserRepository } from "./domain/repositories/UserRepository";
import { VehicleRepository } from "./domain/repositories/VehicleRepository";
import { RentalRepository } from "./domain/repositories/RentalRepository";
import { BranchRepository } from "./domain/repositories/BranchRepository";
import { EventPublisher } from "./application/ports/EventPublisher";
import { PasswordHasher } from "./application/ports/PasswordHasher";
import { TokenIssuer } from "./application/ports/TokenIssuer";
import { NotificationAudience } from "./application/NotificationAudience";
import { RegisterUserUseCase } from "./application/use-cases/RegisterUserUseCase";
import { AuthenticateUserUseCase } from "./application/use-cases/AuthenticateUserUseCase";
import { ListUsersUseCase } from "./application/use-cases/ListUsersUseCase";
import { GetUserUseCase } from "./application/use-cases/GetUserUseCase";
import { DeleteUserUseCase } from "./application/use-cases/DeleteUserUseCase";
import { UpdateUserUseCase } from "./application/use-cases/UpdateUserUseCase";
import { CreateVehicleUseCase } from "./application/use-cases/CreateVehicleUseCase";
import { GetVehicleUseCase } from "./application/use-cases/GetVehicleUseCase";
import { FilterVehiclesUseCase } from "./application/use-cases/FilterVehiclesUseCase";
import { UpdateVehicleUseCase } from "./application/use-cases/UpdateVehicleUseCase";
import { UpdateVehicleStatusUseCase } from "./application/use-cases/UpdateVehicleStatusUseCase";
import { DeleteVehicleUseCase } from "./application/use-cases/DeleteVehicleUseCase";
import { GetVehicleRentalHistoryUseCase } from "./application/use-cases/GetVehicleRentalHistoryUseCase";
import { CreateRentalUseCase } from "./application/use-cases/CreateRentalUseCase";
import { ListRentalsUseCase } from "./application/use-cases/ListRentalsUseCase";
import { GetRentalUseCase } from "./application/use-cases/GetRentalUseCase";
import { UpdateRentalStatusUseCase } from "./application/use-cases/UpdateRentalStatusUseCase";
import { DeleteRentalUseCase } from "./application/use-cases/DeleteRentalUseCase";
import { CreateBranchUseCase } from "./application/use-cases/CreateBranchUseCase";
import { ListBranchesUseCase } from "./application/use-cases/ListBranchesUseCase";
import { GetBranchUseCase } from "./application/use-cases/GetBranchUseCase";
import { UpdateBranchUseCase } from "./application/use-cases/UpdateBranchUseCase";
import { DeleteBranchUseCase } from "./application/use-cases/DeleteBranchUseCase";
import { GetStatsUseCase } from "./application/use-cases/GetStatsUseCase";
import { UsersController } from "./interfaces/http/UsersController";
import { VehiclesController } from "./interfaces/http/VehiclesController";
import { RentalsController } from "./interfaces/http/RentalsController";
import { BranchesController } from "./interfaces/http/BranchesController";
import { StatsController } from "./interfaces/http/StatsController";
import { RentalsControllers } from "./interfaces/http/routes";
import { Logger } from "../shared/observability/logger";

export type RentalsRepositories = {
  users: UserRepository;
  vehicles: VehicleRepository;
  rentals: RentalRepository;
  branches: BranchRepository;
};

export type RentalsDependencies = {
  repositories: RentalsRepositories;
  eventPublisher: EventPublisher;
  passwordHasher: PasswordHasher;
  tokenIssuer: TokenIssuer;
  logger: Logger;
};

/** Wires use cases and controllers over the given adapters. */
export const createRentalsControllers = (deps: RentalsDependencies): RentalsControllers => {
  const { repositories, eventPublisher: publisher, passwordHasher, logger } = deps;
  const { users, vehicles, rentals, branches } = repositories;
  const audience = new NotificationAudience(users);

  return {
    users: new UsersController(
      new RegisterUserUseCase(users, publisher, passwordHasher, logger),
      new AuthenticateUserUseCase(users, passwordHasher, logger),
      new ListUsersUseCase(users, logger),
      new GetUserUseCase(users, logger),
      new UpdateUserUseCase(users, passwordHasher, publisher, logger),
      new DeleteUserUseCase(users, publisher, logger),
      deps.tokenIssuer
    ),
    vehicles: new VehiclesController(
      new CreateVehicleUseCase(vehicles, publisher, logger),
      new GetVehicleUseCase(vehicles, logger),
      new FilterVehiclesUseCase(vehicles, logger),
      new UpdateVehicleUseCase(vehicles, publisher, logger),
      new UpdateVehicleStatusUseCase(vehicles, audience, publisher, logger),
      new DeleteVehicleUseCase(vehicles, publisher, logger),
      new GetVehicleRentalHistoryUseCase(rentals, logger)
    ),
    rentals: new RentalsController(
      new CreateRentalUseCase(rentals, vehicles, users, audience, publisher, logger),
      new ListRentalsUseCase(rentals, logger),
      new GetRentalUseCase(rentals, logger),
      new UpdateRentalStatusUseCase(rentals, vehicles, audience, publisher, logger),
      new DeleteRentalUseCase(rentals, publisher, logger)
    ),
    branches: new BranchesController(
      new CreateBranchUseCase(branches, publisher, logger),
      new ListBranchesUseCase(branches, logger),
      new GetBranchUseCase(branches, logger),
      new UpdateBranchUseCase(branches, publisher, logger),
      new DeleteBranchUseCase(branches, publisher, logger)
    ),
    stats: new StatsController(new GetStatsUseCase(vehicles, rentals, branches, logger))
  };
};
