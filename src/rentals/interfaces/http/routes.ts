import { RequestHandler, Router } from "express";
import { UsersController } from "./UsersController";
import { VehiclesController } from "./VehiclesController";
import { RentalsController } from "./RentalsController";
import { BranchesController } from "./BranchesController";
import { StatsController } from "./StatsController";
import { AuthConfig, authMiddleware, requireRole } from "../../../shared/http/authMiddleware";
import { asyncHandler } from "../../../shared/http/asyncHandler";
import { RouteRateLimiters } from "../../../shared/http/rateLimitMiddleware";

export type RentalsControllers = {
  users: UsersController;
  vehicles: VehiclesController;
  rentals: RentalsController;
  branches: BranchesController;
  stats: StatsController;
};

const optional = (handler: RequestHandler | undefined): RequestHandler[] => (handler ? [handler] : []);

export const buildRentalsRoutes = (
  controllers: RentalsControllers,
  authConfig: AuthConfig,
  rateLimiters?: Partial<RouteRateLimiters>
): Router => {
  const { users, vehicles, rentals, branches, stats } = controllers;
  const write = optional(rateLimiters?.write);
  const employee = requireRole("EMPLOYEE");
  const customer = requireRole("CUSTOMER");

  const router = Router();
  router.post("/users", ...write, asyncHandler(users.register));
  router.post("/auth/token", ...optional(rateLimiters?.auth), asyncHandler(users.token));
  router.get("/api/stats", asyncHandler(stats.get));

  router.use(authMiddleware(authConfig));

  router.get("/users", employee, asyncHandler(users.list));
  router.get("/users/:id", employee, asyncHandler(users.getById));
  router.patch("/users/:id", employee, ...write, asyncHandler(users.update));
  router.delete("/users/:id", employee, ...write, asyncHandler(users.remove));

  router.post("/vehicles", employee, ...write, asyncHandler(vehicles.create));
  router.get("/vehicles", asyncHandler(vehicles.list));
  router.get("/vehicles/:id", asyncHandler(vehicles.getById));
  router.get("/vehicles/:id/rental_history", asyncHandler(vehicles.rentalHistory));
  router.patch("/vehicles/:id", employee, ...write, asyncHandler(vehicles.update));
  router.put(
    "/vehicles/:id/availability_status",
    employee,
    ...write,
    asyncHandler(vehicles.updateStatus)
  );
  router.delete("/vehicles/:id", employee, ...write, asyncHandler(vehicles.remove));

  router.post("/rentals", customer, ...write, asyncHandler(rentals.create));
  router.get("/rentals", employee, asyncHandler(rentals.list));
  router.get("/rentals/:id", asyncHandler(rentals.getById));
  router.put("/rentals/:id/rental_status", employee, ...write, asyncHandler(rentals.updateStatus));
  router.delete("/rentals/:id", employee, ...write, asyncHandler(rentals.remove));

  router.post("/branches", employee, ...write, asyncHandler(branches.create));
  router.get("/branches", asyncHandler(branches.list));
  router.get("/branches/:id", asyncHandler(branches.getById));
  router.patch("/branches/:id", employee, ...write, asyncHandler(branches.update));
  router.delete("/branches/:id", employee, ...write, asyncHandler(branches.remove));

  return router;
};
