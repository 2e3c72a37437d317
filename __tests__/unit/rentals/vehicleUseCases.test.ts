import { CreateVehicleUseCase } from "../../../src/rentals/application/use-cases/CreateVehicleUseCase";
import { GetVehicleUseCase } from "../../../src/rentals/application/use-cases/GetVehicleUseCase";
import { FilterVehiclesUseCase } from "../../../src/rentals/application/use-cases/FilterVehiclesUseCase";
import { UpdateVehicleUseCase } from "../../../src/rentals/application/use-cases/UpdateVehicleUseCase";
import { UpdateVehicleStatusUseCase } from "../../../src/rentals/application/use-cases/UpdateVehicleStatusUseCase";
import { DeleteVehicleUseCase } from "../../../src/rentals/application/use-cases/DeleteVehicleUseCase";
import { GetVehicleRentalHistoryUseCase } from "../../../src/rentals/application/use-cases/GetVehicleRentalHistoryUseCase";
import { NotificationAudience } from "../../../src/rentals/application/NotificationAudience";
import { CreateVehicleInput } from "../../../src/rentals/domain/repositories/VehicleRepository";
import { AppError } from "../../../src/shared/http/AppError";
import { createInMemoryRepositories } from "../../support/inMemoryRepositories";
import { createTestLogger, RecordingEventPublisher } from "../../support/fakes";

const civic: CreateVehicleInput = {
  id: "v1",
  name: "Civic",
  model: "2022",
  vehicleType: "CAR",
  rentalPricePerDay: 100,
  availabilityStatus: "AVAILABLE",
  location: "Lisboa"
};

describe("vehicle use cases", () => {
  const setup = () => ({
    ...createInMemoryRepositories(),
    publisher: new RecordingEventPublisher(),
    logger: createTestLogger()
  });

  it("cria veículo e publica VehicleCreated com todos os campos", async () => {
    const { vehicles, publisher, logger } = setup();
    const vehicle = await new CreateVehicleUseCase(vehicles, publisher, logger).execute({
      name: "Civic",
      model: "2022",
      vehicleType: "CAR",
      rentalPricePerDay: 100,
      availabilityStatus: "AVAILABLE",
      location: "Lisboa"
    });

    expect(await vehicles.findById(vehicle.id)).toBe(vehicle);
    expect(publisher.events[0]).toMatchObject({
      eventType: "VehicleCreated",
      subjectId: vehicle.id,
      targetUserIds: [],
      payload: {
        vehicleId: vehicle.id,
        name: "Civic",
        model: "2022",
        vehicleType: "CAR",
        rentalPricePerDay: 100,
        availabilityStatus: "AVAILABLE",
        location: "Lisboa"
      }
    });
  });

  it("retorna 404 para veículo ausente", async () => {
    const { vehicles, logger } = setup();

    await expect(new GetVehicleUseCase(vehicles, logger).execute("ghost")).rejects.toEqual(
      new AppError("NOT_FOUND", 404, "Vehicle not found")
    );
  });

  it("filtra por tipo e faixa de preço", async () => {
    const { vehicles, logger } = setup();
    await vehicles.create(civic);
    await vehicles.create({ ...civic, id: "v2", vehicleType: "SUV", rentalPricePerDay: 200 });
    await vehicles.create({ ...civic, id: "v3", vehicleType: "SUV", rentalPricePerDay: 350 });
    const useCase = new FilterVehiclesUseCase(vehicles, logger);

    const result = await useCase.execute({ vehicleType: "SUV", minPrice: 150, maxPrice: 300 });

    expect(result.map((vehicle) => vehicle.id)).toEqual(["v2"]);
  });

  it("recusa faixa de preço invertida", async () => {
    const { vehicles, logger } = setup();

    await expect(
      new FilterVehiclesUseCase(vehicles, logger).execute({ minPrice: 300, maxPrice: 100 })
    ).rejects.toEqual(new AppError("INVALID_INPUT", 400, "min_price must not exceed max_price"));
  });

  it("atualiza campos e publica os alterados", async () => {
    const { vehicles, publisher, logger } = setup();
    await vehicles.create(civic);

    const updated = await new UpdateVehicleUseCase(vehicles, publisher, logger).execute("v1", {
      rentalPricePerDay: 90,
      location: "Porto"
    });

    expect(updated.rentalPricePerDay).toBe(90);
    expect(updated.location).toBe("Porto");
    expect(publisher.events[0]).toMatchObject({
      eventType: "VehicleUpdated",
      subjectId: "v1",
      payload: { vehicleId: "v1", updatedFields: { rentalPricePerDay: 90, location: "Porto" } }
    });
  });

  it("recusa atualização vazia", async () => {
    const { vehicles, publisher, logger } = setup();
    await vehicles.create(civic);

    await expect(
      new UpdateVehicleUseCase(vehicles, publisher, logger).execute("v1", {})
    ).rejects.toEqual(new AppError("INVALID_INPUT", 400, "No fields to update"));
    expect(publisher.events).toEqual([]);
  });

  it("muda disponibilidade e avisa todos os usuários", async () => {
    const { users, vehicles, publisher, logger } = setup();
    await users.create({ id: "c1", name: "C", email: "c@example.com", password: "h", role: "CUSTOMER" });
    await users.create({ id: "e1", name: "E", email: "e@example.com", password: "h", role: "EMPLOYEE" });
    await vehicles.create(civic);
    const useCase = new UpdateVehicleStatusUseCase(
      vehicles,
      new NotificationAudience(users),
      publisher,
      logger
    );

    const vehicle = await useCase.execute("v1", "MAINTENANCE");

    expect(vehicle.availabilityStatus).toBe("MAINTENANCE");
    expect(publisher.events[0]).toMatchObject({
      eventType: "VehicleStatusChanged",
      subjectId: "v1",
      targetUserIds: ["c1", "e1"],
      payload: { vehicleId: "v1", availabilityStatus: "MAINTENANCE" }
    });
  });

  it("remove veículo e publica VehicleDeleted", async () => {
    const { vehicles, publisher, logger } = setup();
    await vehicles.create(civic);

    await new DeleteVehicleUseCase(vehicles, publisher, logger).execute("v1");

    expect(await vehicles.findById("v1")).toBeNull();
    expect(publisher.eventTypes()).toEqual(["VehicleDeleted"]);
  });

  it("lista apenas locações concluídas no histórico", async () => {
    const { rentals, logger } = setup();
    const start = new Date("2024-05-01T00:00:00Z");
    const end = new Date("2024-05-03T00:00:00Z");
    const done = await rentals.create({ id: "r1", vehicleId: "v1", customerId: "c1", startDate: start, endDate: end, totalCost: 200 });
    await rentals.updateStatus(done.id, "COMPLETED");
    await rentals.create({ id: "r2", vehicleId: "v1", customerId: "c1", startDate: start, endDate: end, totalCost: 200 });
    const other = await rentals.create({ id: "r3", vehicleId: "v2", customerId: "c1", startDate: start, endDate: end, totalCost: 200 });
    await rentals.updateStatus(other.id, "COMPLETED");

    const history = await new GetVehicleRentalHistoryUseCase(rentals, logger).execute("v1");

    expect(history.map((rental) => rental.id)).toEqual(["r1"]);
  });
});
