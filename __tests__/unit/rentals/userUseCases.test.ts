import { RegisterUserUseCase } from "../../../src/rentals/application/use-cases/RegisterUserUseCase";
import { AuthenticateUserUseCase } from "../../../src/rentals/application/use-cases/AuthenticateUserUseCase";
import { GetUserUseCase } from "../../../src/rentals/application/use-cases/GetUserUseCase";
import { ListUsersUseCase } from "../../../src/rentals/application/use-cases/ListUsersUseCase";
import { DeleteUserUseCase } from "../../../src/rentals/application/use-cases/DeleteUserUseCase";
import { UpdateUserUseCase } from "../../../src/rentals/application/use-cases/UpdateUserUseCase";
import { NotificationAudience } from "../../../src/rentals/application/NotificationAudience";
import { PublishError } from "../../../src/rentals/application/ports/EventPublisher";
import { AppError } from "../../../src/shared/http/AppError";
import { InMemoryUserRepository } from "../../support/inMemoryRepositories";
import { createTestLogger, PlainPasswordHasher, RecordingEventPublisher } from "../../support/fakes";

describe("user use cases", () => {
  const setup = () => ({
    users: new InMemoryUserRepository(),
    publisher: new RecordingEventPublisher(),
    hasher: new PlainPasswordHasher(),
    logger: createTestLogger()
  });

  describe("RegisterUserUseCase", () => {
    it("cria usuário com senha em hash e publica UserCreated", async () => {
      const { users, publisher, hasher, logger } = setup();
      const useCase = new RegisterUserUseCase(users, publisher, hasher, logger);

      const user = await useCase.execute({
        name: "Ana",
        email: "ana@example.com",
        password: "test-password",
        role: "CUSTOMER"
      });

      expect(user.password).toBe("hashed:test-password");
      expect(await users.findById(user.id)).toBe(user);
      expect(publisher.events).toHaveLength(1);
      expect(publisher.events[0]).toMatchObject({
        eventType: "UserCreated",
        subjectId: user.id,
        targetUserIds: [],
        payload: { userId: user.id, name: "Ana", email: "ana@example.com", role: "CUSTOMER" }
      });
      expect(logger.info).toHaveBeenCalledWith("User registration completed", { userId: user.id });
    });

    it("recusa email já cadastrado", async () => {
      const { users, publisher, hasher, logger } = setup();
      await users.create({
        name: "Ana",
        email: "ana@example.com",
        password: "hashed:x",
        role: "CUSTOMER"
      });
      const useCase = new RegisterUserUseCase(users, publisher, hasher, logger);

      await expect(
        useCase.execute({ name: "Outra", email: "ANA@example.com", password: "secret1", role: "CUSTOMER" })
      ).rejects.toEqual(new AppError("CONFLICT", 409, "Email already registered"));
      expect(publisher.events).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith("User registration failed", {
        error: "AppError: Email already registered"
      });
    });

    it("conclui o cadastro mesmo com falha na publicação", async () => {
      const { users, publisher, hasher, logger } = setup();
      publisher.failure = new PublishError("Kafka publish failed: down", "user_events");
      const useCase = new RegisterUserUseCase(users, publisher, hasher, logger);

      const user = await useCase.execute({
        name: "Ana",
        email: "ana@example.com",
        password: "test-password",
        role: "EMPLOYEE"
      });

      expect(await users.findById(user.id)).toBe(user);
      expect(logger.error).toHaveBeenCalledWith(
        "Failed to publish domain event",
        expect.objectContaining({ eventType: "UserCreated" })
      );
    });
  });

  describe("AuthenticateUserUseCase", () => {
    it("retorna o usuário com a senha correta", async () => {
      const { users, hasher, logger } = setup();
      const stored = await users.create({
        name: "Ana",
        email: "ana@example.com",
        password: "hashed:test-password",
        role: "EMPLOYEE"
      });

      const user = await new AuthenticateUserUseCase(users, hasher, logger).execute({
        email: "ana@example.com",
        password: "test-password"
      });

      expect(user).toBe(stored);
    });

    it("recusa senha errada", async () => {
      const { users, hasher, logger } = setup();
      await users.create({
        name: "Ana",
        email: "ana@example.com",
        password: "hashed:test-password",
        role: "CUSTOMER"
      });

      await expect(
        new AuthenticateUserUseCase(users, hasher, logger).execute({
          email: "ana@example.com",
          password: "wrong"
        })
      ).rejects.toEqual(new AppError("UNAUTHORIZED", 401, "Incorrect email or password"));
    });

    it("recusa email desconhecido", async () => {
      const { users, hasher, logger } = setup();

      await expect(
        new AuthenticateUserUseCase(users, hasher, logger).execute({
          email: "ghost@example.com",
          password: "x"
        })
      ).rejects.toMatchObject({ statusCode: 401 });
    });
  });

  describe("GetUserUseCase e ListUsersUseCase", () => {
    it("busca e lista usuários", async () => {
      const { users, logger } = setup();
      const ana = await users.create({ name: "Ana", email: "a@example.com", password: "h", role: "CUSTOMER" });

      await expect(new GetUserUseCase(users, logger).execute(ana.id)).resolves.toBe(ana);
      await expect(new ListUsersUseCase(users, logger).execute()).resolves.toEqual([ana]);
    });

    it("retorna 404 para usuário ausente", async () => {
      const { users, logger } = setup();

      await expect(new GetUserUseCase(users, logger).execute("ghost")).rejects.toEqual(
        new AppError("NOT_FOUND", 404, "User not found")
      );
    });
  });

  describe("UpdateUserUseCase", () => {
    it("atualiza campos, refaz o hash da senha e publica UserUpdated sem ela", async () => {
      const { users, publisher, hasher, logger } = setup();
      const ana = await users.create({ name: "Ana", email: "a@example.com", password: "hashed:old", role: "CUSTOMER" });
      const useCase = new UpdateUserUseCase(users, hasher, publisher, logger);

      const updated = await useCase.execute(ana.id, { email: "Ana.Silva@Example.com", password: "new-password" });

      expect(updated.email).toBe("ana.silva@example.com");
      expect(updated.password).toBe("hashed:new-password");
      expect(updated.name).toBe("Ana");
      expect(publisher.events).toHaveLength(1);
      expect(publisher.events[0]).toMatchObject({
        eventType: "UserUpdated",
        subjectId: ana.id,
        targetUserIds: [],
        payload: {
          userId: ana.id,
          updatedFields: ["email", "password"],
          name: "Ana",
          email: "ana.silva@example.com",
          role: "CUSTOMER"
        }
      });
      expect(publisher.events[0].payload).not.toHaveProperty("password");
    });

    it("recusa email de outro usuário", async () => {
      const { users, publisher, hasher, logger } = setup();
      const ana = await users.create({ name: "Ana", email: "a@example.com", password: "h", role: "CUSTOMER" });
      await users.create({ name: "Bia", email: "b@example.com", password: "h", role: "CUSTOMER" });

      await expect(
        new UpdateUserUseCase(users, hasher, publisher, logger).execute(ana.id, { email: "B@example.com" })
      ).rejects.toEqual(new AppError("CONFLICT", 409, "Email already in use"));
      expect(publisher.events).toEqual([]);
    });

    it("aceita o próprio email com outra caixa", async () => {
      const { users, publisher, hasher, logger } = setup();
      const ana = await users.create({ name: "Ana", email: "a@example.com", password: "h", role: "CUSTOMER" });

      const updated = await new UpdateUserUseCase(users, hasher, publisher, logger).execute(ana.id, {
        email: "A@EXAMPLE.COM",
        role: "EMPLOYEE"
      });

      expect(updated.email).toBe("a@example.com");
      expect(updated.role).toBe("EMPLOYEE");
    });

    it("recusa atualização vazia e usuário ausente", async () => {
      const { users, publisher, hasher, logger } = setup();
      const useCase = new UpdateUserUseCase(users, hasher, publisher, logger);

      await expect(useCase.execute("ghost", {})).rejects.toEqual(
        new AppError("INVALID_INPUT", 400, "No fields to update")
      );
      await expect(useCase.execute("ghost", { name: "X" })).rejects.toEqual(
        new AppError("NOT_FOUND", 404, "User not found")
      );
      expect(publisher.events).toEqual([]);
    });
  });

  describe("DeleteUserUseCase", () => {
    it("remove e publica UserDeleted", async () => {
      const { users, publisher, logger } = setup();
      const ana = await users.create({ name: "Ana", email: "a@example.com", password: "h", role: "CUSTOMER" });

      await new DeleteUserUseCase(users, publisher, logger).execute(ana.id);

      expect(await users.findById(ana.id)).toBeNull();
      expect(publisher.events[0]).toMatchObject({
        eventType: "UserDeleted",
        subjectId: ana.id,
        payload: { userId: ana.id }
      });
    });

    it("retorna 404 sem publicar quando não existe", async () => {
      const { users, publisher, logger } = setup();

      await expect(new DeleteUserUseCase(users, publisher, logger).execute("ghost")).rejects.toMatchObject({
        code: "NOT_FOUND"
      });
      expect(publisher.events).toEqual([]);
    });
  });

  describe("NotificationAudience", () => {
    it("junta cliente e funcionários sem repetir", async () => {
      const { users } = setup();
      const customer = await users.create({ id: "c1", name: "C", email: "c@example.com", password: "h", role: "CUSTOMER" });
      await users.create({ id: "e1", name: "E1", email: "e1@example.com", password: "h", role: "EMPLOYEE" });
      await users.create({ id: "e2", name: "E2", email: "e2@example.com", password: "h", role: "EMPLOYEE" });
      const audience = new NotificationAudience(users);

      await expect(audience.customerAndEmployees(customer.id)).resolves.toEqual(["c1", "e1", "e2"]);
      await expect(audience.customerAndEmployees("e1")).resolves.toEqual(["e1", "e2"]);
      await expect(audience.everyone()).resolves.toEqual(["c1", "e1", "e2"]);
    });
  });
});
