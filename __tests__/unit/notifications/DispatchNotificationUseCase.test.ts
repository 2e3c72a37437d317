import {
  DispatchNotificationUseCase,
  SendFailure
} from "../../../src/notifications/application/use-cases/DispatchNotificationUseCase";
import { InMemoryConnectionRegistry } from "../../../src/notifications/infrastructure/realtime/InMemoryConnectionRegistry";
import { createDomainEvent } from "../../../src/shared/messaging/DomainEvent";
import { JsonEventCodec } from "../../../src/shared/messaging/JsonEventCodec";
import { FakeConnection } from "../../support/fakeConnection";
import { createTestLogger } from "../../support/fakes";

describe("DispatchNotificationUseCase", () => {
  const approved = createDomainEvent({
    eventType: "RentalApproved",
    subjectId: "r42",
    targetUserIds: ["u1"],
    payload: { status: "APPROVED" },
    timestamp: "2024-05-01T10:00:00.000Z"
  });
  const expectedMessage =
    '{"event_type":"RentalApproved","subject_id":"r42","payload":{"status":"APPROVED"},"timestamp":"2024-05-01T10:00:00.000Z"}';

  const setup = (sendTimeoutMs = 5000) => {
    const registry = new InMemoryConnectionRegistry();
    const metrics = { recordNotification: jest.fn() };
    const logger = createTestLogger();
    const useCase = new DispatchNotificationUseCase(
      registry,
      new JsonEventCodec(),
      { sendTimeoutMs },
      metrics,
      logger
    );
    return { registry, metrics, logger, useCase };
  };

  afterEach(() => {
    jest.useRealTimers();
  });

  it("envia uma vez para cada conexão de cada alvo", async () => {
    const { registry, useCase } = setup();
    const connections = [
      new FakeConnection("c1", "u1"),
      new FakeConnection("c2", "u1"),
      new FakeConnection("c3", "u2")
    ];
    connections.forEach((connection) => registry.register(connection.userId, connection));
    const bystander = new FakeConnection("c4", "u3");
    registry.register("u3", bystander);

    const event = createDomainEvent({
      eventType: "RentalRequested",
      subjectId: "r1",
      targetUserIds: ["u1", "u2", "u9"],
      timestamp: "2024-05-01T10:00:00.000Z"
    });
    const result = await useCase.execute(event);

    expect(result).toEqual({ attempted: 3, delivered: 3, failed: 0 });
    connections.forEach((connection) => expect(connection.sent).toHaveLength(1));
    expect(bystander.sent).toEqual([]);
  });

  it("entrega a uma conexão e descarta a que estourou o tempo", async () => {
    jest.useFakeTimers();
    const { registry, metrics, logger, useCase } = setup(5000);
    const healthy = new FakeConnection("c1", "u1");
    const stuck = new FakeConnection("c2", "u1", "hang");
    registry.register("u1", healthy);
    registry.register("u1", stuck);

    const pending = useCase.execute(approved);
    await jest.advanceTimersByTimeAsync(5000);
    const result = await pending;

    expect(result).toEqual({ attempted: 2, delivered: 1, failed: 1 });
    expect(healthy.sent).toEqual([expectedMessage]);
    expect(stuck.closed).toBe(true);
    expect(registry.connectionsFor("u1")).toEqual([healthy]);
    expect(metrics.recordNotification).toHaveBeenCalledWith("delivered");
    expect(metrics.recordNotification).toHaveBeenCalledWith("timeout");
    expect(logger.warn).toHaveBeenCalledWith("Notification send failed, connection dropped", {
      userId: "u1",
      connectionId: "c2",
      reason: "timeout",
      error: "Send timed out after 5000ms"
    });
  });

  it("não faz nada quando o alvo não tem conexões", async () => {
    const { registry, metrics, useCase } = setup();
    registry.register("u1", new FakeConnection("c1", "u1"));
    const event = createDomainEvent({
      eventType: "RentalApproved",
      subjectId: "r7",
      targetUserIds: ["u9"]
    });

    await expect(useCase.execute(event)).resolves.toEqual({
      attempted: 0,
      delivered: 0,
      failed: 0
    });
    expect(metrics.recordNotification).not.toHaveBeenCalled();
    expect(registry.size()).toBe(1);
  });

  it("remove a conexão com falha de transporte", async () => {
    const { registry, metrics, useCase } = setup();
    const broken = new FakeConnection("c1", "u1", "fail");
    registry.register("u1", broken);

    const result = await useCase.execute(approved);

    expect(result).toEqual({ attempted: 1, delivered: 0, failed: 1 });
    expect(broken.closed).toBe(true);
    expect(registry.connectionsFor("u1")).toEqual([]);
    expect(metrics.recordNotification).toHaveBeenCalledWith("failed");
  });

  it("trata send que lança de forma síncrona como falha de transporte", async () => {
    const { registry, logger, useCase } = setup();
    const connection = new FakeConnection("c1", "u1");
    jest.spyOn(connection, "send").mockImplementation(() => {
      throw new Error("closed");
    });
    registry.register("u1", connection);

    const result = await useCase.execute(approved);

    expect(result.failed).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Notification send failed, connection dropped",
      expect.objectContaining({ reason: "transport", error: "closed" })
    );
  });

  it("expõe o motivo na falha de envio", () => {
    const failure = new SendFailure("c1", "timeout", "Send timed out after 10ms");
    expect(failure.name).toBe("SendFailure");
    expect(failure.connectionId).toBe("c1");
    expect(failure.reason).toBe("timeout");
  });
});
