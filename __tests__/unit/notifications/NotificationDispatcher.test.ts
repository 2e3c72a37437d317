const consumerConnectMock = jest.fn();
const consumerSubscribeMock = jest.fn();
const consumerRunMock = jest.fn();
const consumerStopMock = jest.fn();
const consumerDisconnectMock = jest.fn();

jest.mock("kafkajs", () => ({
  Kafka: jest.fn().mockImplementation(() => ({
    consumer: () => ({
      connect: consumerConnectMock,
      subscribe: consumerSubscribeMock,
      run: consumerRunMock,
      stop: consumerStopMock,
      disconnect: consumerDisconnectMock
    })
  }))
}));

import { Buffer } from "node:buffer";
import { NotificationDispatcher } from "../../../src/notifications/infrastructure/messaging/NotificationDispatcher";
import { DispatchNotificationUseCase } from "../../../src/notifications/application/use-cases/DispatchNotificationUseCase";
import { InMemoryConnectionRegistry } from "../../../src/notifications/infrastructure/realtime/InMemoryConnectionRegistry";
import { createDomainEvent } from "../../../src/shared/messaging/DomainEvent";
import { JsonEventCodec } from "../../../src/shared/messaging/JsonEventCodec";
import { signInternalToken } from "../../../src/shared/messaging/internalToken";
import { getTraceId } from "../../../src/shared/observability/trace";
import { FakeConnection } from "../../support/fakeConnection";
import { createTestLogger, deferred } from "../../support/fakes";

type MessageHandler = (payload: unknown) => Promise<void>;

describe("NotificationDispatcher", () => {
  const internalJwtKey = "test-internal-secret";
  const codec = new JsonEventCodec();
  let eachMessage: MessageHandler | undefined;

  const event = createDomainEvent({
    eventType: "RentalApproved",
    subjectId: "r42",
    targetUserIds: ["u1"],
    payload: { status: "APPROVED" },
    timestamp: "2024-05-01T10:00:00.000Z"
  });

  const kafkaMessage = (
    value: Buffer,
    headers: Record<string, Buffer> = {
      "x-internal-jwt": Buffer.from(signInternalToken("rentals-service", internalJwtKey))
    }
  ) => ({
    topic: "rental_events",
    partition: 0,
    message: { offset: "7", key: Buffer.from("r42"), value, headers }
  });

  const deliver = async (payload: unknown): Promise<void> => {
    if (!eachMessage) {
      throw new Error("consumer is not running");
    }
    await eachMessage(payload);
  };

  const setup = () => {
    const registry = new InMemoryConnectionRegistry();
    const logger = createTestLogger();
    const metrics = {
      recordKafkaConsumed: jest.fn(),
      recordKafkaError: jest.fn(),
      recordKafkaDiscarded: jest.fn()
    };
    const useCase = new DispatchNotificationUseCase(
      registry,
      codec,
      { sendTimeoutMs: 1000 },
      { recordNotification: jest.fn() },
      logger
    );
    const dispatcher = new NotificationDispatcher(
      {
        clientId: "notifications-test",
        brokers: ["localhost:9092"],
        groupId: "notifications-dispatcher",
        internalJwtKey
      },
      useCase,
      metrics,
      logger
    );
    return { registry, logger, metrics, useCase, dispatcher };
  };

  beforeEach(() => {
    eachMessage = undefined;
    consumerConnectMock.mockReset().mockResolvedValue(undefined);
    consumerSubscribeMock.mockReset().mockResolvedValue(undefined);
    consumerStopMock.mockReset().mockResolvedValue(undefined);
    consumerDisconnectMock.mockReset().mockResolvedValue(undefined);
    consumerRunMock.mockReset().mockImplementation(async (config: { eachMessage: MessageHandler }) => {
      eachMessage = config.eachMessage;
    });
  });

  it("assina todos os tópicos e consome uma partição por vez", async () => {
    const { dispatcher } = setup();

    await dispatcher.start();

    expect(dispatcher.state).toBe("running");
    expect(consumerSubscribeMock).toHaveBeenCalledWith({
      topics: ["rental_events", "vehicle_events", "user_events", "branch_events"],
      fromBeginning: false
    });
    expect(consumerRunMock).toHaveBeenCalledWith(
      expect.objectContaining({ partitionsConsumedConcurrently: 1 })
    );
  });

  it("descarta payload malformado e continua entregando os seguintes", async () => {
    const { registry, metrics, logger, dispatcher } = setup();
    const connection = new FakeConnection("c1", "u1");
    registry.register("u1", connection);
    await dispatcher.start();

    await deliver(kafkaMessage(Buffer.from("{oops")));
    await deliver(kafkaMessage(codec.encode(event)));

    expect(metrics.recordKafkaDiscarded).toHaveBeenCalledWith(
      "rental_events",
      "deserialization_failed"
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "Kafka message discarded",
      expect.objectContaining({ reason: "deserialization_failed", offset: "7" })
    );
    expect(connection.sent).toEqual([codec.toNotification(event)]);
    expect(metrics.recordKafkaConsumed).toHaveBeenCalledTimes(2);
  });

  it("descarta mensagem sem token interno válido", async () => {
    const { registry, metrics, dispatcher } = setup();
    const connection = new FakeConnection("c1", "u1");
    registry.register("u1", connection);
    await dispatcher.start();

    await deliver(kafkaMessage(codec.encode(event), {}));
    await deliver(
      kafkaMessage(codec.encode(event), {
        "x-internal-jwt": Buffer.from(signInternalToken("intruder", "wrong-secret"))
      })
    );

    expect(metrics.recordKafkaDiscarded.mock.calls).toEqual([
      ["rental_events", "auth_failed"],
      ["rental_events", "auth_failed"]
    ]);
    expect(connection.sent).toEqual([]);
  });

  it("propaga o trace id do cabeçalho", async () => {
    const { useCase, dispatcher } = setup();
    const seen: Array<string | undefined> = [];
    jest.spyOn(useCase, "execute").mockImplementation(async () => {
      seen.push(getTraceId());
      return { attempted: 0, delivered: 0, failed: 0 };
    });
    await dispatcher.start();

    await deliver(
      kafkaMessage(codec.encode(event), {
        "x-internal-jwt": Buffer.from(signInternalToken("rentals-service", internalJwtKey)),
        "x-trace-id": Buffer.from("trace-from-rentals")
      })
    );

    expect(seen).toEqual(["trace-from-rentals"]);
  });

  it("troca trace id malformado do cabeçalho por um novo", async () => {
    const { useCase, dispatcher } = setup();
    const seen: Array<string | undefined> = [];
    jest.spyOn(useCase, "execute").mockImplementation(async () => {
      seen.push(getTraceId());
      return { attempted: 0, delivered: 0, failed: 0 };
    });
    await dispatcher.start();

    await deliver(
      kafkaMessage(codec.encode(event), {
        "x-internal-jwt": Buffer.from(signInternalToken("rentals-service", internalJwtKey)),
        "x-trace-id": Buffer.from("bad id")
      })
    );

    expect(seen).toHaveLength(1);
    expect(seen[0]).not.toBe("bad id");
    expect(seen[0]).toMatch(/^[a-zA-Z0-9-]{8,128}$/);
  });

  it("registra falha de entrega sem interromper o consumo", async () => {
    const { useCase, metrics, logger, dispatcher } = setup();
    jest.spyOn(useCase, "execute").mockRejectedValue(new Error("registry exploded"));
    await dispatcher.start();

    await expect(deliver(kafkaMessage(codec.encode(event)))).resolves.toBeUndefined();

    expect(metrics.recordKafkaError).toHaveBeenCalledWith("rental_events");
    expect(logger.error).toHaveBeenCalledWith(
      "Notification dispatch failed",
      expect.objectContaining({ eventType: "RentalApproved", subjectId: "r42" })
    );
    expect(dispatcher.state).toBe("running");
  });

  it("não inicia duas vezes", async () => {
    const { dispatcher } = setup();
    await dispatcher.start();

    await expect(dispatcher.start()).rejects.toThrow(
      "Notification dispatcher cannot start while running"
    );
  });

  it("volta a parado quando a conexão falha", async () => {
    const { dispatcher } = setup();
    consumerConnectMock.mockRejectedValue(new Error("broker unreachable"));

    await expect(dispatcher.start()).rejects.toThrow("broker unreachable");

    expect(dispatcher.state).toBe("stopped");
    expect(consumerDisconnectMock).toHaveBeenCalledTimes(1);
  });

  it("espera a entrega em andamento antes de desconectar", async () => {
    const { useCase, dispatcher } = setup();
    const gate = deferred<void>();
    const order: string[] = [];
    jest.spyOn(useCase, "execute").mockImplementation(async () => {
      await gate.promise;
      order.push("dispatched");
      return { attempted: 1, delivered: 1, failed: 0 };
    });
    consumerDisconnectMock.mockImplementation(async () => {
      order.push("disconnected");
    });
    await dispatcher.start();

    const inFlight = deliver(kafkaMessage(codec.encode(event)));
    const stopping = dispatcher.stop();
    expect(dispatcher.state).toBe("stopping");
    gate.resolve();
    await Promise.all([inFlight, stopping]);

    expect(order).toEqual(["dispatched", "disconnected"]);
    expect(consumerStopMock).toHaveBeenCalledTimes(1);
    expect(dispatcher.state).toBe("stopped");
  });

  it("stop durante a inicialização espera o start e para o consumer", async () => {
    const { dispatcher } = setup();
    const connected = deferred<void>();
    consumerConnectMock.mockReturnValue(connected.promise);

    const starting = dispatcher.start();
    const stopping = dispatcher.stop();
    expect(dispatcher.state).toBe("starting");
    connected.resolve();
    await Promise.all([starting, stopping]);

    expect(consumerStopMock).toHaveBeenCalledTimes(1);
    expect(consumerDisconnectMock).toHaveBeenCalledTimes(1);
    expect(dispatcher.state).toBe("stopped");
  });

  it("stop durante uma inicialização que falha apenas retorna", async () => {
    const { dispatcher } = setup();
    const connected = deferred<void>();
    consumerConnectMock.mockReturnValue(connected.promise);

    const starting = dispatcher.start();
    const stopping = dispatcher.stop();
    connected.reject(new Error("broker unreachable"));

    await expect(starting).rejects.toThrow("broker unreachable");
    await expect(stopping).resolves.toBeUndefined();
    expect(consumerStopMock).not.toHaveBeenCalled();
    expect(dispatcher.state).toBe("stopped");
  });

  it("desconecta e volta a parado quando o stop do consumer falha", async () => {
    const { dispatcher } = setup();
    consumerStopMock.mockRejectedValueOnce(new Error("stop failed"));
    await dispatcher.start();

    await expect(dispatcher.stop()).rejects.toThrow("stop failed");

    expect(consumerDisconnectMock).toHaveBeenCalledTimes(1);
    expect(dispatcher.state).toBe("stopped");
    await dispatcher.start();
    expect(dispatcher.state).toBe("running");
  });

  it("ignora stop quando não está rodando", async () => {
    const { dispatcher } = setup();

    await dispatcher.stop();

    expect(consumerStopMock).not.toHaveBeenCalled();
    expect(dispatcher.state).toBe("stopped");
  });
});
