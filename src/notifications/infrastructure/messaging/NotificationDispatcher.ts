import { Consumer, EachMessagePayload, IHeaders, Kafka } from "kafkajs";
import { Buffer } from "node:buffer";
import { DispatchNotificationUseCase } from "../../application/use-cases/DispatchNotificationUseCase";
import { DomainEvent, EventTopic, eventTopics } from "../../../shared/messaging/DomainEvent";
import { DeserializationError, JsonEventCodec } from "../../../shared/messaging/JsonEventCodec";
import { INTERNAL_TOKEN_HEADER, isValidInternalToken } from "../../../shared/messaging/internalToken";
import { Logger } from "../../../shared/observability/logger";
import { Metrics } from "../../../shared/observability/metrics";
import { resolveTraceId, runWithTrace, TRACE_ID_HEADER } from "../../../shared/observability/trace";

export type NotificationDispatcherConfig = {
  brokers: string[];
  clientId: string;
  groupId: string;
  internalJwtKey: string;
  topics?: readonly EventTopic[];
};

export type DispatcherState = "stopped" | "starting" | "running" | "stopping";

type DispatcherMetrics = Pick<
  Metrics,
  "recordKafkaConsumed" | "recordKafkaError" | "recordKafkaDiscarded"
>;

const headerValue = (value: IHeaders[string]): string => {
  if (Array.isArray(value)) {
    return value.length > 0 ? headerValue(value[0]) : "";
  }
  return value ? value.toString() : "";
};

/**
 * Background consumer that turns broker events into WebSocket notifications.
 *
 * Messages of one partition are handled one at a time, so events sharing a
 * subject id (the message key) reach the sockets in publish order. No
 * per-message failure escapes `handleMessage`; the consume loop only ends
 * through `stop()`, which lets the in-flight delivery finish first.
 */
export class NotificationDispatcher {
  private readonly consumer: Consumer;
  private readonly codec = new JsonEventCodec();
  private readonly topics: readonly EventTopic[];
  private readonly inFlight = new Set<Promise<void>>();
  private currentState: DispatcherState = "stopped";
  private startup: Promise<void> | null = null;

  constructor(
    private readonly config: NotificationDispatcherConfig,
    private readonly dispatchNotificationUseCase: DispatchNotificationUseCase,
    private readonly metrics: DispatcherMetrics,
    private readonly logger: Logger
  ) {
    const kafka = new Kafka({
      clientId: config.clientId,
      brokers: config.brokers
    });
    this.consumer = kafka.consumer({ groupId: config.groupId });
    this.topics = config.topics ?? eventTopics;
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  async start(): Promise<void> {
    if (this.currentState !== "stopped") {
      throw new Error(`Notification dispatcher cannot start while ${this.currentState}`);
    }
    this.currentState = "starting";
    const startup = this.connectAndRun();
    this.startup = startup;
    try {
      await startup;
    } finally {
      this.startup = null;
    }
  }

  /** Waits for a pending start, then stops fetching and drains in-flight deliveries. */
  async stop(): Promise<void> {
    if (this.startup) {
      await Promise.allSettled([this.startup]);
    }
    if (this.currentState !== "running") {
      return;
    }
    this.currentState = "stopping";
    try {
      await this.consumer.stop();
    } finally {
      await Promise.allSettled(Array.from(this.inFlight));
      try {
        await this.consumer.disconnect();
      } finally {
        this.currentState = "stopped";
      }
    }
    this.logger.info("Notification dispatcher stopped");
  }

  private async connectAndRun(): Promise<void> {
    try {
      await this.consumer.connect();
      await this.consumer.subscribe({ topics: [...this.topics], fromBeginning: false });
      await this.consumer.run({
        partitionsConsumedConcurrently: 1,
        eachMessage: (payload) => this.track(this.handleMessage(payload))
      });
      this.currentState = "running";
      this.logger.info("Notification dispatcher started", { topics: this.topics });
    } catch (error) {
      this.currentState = "stopped";
      await this.consumer.disconnect().catch((disconnectError: unknown) => {
        this.logger.warn("Kafka consumer disconnect after failed start failed", {
          error: String(disconnectError)
        });
      });
      throw error;
    }
  }

  private track(work: Promise<void>): Promise<void> {
    this.inFlight.add(work);
    return work.finally(() => {
      this.inFlight.delete(work);
    });
  }

  private async handleMessage({ topic, partition, message }: EachMessagePayload): Promise<void> {
    this.metrics.recordKafkaConsumed(topic);
    const headers = message.headers ?? {};
    const location = { topic, partition, offset: message.offset };

    const token = headerValue(headers[INTERNAL_TOKEN_HEADER]);
    if (!isValidInternalToken(token, this.config.internalJwtKey)) {
      this.discard(topic, "auth_failed", location);
      return;
    }

    let event: DomainEvent;
    try {
      event = this.codec.decode(message.value ?? Buffer.alloc(0));
    } catch (error) {
      const reason = error instanceof DeserializationError ? "deserialization_failed" : "decode_failed";
      this.discard(topic, reason, { ...location, error: String(error) });
      return;
    }

    const traceId = resolveTraceId(headerValue(headers[TRACE_ID_HEADER]));
    try {
      await runWithTrace(traceId, async () => {
        const result = await this.dispatchNotificationUseCase.execute(event);
        this.logger.info("Notification dispatched", {
          ...location,
          eventType: event.eventType,
          subjectId: event.subjectId,
          ...result
        });
      });
    } catch (error) {
      this.metrics.recordKafkaError(topic);
      this.logger.error("Notification dispatch failed", {
        ...location,
        eventType: event.eventType,
        subjectId: event.subjectId,
        error: String(error)
      });
    }
  }

  private discard(topic: string, reason: string, meta: Record<string, unknown>): void {
    this.metrics.recordKafkaDiscarded(topic, reason);
    this.logger.warn("Kafka message discarded", { reason, ...meta });
  }
}
