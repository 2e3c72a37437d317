import { Kafka, Producer } from "kafkajs";
import { DomainEvent, EventPublisher, PublishError } from "../../application/ports/EventPublisher";
import { topicForEventType } from "../../../shared/messaging/DomainEvent";
import { JsonEventCodec } from "../../../shared/messaging/JsonEventCodec";
import {
  EVENT_TYPE_HEADER,
  INTERNAL_TOKEN_HEADER,
  signInternalToken
} from "../../../shared/messaging/internalToken";
import { Metrics } from "../../../shared/observability/metrics";
import { createTraceId, getTraceId, TRACE_ID_HEADER } from "../../../shared/observability/trace";

export type KafkaPublisherConfig = {
  brokers: string[];
  clientId: string;
  internalJwt: string;
};

export class KafkaEventPublisher implements EventPublisher {
  private readonly producer: Producer;
  private readonly codec = new JsonEventCodec();

  constructor(
    private readonly config: KafkaPublisherConfig,
    private readonly metrics: Pick<Metrics, "recordKafkaProduced" | "recordKafkaError">
  ) {
    const kafka = new Kafka({
      clientId: config.clientId,
      brokers: config.brokers
    });
    this.producer = kafka.producer();
  }

  async connect(): Promise<void> {
    await this.producer.connect();
  }

  async publish(event: DomainEvent): Promise<void> {
    const topic = topicForEventType(event.eventType);
    try {
      await this.producer.send({
        topic,
        messages: [
          {
            // same subject, same partition: per-subject order survives the broker
            key: event.subjectId,
            value: this.codec.encode(event),
            headers: {
              [INTERNAL_TOKEN_HEADER]: signInternalToken(this.config.clientId, this.config.internalJwt),
              [TRACE_ID_HEADER]: getTraceId() ?? createTraceId(),
              [EVENT_TYPE_HEADER]: event.eventType
            }
          }
        ]
      });
      this.metrics.recordKafkaProduced(topic);
    } catch (error) {
      this.metrics.recordKafkaError(topic);
      const message = error instanceof Error ? error.message : String(error);
      throw new PublishError(`Kafka publish failed: ${message}`, topic);
    }
  }

  async disconnect(): Promise<void> {
    await this.producer.disconnect();
  }
}
