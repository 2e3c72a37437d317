import { Kafka } from "kafkajs";
import { Logger } from "../observability/logger";

export type KafkaTopicAdminConfig = {
  brokers: string[];
  clientId: string;
  numPartitions: number;
  replicationFactor: number;
};

export class KafkaTopicAdmin {
  private readonly kafka: Kafka;

  constructor(
    private readonly config: KafkaTopicAdminConfig,
    private readonly logger: Logger
  ) {
    this.kafka = new Kafka({
      clientId: config.clientId,
      brokers: config.brokers
    });
  }

  /** Creates the topics the broker does not have yet and returns their names. */
  async ensureTopics(topics: readonly string[]): Promise<string[]> {
    const admin = this.kafka.admin();
    await admin.connect();
    try {
      const existing = new Set(await admin.listTopics());
      const missing = topics.filter((topic) => !existing.has(topic));
      if (missing.length === 0) {
        return [];
      }
      await admin.createTopics({
        waitForLeaders: true,
        topics: missing.map((topic) => ({
          topic,
          numPartitions: this.config.numPartitions,
          replicationFactor: this.config.replicationFactor
        }))
      });
      this.logger.info("Kafka topics created", { topics: missing });
      return missing;
    } finally {
      await admin.disconnect();
    }
  }
}
