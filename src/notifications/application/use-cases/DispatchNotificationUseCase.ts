import { Connection } from "../../domain/entities/Connection";
import { ConnectionRegistry } from "../../domain/repositories/ConnectionRegistry";
import { DomainEvent } from "../../../shared/messaging/DomainEvent";
import { JsonEventCodec } from "../../../shared/messaging/JsonEventCodec";
import { Logger } from "../../../shared/observability/logger";
import { Metrics } from "../../../shared/observability/metrics";

export type SendFailureReason = "timeout" | "transport";

export class SendFailure extends Error {
  constructor(
    public readonly connectionId: string,
    public readonly reason: SendFailureReason,
    message: string
  ) {
    super(message);
    this.name = "SendFailure";
  }
}

export type DispatchResult = {
  attempted: number;
  delivered: number;
  failed: number;
};

export type DispatchNotificationConfig = {
  sendTimeoutMs: number;
};

export class DispatchNotificationUseCase {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly codec: JsonEventCodec,
    private readonly config: DispatchNotificationConfig,
    private readonly metrics: Pick<Metrics, "recordNotification">,
    private readonly logger: Logger
  ) {}

  async execute(event: DomainEvent): Promise<DispatchResult> {
    const message = this.codec.toNotification(event);
    const deliveries = event.targetUserIds.flatMap((userId) =>
      this.registry.connectionsFor(userId).map((connection) => this.deliver(connection, message))
    );
    const outcomes = await Promise.all(deliveries);
    const delivered = outcomes.filter(Boolean).length;
    return {
      attempted: outcomes.length,
      delivered,
      failed: outcomes.length - delivered
    };
  }

  private async deliver(connection: Connection, message: string): Promise<boolean> {
    try {
      await this.sendWithTimeout(connection, message);
      this.metrics.recordNotification("delivered");
      return true;
    } catch (error) {
      const failure =
        error instanceof SendFailure
          ? error
          : new SendFailure(connection.id, "transport", String(error));
      this.registry.unregister(connection.userId, connection);
      connection.close();
      this.metrics.recordNotification(failure.reason === "timeout" ? "timeout" : "failed");
      this.logger.warn("Notification send failed, connection dropped", {
        userId: connection.userId,
        connectionId: connection.id,
        reason: failure.reason,
        error: failure.message
      });
      return false;
    }
  }

  private sendWithTimeout(connection: Connection, message: string): Promise<void> {
    const timeoutMs = this.config.sendTimeoutMs;
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new SendFailure(connection.id, "timeout", `Send timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      Promise.resolve()
        .then(() => connection.send(message))
        .then(
          () => {
            clearTimeout(timer);
            resolve();
          },
          (error: unknown) => {
            clearTimeout(timer);
            const detail = error instanceof Error ? error.message : String(error);
            reject(new SendFailure(connection.id, "transport", detail));
          }
        );
    });
  }
}
