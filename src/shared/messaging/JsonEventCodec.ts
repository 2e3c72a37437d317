import { Buffer } from "node:buffer";
import { z } from "zod";
import { createDomainEvent, DomainEvent } from "./DomainEvent";

export class DeserializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeserializationError";
  }
}

const wireEventSchema = z.object({
  event_type: z.string(),
  subject_id: z.string(),
  target_user_ids: z.array(z.string()),
  payload: z.record(z.string(), z.unknown()),
  timestamp: z.string()
});

export type WireEvent = z.infer<typeof wireEventSchema>;

export type Notification = {
  event_type: string;
  subject_id: string;
  payload: Record<string, unknown>;
  timestamp: string;
};

const toWire = (event: DomainEvent): WireEvent => ({
  event_type: event.eventType,
  subject_id: event.subjectId,
  target_user_ids: [...event.targetUserIds],
  payload: { ...event.payload },
  timestamp: event.timestamp
});

export class JsonEventCodec {
  encode(event: DomainEvent): Buffer {
    return Buffer.from(JSON.stringify(toWire(event)), "utf8");
  }

  decode(buffer: Buffer): DomainEvent {
    let raw: unknown;
    try {
      raw = JSON.parse(buffer.toString("utf8"));
    } catch {
      throw new DeserializationError("Event body is not valid JSON");
    }

    const parsed = wireEventSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DeserializationError("Event body has an invalid shape");
    }

    try {
      return createDomainEvent({
        eventType: parsed.data.event_type,
        subjectId: parsed.data.subject_id,
        targetUserIds: parsed.data.target_user_ids,
        payload: parsed.data.payload,
        timestamp: parsed.data.timestamp
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeserializationError(`Event rejected: ${message}`);
    }
  }

  toNotification(event: DomainEvent): string {
    const notification: Notification = {
      event_type: event.eventType,
      subject_id: event.subjectId,
      payload: { ...event.payload },
      timestamp: event.timestamp
    };
    return JSON.stringify(notification);
  }
}
