export const domainEventTypes = [
  "RentalRequested",
  "RentalApproved",
  "RentalRejected",
  "RentalCompleted",
  "RentalStatusUpdated",
  "RentalDeleted",
  "VehicleCreated",
  "VehicleUpdated",
  "VehicleStatusChanged",
  "VehicleDeleted",
  "UserCreated",
  "UserUpdated",
  "UserDeleted",
  "BranchCreated",
  "BranchUpdated",
  "BranchDeleted"
] as const;

export type DomainEventType = (typeof domainEventTypes)[number];

export const eventTopics = ["rental_events", "vehicle_events", "user_events", "branch_events"] as const;

export type EventTopic = (typeof eventTopics)[number];

type EventTypeDefinition = {
  topic: EventTopic;
  requiresTargets: boolean;
};

const eventTypeDefinitions: Record<DomainEventType, EventTypeDefinition> = {
  RentalRequested: { topic: "rental_events", requiresTargets: true },
  RentalApproved: { topic: "rental_events", requiresTargets: true },
  RentalRejected: { topic: "rental_events", requiresTargets: true },
  RentalCompleted: { topic: "rental_events", requiresTargets: true },
  RentalStatusUpdated: { topic: "rental_events", requiresTargets: true },
  RentalDeleted: { topic: "rental_events", requiresTargets: false },
  VehicleCreated: { topic: "vehicle_events", requiresTargets: false },
  VehicleUpdated: { topic: "vehicle_events", requiresTargets: false },
  VehicleStatusChanged: { topic: "vehicle_events", requiresTargets: false },
  VehicleDeleted: { topic: "vehicle_events", requiresTargets: false },
  UserCreated: { topic: "user_events", requiresTargets: false },
  UserUpdated: { topic: "user_events", requiresTargets: false },
  UserDeleted: { topic: "user_events", requiresTargets: false },
  BranchCreated: { topic: "branch_events", requiresTargets: false },
  BranchUpdated: { topic: "branch_events", requiresTargets: false },
  BranchDeleted: { topic: "branch_events", requiresTargets: false }
};

export type EventPayload = Readonly<Record<string, unknown>>;

/**
 * A state transition of the rental system, addressed to the users who should
 * hear about it. Instances come from {@link createDomainEvent} and are frozen.
 */
export type DomainEvent = {
  readonly eventType: DomainEventType;
  readonly subjectId: string;
  readonly targetUserIds: readonly string[];
  readonly payload: EventPayload;
  readonly timestamp: string;
};

export type CreateDomainEventInput = {
  eventType: string;
  subjectId: string;
  targetUserIds?: readonly string[] | ReadonlySet<string>;
  payload?: Record<string, unknown>;
  timestamp?: Date | string;
};

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export const isDomainEventType = (value: string): value is DomainEventType =>
  Object.prototype.hasOwnProperty.call(eventTypeDefinitions, value);

export const topicForEventType = (eventType: DomainEventType): EventTopic =>
  eventTypeDefinitions[eventType].topic;

export const requiresTargets = (eventType: DomainEventType): boolean =>
  eventTypeDefinitions[eventType].requiresTargets;

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

// detached from the caller's objects, frozen at every depth
const snapshotPayload = (payload: Record<string, unknown>): EventPayload => {
  let copy: Record<string, unknown>;
  try {
    copy = structuredClone(payload);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Event payload must be plain data: ${message}`);
  }
  return deepFreeze(copy);
};

const normalizeTimestamp = (value: Date | string | undefined): string => {
  const date = value === undefined ? new Date() : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError("Event timestamp is not a valid date");
  }
  return date.toISOString();
};

export const createDomainEvent = (input: CreateDomainEventInput): DomainEvent => {
  if (!isDomainEventType(input.eventType)) {
    throw new ValidationError(`Unrecognized event type ${input.eventType}`);
  }
  const eventType = input.eventType;
  if (input.subjectId.trim().length === 0) {
    throw new ValidationError("Event subject id is required");
  }

  const targetUserIds = Array.from(new Set(input.targetUserIds ?? []));
  if (targetUserIds.some((userId) => userId.trim().length === 0)) {
    throw new ValidationError("Event target user ids must not be empty");
  }
  if (targetUserIds.length === 0 && requiresTargets(eventType)) {
    throw new ValidationError(`${eventType} requires at least one target user`);
  }

  return Object.freeze({
    eventType,
    subjectId: input.subjectId,
    targetUserIds: Object.freeze(targetUserIds),
    payload: snapshotPayload(input.payload ?? {}),
    timestamp: normalizeTimestamp(input.timestamp)
  });
};
