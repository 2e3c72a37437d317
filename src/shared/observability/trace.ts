import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";

export const TRACE_ID_HEADER = "x-trace-id";

const traceIdPattern = /^[a-zA-Z0-9-]{8,128}$/;

const storage = new AsyncLocalStorage<{ traceId: string }>();

export const runWithTrace = <T>(traceId: string, fn: () => T): T => storage.run({ traceId }, fn);

export const getTraceId = (): string | undefined => storage.getStore()?.traceId;

export const createTraceId = (): string => randomUUID();

/** Keeps an incoming trace id from HTTP or Kafka when well formed, otherwise mints one. */
export const resolveTraceId = (incoming: string | undefined): string =>
  incoming !== undefined && traceIdPattern.test(incoming) ? incoming : createTraceId();
