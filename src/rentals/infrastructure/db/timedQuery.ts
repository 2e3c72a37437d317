import { Metrics } from "../../../shared/observability/metrics";

export type TimedQuery = <T>(operation: string, fn: () => Promise<T>) => Promise<T>;

export const createTimedQuery =
  (metrics: Pick<Metrics, "recordDbQuery">): TimedQuery =>
  async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    const start = process.hrtime.bigint();
    try {
      return await fn();
    } finally {
      const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
      metrics.recordDbQuery("mongo", operation, durationSeconds);
    }
  };
