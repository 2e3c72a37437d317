import { z } from "zod";

export const brokerList = z
  .string()
  .default("localhost:9092")
  .transform((value) =>
    value
      .split(",")
      .map((broker) => broker.trim())
      .filter((broker) => broker.length > 0)
  )
  .pipe(z.array(z.string()).min(1));

export const originList = z
  .string()
  .default("*")
  .transform((value) =>
    value
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0)
  )
  .pipe(z.array(z.string()).min(1));

export const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);

export const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// setTimeout fires after 1 ms for any delay above this
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const timeoutMs = (fallback: number) =>
  z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(fallback);

export const secret = (fallback: string) => z.string().min(1).default(fallback);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const parseEnv = <T extends z.ZodType>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> => {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
};
