import { z } from "zod";

/** Literal path that selects the in-memory store variant. */
export const MEMORY_STORE_PATH = ":memory:";

/** Parse a boolean-ish env value. `z.coerce.boolean()` treats "false" as true, so spell it out. */
function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

export const storeConfigSchema = z
  .object({
    /** SQLite file path, or ":memory:" for the process-lifetime in-memory store. */
    path: z.string().min(1).default("./data/ban-store.sqlite"),
    /** How long a connection waits on another process's write lock before SQLITE_BUSY. */
    busyTimeoutMs: z.coerce.number().int().min(0).default(5000),
    /** Rows fetched per page by lazy enumerations. */
    scanBatchSize: z.coerce.number().int().min(1).max(10_000).default(256),
    /** Default for reconciliation calls that don't say whether to reset counters on unban. */
    resetFailedLoginCountOnUnban: z.boolean().default(true),
  })
  .default({
    path: "./data/ban-store.sqlite",
    busyTimeoutMs: 5000,
    scanBatchSize: 256,
    resetFailedLoginCountOnUnban: true,
  });

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  store: storeConfigSchema,
});

export type Config = z.infer<typeof configSchema>;
export type StoreConfig = z.infer<typeof storeConfigSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    store: {
      path: env.BAN_STORE_PATH,
      busyTimeoutMs: env.BAN_STORE_BUSY_TIMEOUT_MS,
      scanBatchSize: env.BAN_STORE_SCAN_BATCH_SIZE,
      resetFailedLoginCountOnUnban: parseFlag(env.BAN_STORE_RESET_COUNT_ON_UNBAN),
    },
  });
}

export const config = parseConfig(process.env);
