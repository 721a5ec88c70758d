import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((v) => v === "true");

const EnvSchema = z.object({
  PUBLIC_HOST: z.string().default("localhost"),
  PUBLIC_PROTOCOL: z.enum(["http", "https"]).default("http"),
  BACKEND_PORT: z.coerce.number().default(8081),
  BACKEND_URL: z.string().optional(),
  BACKEND_API_KEY: z.string().default("be_api_key"),
  LOG_LEVEL: z.string().default("info"),

  STORE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
  CATALOG_SEED_PATH: z.string().optional(),
  DB_CONNECTION_STRING: z.string().optional(),
  DB_SSL: flag,
  DB_POOL_MAX: z.coerce.number().optional(),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10_000),
  DB_READ_ONLY: flag,

  HOLD_TTL_MINUTES: z.coerce.number().int().positive().default(10),
  HOLD_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  TARIFF_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  TARIFF_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(5000),
  CANCEL_FULL_REFUND_HOURS: z.coerce.number().nonnegative().default(24),
  CANCEL_PARTIAL_REFUND_PERCENT: z.coerce.number().min(0).max(100).default(50),
});

export type Env = z.infer<typeof EnvSchema> & {
  backend_url: string;
  db_connection_string: string;
  port: number;
};

export function loadEnv(processEnv: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.parse(processEnv);
  const port = parsed.BACKEND_PORT;
  const backend_url =
    parsed.BACKEND_URL || `${parsed.PUBLIC_PROTOCOL}://${parsed.PUBLIC_HOST}:${port}`;
  const db_connection_string =
    parsed.DB_CONNECTION_STRING || "postgres://localhost:5432/postgres";
  return { ...parsed, backend_url, db_connection_string, port };
}
