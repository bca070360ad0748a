import { z } from "zod";

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("data/sales-analytics.db"),
  SALES_CSV_PATH: z.string().optional(),
  OUTLIER_THRESHOLD: z.coerce
    .number()
    .positive("OUTLIER_THRESHOLD must be a positive number")
    .default(10000),
  TOP_COUNTRIES_LIMIT: z.coerce.number().int().positive().default(10),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (_env) return _env;
  _env = envSchema.parse(process.env);
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env */
export function resetEnv(): void {
  _env = null;
}
