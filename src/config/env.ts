import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    JWT_SECRET: z.string().min(16),
    JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60),
    PROGRESS_STORE: z.enum(["postgres", "memory"]).default("memory"),
    DATABASE_URL: z.string().min(1).optional(),
    CONTENT_PATH: z.string().min(1).optional(),
    LOCATION_TIMEOUT_MS: z.coerce.number().int().positive().max(60_000).default(10_000),
    ENGINE_IDLE_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000)
  })
  .refine((value) => value.PROGRESS_STORE !== "postgres" || Boolean(value.DATABASE_URL), {
    message: "DATABASE_URL is required when PROGRESS_STORE=postgres",
    path: ["DATABASE_URL"]
  });

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
