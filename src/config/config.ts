import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanString = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  // Sync
  CONFIG_PATH: z.string().min(1).default("./config.json"),
  SYNC_SCHEDULE: z.string().min(1).optional(),
  SYNC_TIMEZONE: z.string().min(1).default("UTC"),
  DRY_RUN: booleanString.optional(),

  // Logging
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

export type EnvConfig = z.infer<typeof envSchema>;

export const parseEnv = (env: NodeJS.ProcessEnv = process.env): EnvConfig => {
  try {
    return envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalid = error.issues
        .map((issue) => issue.path.join("."))
        .join(", ");

      throw new Error(`Missing or invalid environment variables: ${invalid}`);
    }
    throw error;
  }
};

export const config = parseEnv();
