import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import {
  DEFAULT_MESSAGE_BODY,
  DEFAULT_TIMEZONE,
  MAX_MESSAGE_LENGTH,
} from "../constants";
import { ConfigError } from "../utils/errors";

dotenv.config();

// Parsed on import for the logger; every field has a default.
const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    LOG_LEVEL: z.string().default("info"),
  })
  .transform((data) => ({
    ...data,
    isProduction: data.NODE_ENV === "production",
  }));

const BatchEnvSchema = z
  .object({
    SMS_CONFIG_PATH: z.string().optional(),
    SMS_MESSAGE_BODY: z
      .string()
      .trim()
      .min(1, "SMS_MESSAGE_BODY cannot be empty")
      .max(MAX_MESSAGE_LENGTH, "SMS_MESSAGE_BODY is too long")
      .default(DEFAULT_MESSAGE_BODY),
    SMS_SEND_AT: z.string().trim().optional(),
    SMS_TIMEZONE: z.string().trim().min(1, "SMS_TIMEZONE cannot be empty").default(DEFAULT_TIMEZONE),
  })
  .transform((data) => ({
    ...data,
    configPath: path.resolve(data.SMS_CONFIG_PATH || "config.json"),
  }));

export type Env = z.infer<typeof EnvSchema>;
export type BatchEnv = z.infer<typeof BatchEnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}

export function loadBatchEnv(source: NodeJS.ProcessEnv = process.env): BatchEnv {
  const parseResult = BatchEnvSchema.safeParse(source);
  if (!parseResult.success) {
    const fields = parseResult.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid environment: ${fields}`);
  }
  return parseResult.data;
}

const env = loadEnv();

export default env;
