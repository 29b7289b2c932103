import { promises as fs } from "fs";
import { z } from "zod";
import { ConfigError, errorCode } from "../utils/errors";

const ProviderConfigSchema = z
  .object({
    account_sid: z
      .string()
      .trim()
      .min(1, "account_sid is required")
      .startsWith("AC", "account_sid must start with AC"),
    auth_token: z.string().trim().min(1, "auth_token is required"),
    messaging_service_sid: z
      .string()
      .trim()
      .min(1, "messaging_service_sid is required"),
  })
  .transform((data) => ({
    accountSid: data.account_sid,
    authToken: data.auth_token,
    messagingServiceSid: data.messaging_service_sid,
  }));

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export function parseProviderConfig(raw: unknown, source = "config"): ProviderConfig {
  const parseResult = ProviderConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    const fields = parseResult.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config file ${source}: ${fields}`);
  }
  return parseResult.data;
}

/**
 * Reads Twilio credentials from a JSON file with the keys `account_sid`,
 * `auth_token` and `messaging_service_sid`.
 */
export async function loadProviderConfig(configPath: string): Promise<ProviderConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new ConfigError(
        `Config file not found: ${configPath}\n` +
          "Create a config.json with: account_sid, auth_token, messaging_service_sid",
        { cause: error }
      );
    }
    throw new ConfigError(`Could not read config file ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`, { cause: error });
  }

  return parseProviderConfig(raw, configPath);
}
