/**
 * Configuration schema validation with Zod
 */

import { join } from "path";
import { z } from "zod";

const homeDir = process.env["HOME"] || "~";

export const DEFAULT_API_ENDPOINT = "embeddedassistant.googleapis.com";
export const DEFAULT_CREDENTIALS_PATH = join(
  homeDir,
  ".config",
  "google-oauthlib-tool",
  "credentials.json"
);
/** Three minutes plus a little slack */
export const DEFAULT_DEADLINE_MS = 185_000;
/** Longest delay a Node.js timer can hold */
export const MAX_DEADLINE_MS = 2_147_483_647;

/**
 * Comma-separated list of Telegram ids ("-100123,42"). Blank means none.
 */
function idList(variable: string) {
  return z
    .string()
    .default("")
    .transform((raw, ctx) => {
      const ids: number[] = [];
      for (const part of raw.split(",")) {
        const trimmed = part.trim();
        if (!trimmed) continue;
        if (!/^-?\d+$/.test(trimmed)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${variable} must be a comma-separated list of integers, got "${trimmed}"`,
          });
          return z.NEVER;
        }
        ids.push(Number.parseInt(trimmed, 10));
      }
      return ids;
    })
    .describe(`Comma-separated ids from ${variable}`);
}

export const configSchema = z.object({
  // Required
  botToken: z
    .string()
    .min(1, "TELEGRAM_BOT_TOKEN is required")
    .describe("Telegram bot token from @BotFather"),

  deviceModelId: z
    .string()
    .min(1, "DEVICE_MODEL_ID is required")
    .describe("Registered device model identifier"),

  deviceId: z.string().min(1, "DEVICE_ID is required").describe("Registered device identifier"),

  // Authorization
  allowedChatIds: idList("ALLOWED_CHAT_IDS"),

  authorizedUserIds: idList("AUTHORIZED_USER_IDS"),

  // Assistant
  apiEndpoint: z
    .string()
    .min(1)
    .default(DEFAULT_API_ENDPOINT)
    .describe("Address of the Google Assistant API service"),

  credentialsPath: z
    .string()
    .min(1)
    .default(DEFAULT_CREDENTIALS_PATH)
    .describe("Path to read OAuth2 credentials"),

  languageCode: z.string().min(1).default("en-US").describe("Language code of the Assistant"),

  deadlineMs: z
    .number()
    .int()
    .positive()
    .max(MAX_DEADLINE_MS, `deadlineMs must be at most ${MAX_DEADLINE_MS}`)
    .default(DEFAULT_DEADLINE_MS)
    .describe("Deadline for one assistant turn in milliseconds"),

  errorReply: z
    .string()
    .default("")
    .describe("Reply sent when the assistant turn fails (empty = silent)"),

  nodeEnv: z
    .string()
    .default("development")
    .pipe(z.enum(["development", "production", "test"]))
    .describe("Environment mode"),

  logLevel: z
    .string()
    .default("info")
    .pipe(z.enum(["debug", "info", "warn", "error", "silent"]))
    .describe("Log level"),
});

export type ConfigInput = z.input<typeof configSchema>;
export type ConfigOutput = z.output<typeof configSchema>;

function optionalInt(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

/**
 * Parse environment variables into config input
 */
export function parseEnvVars(): ConfigInput {
  return {
    botToken: process.env["TELEGRAM_BOT_TOKEN"] || "",
    deviceModelId: process.env["DEVICE_MODEL_ID"] || "",
    deviceId: process.env["DEVICE_ID"] || "",
    allowedChatIds: process.env["ALLOWED_CHAT_IDS"],
    authorizedUserIds: process.env["AUTHORIZED_USER_IDS"],
    apiEndpoint: process.env["ASSISTANT_API_ENDPOINT"] || undefined,
    credentialsPath: process.env["ASSISTANT_CREDENTIALS_PATH"] || undefined,
    languageCode: process.env["ASSISTANT_LANGUAGE"] || undefined,
    deadlineMs: optionalInt(process.env["ASSISTANT_DEADLINE_MS"]),
    errorReply: process.env["ASSISTANT_ERROR_REPLY"],
    nodeEnv: process.env["NODE_ENV"] || undefined,
    logLevel: process.env["LOG_LEVEL"] || undefined,
  };
}
