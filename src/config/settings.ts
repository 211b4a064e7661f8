import path from "path";
import { z } from "zod";
import { SettingsError } from "../errors";
import { DelayWindow } from "../types/delayWindow";

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === "boolean" ? value : ["1", "true", "yes", "on"].includes(value.trim().toLowerCase())));

export const OutputFormatSchema = z.enum(["csv", "json", "both"]);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const LogLevelSchema = z.enum(["debug", "info", "success", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  GST_BASE_URL: z.string().url().default("https://services.gst.gov.in"),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  REQUEST_DELAY_MIN_SECONDS: z.coerce.number().min(0).default(2),
  REQUEST_DELAY_MAX_SECONDS: z.coerce.number().min(0).default(4),
  RETRY_DELAY_MIN_SECONDS: z.coerce.number().min(0).default(1),
  RETRY_DELAY_MAX_SECONDS: z.coerce.number().min(0).default(3),
  USE_ROTATING_USER_AGENTS: booleanFlag.default(true),
  DEMO_MODE: booleanFlag.default(false),
  OUTPUT_FORMAT: OutputFormatSchema.default("both"),
  OUTPUT_DIR: z.string().min(1).default("data"),
  LOG_LEVEL: LogLevelSchema.default("info"),
  LOG_DIR: z.string().min(1).default("logs"),
  LOG_TO_FILE: booleanFlag.default(true),
  LOG_RETENTION_DAYS: z.coerce.number().int().min(1).default(7),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0")
});

export interface Settings {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  requestDelay: DelayWindow;
  retryDelay: DelayWindow;
  rotateUserAgents: boolean;
  demoMode: boolean;
  outputFormat: OutputFormat;
  outputDir: string;
  logLevel: LogLevel;
  logDir: string;
  logToFile: boolean;
  logRetentionDays: number;
  port: number;
  host: string;
}

type EnvSource = Record<string, string | undefined>;

function blankToUndefined(env: EnvSource): EnvSource {
  const out: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === "" ? undefined : value;
  }
  return out;
}

export function loadSettings(env: EnvSource = process.env): Settings {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<env>"}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return Object.freeze({
    baseUrl: values.GST_BASE_URL.replace(/\/+$/, ""),
    timeoutMs: Math.round(values.REQUEST_TIMEOUT_SECONDS * 1000),
    maxRetries: values.MAX_RETRIES,
    requestDelay: {
      minSeconds: values.REQUEST_DELAY_MIN_SECONDS,
      maxSeconds: values.REQUEST_DELAY_MAX_SECONDS
    },
    retryDelay: {
      minSeconds: values.RETRY_DELAY_MIN_SECONDS,
      maxSeconds: values.RETRY_DELAY_MAX_SECONDS
    },
    rotateUserAgents: values.USE_ROTATING_USER_AGENTS,
    demoMode: values.DEMO_MODE,
    outputFormat: values.OUTPUT_FORMAT,
    outputDir: path.resolve(values.OUTPUT_DIR),
    logLevel: values.LOG_LEVEL,
    logDir: path.resolve(values.LOG_DIR),
    logToFile: values.LOG_TO_FILE,
    logRetentionDays: values.LOG_RETENTION_DAYS,
    port: values.PORT,
    host: values.HOST
  });
}
