import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { LogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides, ProgressMode } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  apiBaseUrl: "https://api.figshare.com/v2",
  userAgent: "attention-fetch/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 600_000,
  progressMode: "log",
  logLevel: "info",
  defaultTarget: "fmri_attention",
};

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
const ProgressModeSchema = z.enum(["log", "none"]);

const ConfigOverridesSchema = z
  .object({
    apiBaseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
    progressMode: ProgressModeSchema,
    logLevel: LogLevelSchema,
    defaultTarget: z.string().min(1),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = ConfigOverridesSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid config file ${absolutePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

function toProgressMode(value: string | undefined, fallback: ProgressMode): ProgressMode {
  const parsed = ProgressModeSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    apiBaseUrl: env.FIGSHARE_API_BASE_URL ?? merged.apiBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    progressMode: toProgressMode(env.PROGRESS_MODE, merged.progressMode),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    defaultTarget: env.DEFAULT_TARGET ?? merged.defaultTarget,
  };
}

export { DEFAULT_CONFIG };
