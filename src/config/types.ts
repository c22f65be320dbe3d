import { LogLevel } from "../observability/types";

export type ProgressMode = "log" | "none";

export interface AppConfig {
  apiBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  progressMode: ProgressMode;
  logLevel: LogLevel;
  defaultTarget: string;
}

export type ConfigOverrides = Partial<AppConfig>;

export interface TargetConfig {
  name: string;
  saveIn: string;
  articleId: number;
  subjects: string[];
}
