import { resolve } from "node:path";
import { ConfigError } from "./errors.js";
import { DEFAULT_SESSION_ID, DEFAULT_SUMMARY_BASE_URL } from "./summary/client.js";

export interface AppConfig {
  token?: string;
  baseUrl: string;
  sessionId: string;
  timeoutMs?: number;
  recordsDir: string;
  reportsDir: string;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, cwd = process.cwd()): AppConfig {
  return {
    token: nonEmpty(env.SUMMARY_API_TOKEN) ?? nonEmpty(env.TOKEN),
    baseUrl: nonEmpty(env.SUMMARY_API_URL) ?? DEFAULT_SUMMARY_BASE_URL,
    sessionId: nonEmpty(env.SUMMARY_SESSION_ID) ?? DEFAULT_SESSION_ID,
    timeoutMs: parseTimeout(env.SUMMARY_TIMEOUT_MS, "SUMMARY_TIMEOUT_MS"),
    recordsDir: resolve(cwd, nonEmpty(env.SUMMARY_RECORDS_DIR) ?? "records"),
    reportsDir: resolve(cwd, nonEmpty(env.SUMMARY_REPORTS_DIR) ?? "reports"),
  };
}

export function parseTimeout(value: string | undefined, name: string): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive number of milliseconds, got "${value}"`);
  }
  return Math.floor(parsed);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
