import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

export const DEFAULT_BASE_URL = "https://mcs.mar-kov.com/MCS_7-22-00_Dashboard";
export const DEFAULT_RETURN_URL = "/100-SHOTTYSLLC";
export const DEFAULT_DASHBOARD_ID = "100-ShottysLLC";
export const DEFAULT_ITEM_ID = "gridDashboardItem6";
export const DEFAULT_TIME_ZONE = "UTC";
export const DEFAULT_HTTP_TIMEOUT_MS = 60000;

export type SyncConfig = {
  databaseUrl: string | null;
  company: string;
  email: string;
  password: string;
  baseUrl: string;
  returnUrl: string;
  dashboardId: string;
  itemId: string;
  timeZone: string;
  httpTimeoutMs: number;
};

type Env = Record<string, string | undefined>;

export function requireEnv(name: string, env: Env = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing ${name}. Put it in .env.local`);
  }
  return value;
}

function optionalEnv(name: string, fallback: string, env: Env): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function parseTimeoutMs(value: string | undefined): number {
  if (!value) return DEFAULT_HTTP_TIMEOUT_MS;
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new Error(`Invalid MARKOV_HTTP_TIMEOUT_MS: ${value}`);
  }
  return num;
}

function validateTimeZone(timeZone: string): string {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch (err) {
    throw new Error(`Invalid MARKOV_TIME_ZONE: ${timeZone}`, { cause: err });
  }
  return timeZone;
}

// DATABASE_URL is checked before the dashboard credentials.
export function loadSyncConfig(
  options: { requireDatabase?: boolean } = {},
  env: Env = process.env
): SyncConfig {
  const requireDatabase = options.requireDatabase ?? true;
  const databaseUrl = requireDatabase ? requireEnv("DATABASE_URL", env) : env.DATABASE_URL || null;

  return {
    databaseUrl,
    company: env.MARKOV_COMPANY ?? "",
    email: requireEnv("MARKOV_EMAIL", env),
    password: requireEnv("MARKOV_PASSWORD", env),
    baseUrl: optionalEnv("MARKOV_BASE_URL", DEFAULT_BASE_URL, env),
    returnUrl: optionalEnv("MARKOV_RETURN_URL", DEFAULT_RETURN_URL, env),
    dashboardId: optionalEnv("MARKOV_DASHBOARD_ID", DEFAULT_DASHBOARD_ID, env),
    itemId: optionalEnv("MARKOV_ITEM_ID", DEFAULT_ITEM_ID, env),
    timeZone: validateTimeZone(optionalEnv("MARKOV_TIME_ZONE", DEFAULT_TIME_ZONE, env)),
    httpTimeoutMs: parseTimeoutMs(env.MARKOV_HTTP_TIMEOUT_MS),
  };
}
