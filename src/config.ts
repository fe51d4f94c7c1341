// CHANGE: Centralise API constants and pacing delays as one immutable settings value.
// WHY: The fetcher and dispatcher receive settings explicitly instead of reading module globals.

import * as dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";

dotenv.config();

type Env = Readonly<Record<string, string | undefined>>;

/**
 * REST API endpoint settings.
 *
 * Invariant: every request carries `version` as a query parameter.
 */
export interface ApiSettings {
  readonly host: string;
  readonly basePath: string;
  readonly version: string;
  readonly pageLimit: number;
  readonly timeoutMs: number;
}

/**
 * Fixed pauses used for pacing. Not adapted to observed load.
 *
 * @property maxRateLimitRetries - `null` retries a rate-limited project without limit.
 */
export interface PacingSettings {
  readonly requestDelayMs: number;
  readonly rateLimitDelayMs: number;
  readonly maxRateLimitRetries: number | null;
}

export interface Settings {
  readonly api: ApiSettings;
  readonly pacing: PacingSettings;
}

export const DEFAULTS = {
  HOST: "https://api.snyk.io",
  BASE_PATH: "/rest",
  VERSION: "2024-05-23",
  PAGE_LIMIT: 100,
  TIMEOUT_MS: 30000,
  REQUEST_DELAY_MS: 50,
  RATE_LIMIT_DELAY_MS: 10000
} as const;

function readNonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Build the settings for one run from environment overrides.
 *
 * @param env - Environment map, `process.env` by default.
 * @returns Frozen settings value.
 * @throws ConfigurationError when a numeric override is malformed.
 */
export function loadSettings(env: Env = process.env): Settings {
  const retriesRaw = env.SNYK_MAX_RATE_LIMIT_RETRIES?.trim();
  const settings: Settings = {
    api: Object.freeze({
      host: (env.SNYK_API_HOST?.trim() || DEFAULTS.HOST).replace(/\/+$/, ""),
      basePath: DEFAULTS.BASE_PATH,
      version: env.SNYK_API_VERSION?.trim() || DEFAULTS.VERSION,
      pageLimit: DEFAULTS.PAGE_LIMIT,
      timeoutMs: readNonNegativeInt(env, "HTTP_TIMEOUT", DEFAULTS.TIMEOUT_MS)
    }),
    pacing: Object.freeze({
      requestDelayMs: readNonNegativeInt(env, "SNYK_REQUEST_DELAY_MS", DEFAULTS.REQUEST_DELAY_MS),
      rateLimitDelayMs: readNonNegativeInt(env, "SNYK_RATE_LIMIT_DELAY_MS", DEFAULTS.RATE_LIMIT_DELAY_MS),
      maxRateLimitRetries: retriesRaw ? readNonNegativeInt(env, "SNYK_MAX_RATE_LIMIT_RETRIES", 0) : null
    })
  };
  return Object.freeze(settings);
}
