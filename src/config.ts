/**
 * Runtime configuration read from the environment (and `.env` through dotenv)
 */

import "dotenv/config";

export const DEFAULT_BASE_URL = "https://dom.gosuslugi.ru/";
export const DEFAULT_TIMEOUT_MS = 5000;

export interface ClientConfig {
  /** Portal root, always ending with a slash */
  baseUrl: string;
  /** Per-request timeout applied by the HTTP client */
  timeoutMs: number;
}

/**
 * Make sure a base URL ends with exactly one slash so endpoint paths can be appended
 */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "") + "/";
}

/**
 * Parse a positive integer, falling back to a default for anything else
 */
export function parsePositiveInt(
  value: string | undefined,
  defaultValue: number
): number {
  if (value === undefined || value.trim() === "") {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return defaultValue;
  }

  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const baseUrl = env.GOSUSLUGI_BASE_URL;

  return {
    baseUrl: normalizeBaseUrl(
      baseUrl !== undefined && baseUrl !== "" ? baseUrl : DEFAULT_BASE_URL
    ),
    timeoutMs: parsePositiveInt(env.GOSUSLUGI_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
  };
}
