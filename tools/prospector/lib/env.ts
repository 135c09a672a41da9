/**
 * Environment variable loading and validation.
 */

import { ConfigError } from "../pipeline/errors.js";

export function requireEnv(key: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[key];
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function optionalEnv(key: string, defaultValue: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

export function optionalEnvInt(key: string, defaultValue: number, env: NodeJS.ProcessEnv = process.env): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`);
  }
  return parsed;
}

export function optionalEnvFloat(key: string, defaultValue: number, env: NodeJS.ProcessEnv = process.env): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`);
}

export function optionalEnvChoice<T extends string>(
  key: string,
  choices: readonly T[],
  defaultValue: T,
  env: NodeJS.ProcessEnv = process.env
): T {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new ConfigError(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
  }
  return match;
}
