import createDebug from "debug";
import type { GatehouseConfig, GatehouseConfigInput, SigningAlgorithm } from "@gatehouse/types";
import { createConfig } from "./config";
import { ConfigError } from "./errors";

const debug = createDebug("gatehouse:config:env");

export const CONFIG_ENV = {
  databaseUrl: "GATEHOUSE_DATABASE_URL",
  secretKey: "GATEHOUSE_SECRET_KEY",
  algorithm: "GATEHOUSE_JWT_ALGORITHM",
  echo: "GATEHOUSE_DB_ECHO",
  poolSize: "GATEHOUSE_DB_POOL_SIZE",
  maxOverflow: "GATEHOUSE_DB_MAX_OVERFLOW",
  accessTokenTtlMinutes: "GATEHOUSE_ACCESS_TOKEN_TTL_MINUTES",
  refreshTokenTtlDays: "GATEHOUSE_REFRESH_TOKEN_TTL_DAYS",
} as const;

const SIGNING_ALGORITHMS = new Set<string>([
  "HS256",
  "HS384",
  "HS512",
  "RS256",
  "RS384",
  "RS512",
  "ES256",
  "ES384",
  "ES512",
]);

function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return SIGNING_ALGORITHMS.has(value);
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (value === undefined || value === "") {
    throw new ConfigError(name);
  }
  return value;
}

function readCount(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;

  if (!/^\d+$/.test(raw)) {
    debug("%s=%s is not a non-negative integer, using default", name, raw);
    return undefined;
  }
  return Number(raw);
}

function readAlgorithm(env: NodeJS.ProcessEnv): SigningAlgorithm | undefined {
  const raw = env[CONFIG_ENV.algorithm];
  if (raw === undefined) return undefined;
  if (isSigningAlgorithm(raw)) return raw;

  debug("%s=%s is not a supported algorithm, using default", CONFIG_ENV.algorithm, raw);
  return undefined;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  return raw === undefined ? undefined : raw === "true";
}

/**
 * Reads configuration input from GATEHOUSE_* environment variables.
 * Optional values that are missing or unparseable come back undefined so the
 * defaults from createConfig apply.
 */
export function readConfigEnv(env: NodeJS.ProcessEnv = process.env): GatehouseConfigInput {
  return {
    databaseUrl: required(env, CONFIG_ENV.databaseUrl),
    secretKey: required(env, CONFIG_ENV.secretKey),
    algorithm: readAlgorithm(env),
    echo: readFlag(env, CONFIG_ENV.echo),
    poolSize: readCount(env, CONFIG_ENV.poolSize),
    maxOverflow: readCount(env, CONFIG_ENV.maxOverflow),
    accessTokenTtlMinutes: readCount(env, CONFIG_ENV.accessTokenTtlMinutes),
    refreshTokenTtlDays: readCount(env, CONFIG_ENV.refreshTokenTtlDays),
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatehouseConfig {
  return createConfig(readConfigEnv(env));
}
