import type { GatehouseConfig, GatehouseConfigInput } from "@gatehouse/types";

type ConfigDefaults = Omit<GatehouseConfig, "databaseUrl" | "secretKey">;

const defaults: ConfigDefaults = {
  algorithm: "HS256",
  echo: false,
  poolSize: 5,
  maxOverflow: 10,
  accessTokenTtlMinutes: 15,
  refreshTokenTtlDays: 30,
};

export const DEFAULT_CONFIG: Readonly<ConfigDefaults> = Object.freeze(defaults);

/**
 * Builds the shared configuration value. Never fails: the connection string
 * and secret are checked by the subsystems that use them, not here.
 */
export function createConfig(input: GatehouseConfigInput): GatehouseConfig {
  return Object.freeze({
    databaseUrl: input.databaseUrl,
    secretKey: input.secretKey,
    algorithm: input.algorithm ?? DEFAULT_CONFIG.algorithm,
    echo: input.echo ?? DEFAULT_CONFIG.echo,
    poolSize: input.poolSize ?? DEFAULT_CONFIG.poolSize,
    maxOverflow: input.maxOverflow ?? DEFAULT_CONFIG.maxOverflow,
    accessTokenTtlMinutes: input.accessTokenTtlMinutes ?? DEFAULT_CONFIG.accessTokenTtlMinutes,
    refreshTokenTtlDays: input.refreshTokenTtlDays ?? DEFAULT_CONFIG.refreshTokenTtlDays,
  });
}
