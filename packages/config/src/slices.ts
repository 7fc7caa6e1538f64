import type {
  AuthenticationConfig,
  AuthorizationConfig,
  GatehouseConfig,
  IdentityConfig,
} from "@gatehouse/types";

// Each projection copies only the fields its subsystem reads.

export function identityConfigFrom(config: GatehouseConfig): IdentityConfig {
  return Object.freeze({
    databaseUrl: config.databaseUrl,
    echo: config.echo,
    poolSize: config.poolSize,
    maxOverflow: config.maxOverflow,
  });
}

export function authorizationConfigFrom(config: GatehouseConfig): AuthorizationConfig {
  return Object.freeze({
    databaseUrl: config.databaseUrl,
    echo: config.echo,
    poolSize: config.poolSize,
    maxOverflow: config.maxOverflow,
  });
}

/** `identities` is passed through by reference so authentication sees live identity data. */
export function authenticationConfigFrom<TReader>(
  config: GatehouseConfig,
  identities: TReader,
): AuthenticationConfig<TReader> {
  return Object.freeze({
    databaseUrl: config.databaseUrl,
    secretKey: config.secretKey,
    algorithm: config.algorithm,
    accessTokenTtlMinutes: config.accessTokenTtlMinutes,
    refreshTokenTtlDays: config.refreshTokenTtlDays,
    identities,
  });
}
