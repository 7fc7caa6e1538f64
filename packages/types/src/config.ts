/** JWS signing algorithms accepted for token issuance. */
export type SigningAlgorithm =
  | "HS256"
  | "HS384"
  | "HS512"
  | "RS256"
  | "RS384"
  | "RS512"
  | "ES256"
  | "ES384"
  | "ES512";

/**
 * Shared settings for every subsystem the container wires together.
 * Immutable once created; the container only ever reads it.
 */
export interface GatehouseConfig {
  readonly databaseUrl: string;
  readonly secretKey: string;
  readonly algorithm: SigningAlgorithm;
  readonly echo: boolean;
  readonly poolSize: number;
  readonly maxOverflow: number;
  readonly accessTokenTtlMinutes: number;
  readonly refreshTokenTtlDays: number;
}

/** Caller-supplied settings: the connection string and secret are required, the rest default. */
export type GatehouseConfigInput = Pick<GatehouseConfig, "databaseUrl" | "secretKey"> &
  Partial<Omit<GatehouseConfig, "databaseUrl" | "secretKey">>;

export type IdentityConfig = {
  readonly databaseUrl: string;
  readonly echo: boolean;
  readonly poolSize: number;
  readonly maxOverflow: number;
};

export type AuthorizationConfig = {
  readonly databaseUrl: string;
  readonly echo: boolean;
  readonly poolSize: number;
  readonly maxOverflow: number;
};

export type AuthenticationConfig<TReader> = {
  readonly databaseUrl: string;
  readonly secretKey: string;
  readonly algorithm: SigningAlgorithm;
  readonly accessTokenTtlMinutes: number;
  readonly refreshTokenTtlDays: number;
  /** Live reference to the identity subsystem's data-access surface, never a copy. */
  readonly identities: TReader;
};
