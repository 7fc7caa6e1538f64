import { describe, it, expect, expectTypeOf } from "vitest";
import type {
  AuthenticationConfig,
  GatehouseConfigInput,
  IdentityConfig,
  IdentityReader,
  IdentityReaderOf,
  IdentitySubsystem,
  SigningAlgorithm,
  Subsystem,
  SubsystemProviders,
} from "../src/index";

type User = { id: string; email: string };

class UserReader implements IdentityReader<User> {
  constructor(private readonly users: Map<string, User>) {}

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }
}

class UserDirectory implements IdentitySubsystem<UserReader> {
  constructor(readonly repository: UserReader) {}
  init(): void {}
  close(): void {}
}

class TokenIssuer implements Subsystem {
  constructor(readonly config: AuthenticationConfig<UserReader>) {}
  init(): void {}
  close(): void {}
}

type Wired = {
  identity: UserDirectory;
  authorization: Subsystem;
  authentication: TokenIssuer;
};

describe("SubsystemProviders", () => {
  it("should hand the authentication factory the identity subsystem's reader type", () => {
    expectTypeOf<IdentityReaderOf<Wired>>().toEqualTypeOf<UserReader>();
    expectTypeOf<Parameters<SubsystemProviders<Wired>["authentication"]>[0]>().toEqualTypeOf<
      AuthenticationConfig<UserReader>
    >();
  });

  it("should keep the signing secret out of the identity slice", () => {
    expectTypeOf<Parameters<SubsystemProviders<Wired>["identity"]>[0]>().toEqualTypeOf<IdentityConfig>();
    expectTypeOf<"secretKey" extends keyof IdentityConfig ? true : false>().toEqualTypeOf<false>();
  });

  it("should let the authentication adapter look identities up through its slice", async () => {
    // Arrange
    const reader = new UserReader(new Map([["u-1", { id: "u-1", email: "ada@example.test" }]]));
    const providers: SubsystemProviders<Wired> = {
      identity: () => new UserDirectory(reader),
      authorization: () => ({ init() {}, close() {} }),
      authentication: (config) => new TokenIssuer(config),
    };
    const identity = await providers.identity({
      databaseUrl: "sqlite://memory",
      echo: false,
      poolSize: 1,
      maxOverflow: 0,
    });

    // Act
    const authentication = await providers.authentication({
      databaseUrl: "sqlite://memory",
      secretKey: "test-secret",
      algorithm: "HS256",
      accessTokenTtlMinutes: 15,
      refreshTokenTtlDays: 30,
      identities: identity.repository,
    });

    // Assert
    expect(authentication.config.identities).toBe(reader);
    await expect(authentication.config.identities.findById("u-1")).resolves.toEqual({
      id: "u-1",
      email: "ada@example.test",
    });
    await expect(authentication.config.identities.findById("missing")).resolves.toBeNull();
  });
});

describe("GatehouseConfigInput", () => {
  it("should require only the connection string and secret", () => {
    expectTypeOf<GatehouseConfigInput["databaseUrl"]>().toEqualTypeOf<string>();
    expectTypeOf<GatehouseConfigInput["secretKey"]>().toEqualTypeOf<string>();
    expectTypeOf<GatehouseConfigInput["algorithm"]>().toEqualTypeOf<SigningAlgorithm | undefined>();
    expectTypeOf<GatehouseConfigInput["poolSize"]>().toEqualTypeOf<number | undefined>();
  });
});
