import { ConfigurationError } from "../errors/QboError";
import { loadConfigFromEnv, resolveClientConfig } from "./config";

describe("loadConfigFromEnv", () => {
  it("should read credentials and settings", () => {
    const config = loadConfigFromEnv({
      QBO_ACCESS_TOKEN: "test-access-token",
      QBO_REALM_ID: "123145",
      QBO_PRODUCTION: "true",
      QBO_MINOR_VERSION: "65",
      QBO_API_LOG: "1",
    });

    expect(config.credentials?.accessToken).toBe("test-access-token");
    expect(config.credentials?.token).toBeUndefined();
    expect(config.realmId).toBe("123145");
    expect(config.production).toBe(true);
    expect(config.minorVersion).toBe(65);
    expect(config.log).toBe(true);
  });

  it("should leave unset and empty variables undefined", () => {
    const config = loadConfigFromEnv({ QBO_REALM_ID: "", QBO_API_LOG: "" });
    expect(config.realmId).toBeUndefined();
    expect(config.log).toBeUndefined();
    expect(config.production).toBeUndefined();
  });

  it("should read false flags", () => {
    expect(loadConfigFromEnv({ QBO_API_LOG: "false" }).log).toBe(false);
  });

  it("should reject a minor version that is not a positive integer", () => {
    expect(() => loadConfigFromEnv({ QBO_MINOR_VERSION: "abc" })).toThrow(
      ConfigurationError,
    );
    expect(() => loadConfigFromEnv({ QBO_MINOR_VERSION: "0" })).toThrow(
      'QBO_MINOR_VERSION must be a positive integer, got "0"',
    );
  });
});

describe("resolveClientConfig", () => {
  const env = {
    QBO_ACCESS_TOKEN: "env-access-token",
    QBO_REALM_ID: "env-realm",
    QBO_API_LOG: "true",
  };

  it("should prefer explicit values over the environment", () => {
    const config = resolveClientConfig(
      { credentials: { accessToken: "test-access-token" }, realmId: "123", log: false },
      env,
    );

    expect(config.credentials).toEqual({ accessToken: "test-access-token" });
    expect(config.realmId).toBe("123");
    expect(config.log).toBe(false);
  });

  it("should fill unset values from the environment", () => {
    const config = resolveClientConfig({}, env);

    expect(config.credentials).toEqual({ accessToken: "env-access-token" });
    expect(config.realmId).toBe("env-realm");
    expect(config.log).toBe(true);
  });

  it("should not mix caller and environment credentials", () => {
    const config = resolveClientConfig(
      { credentials: { token: "test-token" } },
      env,
    );
    expect(config.credentials).toEqual({ token: "test-token" });
  });

  it("should keep extra fields of the caller's config", () => {
    const config = resolveClientConfig({ strictParsing: true, endpoint: "payments" as const }, {});
    expect(config.strictParsing).toBe(true);
    expect(config.endpoint).toBe("payments");
  });
});
