import { CREDENTIALS, makeProbe } from "../__tests__/helpers";
import { ConfigurationInvalidError } from "../errors/driver-errors";
import {
  OPTIONAL_SERVER_SETTINGS,
  REQUIRED_SERVER_SETTINGS,
  connectionSettings,
  resolveInstanceConfig,
} from "./instance-config";

const rsa = "/home/user/.ssh/id_rsa";
const dsa = "/home/user/.ssh/id_dsa";

describe("resolveInstanceConfig", () => {
  describe("default options", () => {
    it("prefers the RSA key when both RSA and DSA keys exist", () => {
      const probe = makeProbe({ fileExists: (p) => p === rsa || p === dsa });
      const config = resolveInstanceConfig({}, probe);

      expect(config.privateKeyPath).toBe(rsa);
      expect(config.publicKeyPath).toBe(`${rsa}.pub`);
    });

    it("uses the DSA key when it is the only one", () => {
      const probe = makeProbe({ fileExists: (p) => p === dsa });
      const config = resolveInstanceConfig({}, probe);

      expect(config.privateKeyPath).toBe(dsa);
      expect(config.publicKeyPath).toBe(`${dsa}.pub`);
    });

    it("leaves key paths unset when no key exists", () => {
      const config = resolveInstanceConfig({}, makeProbe());
      expect(config.privateKeyPath).toBeUndefined();
      expect(config.publicKeyPath).toBeUndefined();
    });

    it("defaults to SSH as root on port 22", () => {
      const config = resolveInstanceConfig({}, makeProbe());
      expect(config.username).toBe("root");
      expect(config.port).toBe(22);
    });

    it("defaults to IPv4 with SSL validation on", () => {
      const config = resolveInstanceConfig({}, makeProbe());
      expect(config.useIpv6).toBe(false);
      expect(config.disableSslValidation).toBe(false);
    });

    it.each([
      "serverName",
      "openstackTenant",
      "openstackRegion",
      "openstackServiceName",
      "floatingIpPool",
      "floatingIp",
      "networkRef",
    ] as const)("defaults to no %s", (key) => {
      expect(resolveInstanceConfig({}, makeProbe())[key]).toBeUndefined();
    });
  });

  it("keeps overridden options", () => {
    const overrides = {
      imageRef: "22",
      flavorRef: "33",
      publicKeyPath: "/tmp",
      username: "admin",
      port: 2222,
      serverName: "puppy",
      openstackTenant: "that_one",
      openstackRegion: "atlantis",
      openstackServiceName: "the_service",
      privateKeyPath: "/path/to/id_rsa",
      floatingIpPool: "swimmers",
      floatingIp: "11111",
      networkRef: "0xCAFFE",
    };
    const config = resolveInstanceConfig(overrides, makeProbe({ fileExists: () => true }));

    expect(config).toMatchObject(overrides);
  });

  it("accepts a port given as a string", () => {
    expect(resolveInstanceConfig({ port: "2222" }, makeProbe()).port).toBe(2222);
  });

  it("derives the public key path from an explicit private key", () => {
    const config = resolveInstanceConfig({ privateKeyPath: "/keys/ci" }, makeProbe());
    expect(config.publicKeyPath).toBe("/keys/ci.pub");
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(resolveInstanceConfig({}, makeProbe()))).toBe(true);
  });

  it("rejects values of the wrong shape", () => {
    expect(() => resolveInstanceConfig({ useIpv6: "yes" }, makeProbe())).toThrow(
      ConfigurationInvalidError
    );
  });
});

describe("connectionSettings", () => {
  it("lists the required and optional settings", () => {
    expect(REQUIRED_SERVER_SETTINGS).toEqual([
      "openstackUsername",
      "openstackApiKey",
      "openstackAuthUrl",
    ]);
    expect(OPTIONAL_SERVER_SETTINGS).toEqual([
      "openstackTenant",
      "openstackRegion",
      "openstackServiceName",
    ]);
  });

  it("returns the server settings including optional scoping", () => {
    const config = resolveInstanceConfig(
      {
        ...CREDENTIALS,
        openstackTenant: "me",
        openstackRegion: "ORD",
        openstackServiceName: "stack",
      },
      makeProbe()
    );

    expect(connectionSettings(config)).toEqual({
      provider: "OpenStack",
      ...CREDENTIALS,
      openstackTenant: "me",
      openstackRegion: "ORD",
      openstackServiceName: "stack",
      disableSslValidation: false,
    });
  });

  it.each(REQUIRED_SERVER_SETTINGS.map((key) => [key]))(
    "raises ConfigurationInvalidError without %s",
    (key) => {
      const partial: Record<string, string> = { ...CREDENTIALS };
      delete partial[key];
      const config = resolveInstanceConfig(partial, makeProbe());

      expect(() => connectionSettings(config)).toThrow(ConfigurationInvalidError);
      expect(() => connectionSettings(config)).toThrow(`Missing required OpenStack settings: ${key}`);
    }
  );

  it("raises when only an API key is provided", () => {
    const config = resolveInstanceConfig({ openstackApiKey: "1234" }, makeProbe());
    expect(() => connectionSettings(config)).toThrow(
      "Missing required OpenStack settings: openstackUsername, openstackAuthUrl"
    );
  });

  it("raises even when the optional settings are present", () => {
    const config = resolveInstanceConfig(
      { openstackUsername: "monkey", openstackTenant: "link", openstackRegion: "ord" },
      makeProbe()
    );
    expect(() => connectionSettings(config)).toThrow(ConfigurationInvalidError);
  });
});
