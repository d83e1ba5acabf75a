import { MockAgent } from "undici";
import { CREDENTIALS } from "../__tests__/helpers";
import { ProviderError } from "../errors/driver-errors";
import type { ConnectionSettings } from "../interface/provider-client";
import { OpenStackClient, createOpenStackClient } from "./openstack-client";

const KEYSTONE = "http://keystone.test:5000";
const NOVA = "http://nova.test:8774";
const NEUTRON = "http://neutron.test:9696";

const SETTINGS: ConnectionSettings = {
  provider: "OpenStack",
  ...CREDENTIALS,
  disableSslValidation: false,
};

const V2_TOKEN = {
  access: {
    token: { id: "tok-1" },
    serviceCatalog: [
      {
        type: "compute",
        name: "nova",
        endpoints: [{ region: "RegionOne", publicURL: `${NOVA}/v2/tenant` }],
      },
      {
        type: "network",
        name: "neutron",
        endpoints: [{ region: "RegionOne", publicURL: NEUTRON }],
      },
    ],
  },
};

function bodyOf(body: unknown): unknown {
  return JSON.parse(String(body));
}

describe("OpenStackClient", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    agent.assertNoPendingInterceptors();
    await agent.close();
  });

  function client(settings: Partial<ConnectionSettings> = {}): OpenStackClient {
    return new OpenStackClient({ ...SETTINGS, ...settings }, { dispatcher: agent, pollIntervalMs: 1 });
  }

  function acceptV2Login(): void {
    agent.get(KEYSTONE).intercept({ path: "/v2.0/tokens", method: "POST" }).reply(200, V2_TOKEN);
  }

  it("is built by createOpenStackClient with the given dispatcher", async () => {
    acceptV2Login();
    agent.get(NOVA).intercept({ path: "/v2/tenant/images", method: "GET" }).reply(200, { images: [] });

    const openstack = createOpenStackClient(SETTINGS, { dispatcher: agent });

    expect(openstack).toBeInstanceOf(OpenStackClient);
    await expect(openstack.listImages()).resolves.toEqual([]);
  });

  describe("identity", () => {
    it("logs in once with Keystone v2.0 password credentials", async () => {
      let auth: unknown;
      agent
        .get(KEYSTONE)
        .intercept({ path: "/v2.0/tokens", method: "POST" })
        .reply(200, (opts) => {
          auth = bodyOf(opts.body);
          return V2_TOKEN;
        });
      const nova = agent.get(NOVA);
      nova
        .intercept({ path: "/v2/tenant/images", method: "GET", headers: { "x-auth-token": "tok-1" } })
        .reply(200, { images: [] });
      nova
        .intercept({ path: "/v2/tenant/flavors", method: "GET", headers: { "x-auth-token": "tok-1" } })
        .reply(200, { flavors: [] });

      const openstack = client({ openstackTenant: "link" });
      await openstack.listImages();
      await openstack.listFlavors();

      expect(auth).toEqual({
        auth: {
          passwordCredentials: { username: "hello", password: "test-secret" },
          tenantName: "link",
        },
      });
    });

    it("logs in with Keystone v3 and reads the subject token header", async () => {
      let auth: unknown;
      agent
        .get(KEYSTONE)
        .intercept({ path: "/v3/auth/tokens", method: "POST" })
        .reply(
          201,
          (opts) => {
            auth = bodyOf(opts.body);
            return {
              token: {
                catalog: [
                  {
                    type: "compute",
                    name: "nova",
                    endpoints: [
                      { interface: "internal", region_id: "RegionOne", url: "http://internal.test/v2.1" },
                      { interface: "public", region_id: "RegionOne", url: `${NOVA}/v2.1/` },
                    ],
                  },
                ],
              },
            };
          },
          { headers: { "x-subject-token": "tok-3" } }
        );
      agent
        .get(NOVA)
        .intercept({ path: "/v2.1/images", method: "GET", headers: { "x-auth-token": "tok-3" } })
        .reply(200, { images: [{ id: "111", name: "ubuntu" }] });

      const images = await client({ openstackAuthUrl: `${KEYSTONE}/v3` }).listImages();

      expect(images).toEqual([{ id: "111", name: "ubuntu" }]);
      expect(auth).toEqual({
        auth: {
          identity: {
            methods: ["password"],
            password: {
              user: { name: "hello", domain: { id: "default" }, password: "test-secret" },
            },
          },
        },
      });
    });

    it("picks the endpoint of the configured region", async () => {
      agent
        .get(KEYSTONE)
        .intercept({ path: "/v2.0/tokens", method: "POST" })
        .reply(200, {
          access: {
            token: { id: "tok-1" },
            serviceCatalog: [
              {
                type: "compute",
                endpoints: [
                  { region: "dfw", publicURL: "http://dfw.test/v2" },
                  { region: "ord", publicURL: "http://ord.test/v2" },
                ],
              },
            ],
          },
        });
      agent
        .get("http://ord.test")
        .intercept({ path: "/v2/flavors", method: "GET" })
        .reply(200, { flavors: [{ id: 1, name: "tiny" }] });

      const flavors = await client({ openstackRegion: "ord" }).listFlavors();

      expect(flavors).toEqual([{ id: "1", name: "tiny" }]);
    });

    it("fails with ProviderError when the catalog has no matching compute service", async () => {
      acceptV2Login();

      await expect(client({ openstackServiceName: "cloudServersOpenStack" }).listImages()).rejects.toThrow(
        'No compute endpoint in the service catalog for name "cloudServersOpenStack"'
      );
    });

    it("retries the login after a failure", async () => {
      const keystone = agent.get(KEYSTONE);
      keystone.intercept({ path: "/v2.0/tokens", method: "POST" }).reply(401, "denied");
      keystone.intercept({ path: "/v2.0/tokens", method: "POST" }).reply(200, V2_TOKEN);
      agent.get(NOVA).intercept({ path: "/v2/tenant/images", method: "GET" }).reply(200, { images: [] });

      const openstack = client();
      await expect(openstack.listImages()).rejects.toMatchObject({ name: "ProviderError", status: 401 });
      await expect(openstack.listImages()).resolves.toEqual([]);
    });
  });

  describe("listings", () => {
    it("lists networks from Neutron under /v2.0", async () => {
      acceptV2Login();
      agent
        .get(NEUTRON)
        .intercept({ path: "/v2.0/networks", method: "GET" })
        .reply(200, { networks: [{ id: "net-1", name: "vlan1", status: "ACTIVE" }] });

      await expect(client().listNetworks()).resolves.toEqual([{ id: "net-1", name: "vlan1" }]);
    });

    it("maps floating IPs", async () => {
      acceptV2Login();
      agent
        .get(NOVA)
        .intercept({ path: "/v2/tenant/os-floating-ips", method: "GET" })
        .reply(200, {
          floating_ips: [
            { ip: "1.1.1.1", pool: "swimmers", fixed_ip: "10.0.0.5", instance_id: "s1" },
            { ip: "1.1.1.2", pool: "swimmers", fixed_ip: null, instance_id: null },
          ],
        });

      await expect(client().listFloatingAddresses()).resolves.toEqual([
        { ip: "1.1.1.1", pool: "swimmers", fixedIp: "10.0.0.5", instanceId: "s1" },
        { ip: "1.1.1.2", pool: "swimmers", fixedIp: undefined, instanceId: undefined },
      ]);
    });

    it("raises ProviderError with the status on a failed response", async () => {
      acceptV2Login();
      agent.get(NOVA).intercept({ path: "/v2/tenant/flavors", method: "GET" }).reply(500, "boom");

      const result = client().listFlavors();

      await expect(result).rejects.toBeInstanceOf(ProviderError);
      await expect(result).rejects.toMatchObject({
        status: 500,
        message: `OpenStack API GET ${NOVA}/v2/tenant/flavors failed (500): boom`,
      });
    });

    it("raises ProviderError on a successful response that is not JSON", async () => {
      acceptV2Login();
      agent.get(NOVA).intercept({ path: "/v2/tenant/images", method: "GET" }).reply(200, "<html>oops</html>");

      const result = client().listImages();

      await expect(result).rejects.toBeInstanceOf(ProviderError);
      await expect(result).rejects.toMatchObject({
        status: 200,
        message: `OpenStack API GET ${NOVA}/v2/tenant/images returned a body that is not JSON (200)`,
      });
    });

    it("raises ProviderError on an unexpected response shape", async () => {
      acceptV2Login();
      agent.get(NOVA).intercept({ path: "/v2/tenant/images", method: "GET" }).reply(200, { items: [] });

      await expect(client().listImages()).rejects.toThrow("Unexpected OpenStack response for GET /images");
    });
  });

  describe("servers", () => {
    it("creates a server with every configured option", async () => {
      acceptV2Login();
      let request: unknown;
      agent
        .get(NOVA)
        .intercept({ path: "/v2/tenant/servers", method: "POST" })
        .reply(202, (opts) => {
          request = bodyOf(opts.body);
          return { server: { id: "srv-1", adminPass: "aloha", links: [] } };
        });

      const server = await client().createServer({
        name: "web-1",
        imageRef: "111",
        flavorRef: "1",
        keyName: "tarpals",
        publicKey: "ssh-rsa AAAA test",
        securityGroups: ["default", "ssh"],
        nics: [{ netId: "net-1" }],
        userData: "#cloud-config\n",
      });

      expect(request).toEqual({
        server: {
          name: "web-1",
          imageRef: "111",
          flavorRef: "1",
          key_name: "tarpals",
          security_groups: [{ name: "default" }, { name: "ssh" }],
          networks: [{ uuid: "net-1" }],
          personality: [
            {
              path: "/root/.ssh/authorized_keys",
              contents: Buffer.from("ssh-rsa AAAA test").toString("base64"),
            },
          ],
          user_data: Buffer.from("#cloud-config\n").toString("base64"),
        },
      });
      expect(server.id).toBe("srv-1");
      expect(server.name).toBe("web-1");
      expect(server.adminPass).toBe("aloha");
    });

    it("sends only the required fields when nothing optional is set", async () => {
      acceptV2Login();
      let request: unknown;
      agent
        .get(NOVA)
        .intercept({ path: "/v2/tenant/servers", method: "POST" })
        .reply(202, (opts) => {
          request = bodyOf(opts.body);
          return { server: { id: "srv-1" } };
        });

      const server = await client().createServer({ name: "web-1", imageRef: "111", flavorRef: "1" });

      expect(request).toEqual({ server: { name: "web-1", imageRef: "111", flavorRef: "1" } });
      expect(server.adminPass).toBeUndefined();
    });

    it("returns undefined for a server that no longer exists", async () => {
      acceptV2Login();
      agent
        .get(NOVA)
        .intercept({ path: "/v2/tenant/servers/gone", method: "GET" })
        .reply(404, { itemNotFound: { code: 404 } });

      await expect(client().getServer("gone")).resolves.toBeUndefined();
    });

    it("reads server addresses", async () => {
      acceptV2Login();
      agent
        .get(NOVA)
        .intercept({ path: "/v2/tenant/servers/srv-1", method: "GET" })
        .reply(200, {
          server: {
            id: "srv-1",
            name: "web-1",
            status: "ACTIVE",
            addresses: {
              private: [
                { version: 4, addr: "10.0.0.5", "OS-EXT-IPS:type": "fixed" },
                { version: 4, addr: "1.1.1.1", "OS-EXT-IPS:type": "floating" },
              ],
            },
          },
        });

      const server = await client().getServer("srv-1");

      expect(server?.status).toBe("ACTIVE");
      expect(server?.addresses.flat()).toEqual({
        supported: true,
        public: ["1.1.1.1"],
        private: ["10.0.0.5"],
      });
    });

    it("waits for the server to become ACTIVE", async () => {
      acceptV2Login();
      const nova = agent.get(NOVA);
      nova
        .intercept({ path: "/v2/tenant/servers/srv-1", method: "GET" })
        .reply(200, { server: { id: "srv-1", status: "BUILD" } });
      nova
        .intercept({ path: "/v2/tenant/servers/srv-1", method: "GET" })
        .reply(200, { server: { id: "srv-1", status: "ACTIVE" } });

      const server = await client().waitForServer("srv-1", 5_000);

      expect(server.status).toBe("ACTIVE");
    });

    it("stops waiting when the server enters ERROR", async () => {
      acceptV2Login();
      agent
        .get(NOVA)
        .intercept({ path: "/v2/tenant/servers/srv-1", method: "GET" })
        .reply(200, { server: { id: "srv-1", status: "ERROR" } });

      await expect(client().waitForServer("srv-1", 5_000)).rejects.toThrow(
        "Server srv-1 entered ERROR state"
      );
    });

    it("deletes a server", async () => {
      acceptV2Login();
      agent.get(NOVA).intercept({ path: "/v2/tenant/servers/srv-1", method: "DELETE" }).reply(204, "");

      await expect(client().deleteServer("srv-1")).resolves.toBeUndefined();
    });

    it("associates a floating IP through a server action", async () => {
      acceptV2Login();
      let request: unknown;
      agent
        .get(NOVA)
        .intercept({ path: "/v2/tenant/servers/srv-1/action", method: "POST" })
        .reply(202, (opts) => {
          request = bodyOf(opts.body);
          return "";
        });
      await client().associateAddress(
        {
          id: "srv-1",
          name: "web-1",
          status: "ACTIVE",
          addresses: { structured: () => undefined, flat: () => ({ supported: false }), all: () => undefined },
          setAddressGroup: () => undefined,
        },
        "1.1.1.1"
      );

      expect(request).toEqual({ addFloatingIp: { address: "1.1.1.1" } });
    });
  });
});
