/**
 * OpenStack Provider Client
 *
 * REST binding of ProviderClient over Keystone (v2.0 or v3), Nova and
 * Neutron. Requests go through undici so SSL validation can be relaxed per
 * client instead of process-wide.
 */

import { Agent, fetch, type Dispatcher } from "undici";
import type { z } from "zod";
import { AUTHORIZED_KEYS_PATH, SERVER_POLL_INTERVAL_MS } from "../constants";
import { ProviderError } from "../errors/driver-errors";
import type {
  ConnectionSettings,
  CreateServerParams,
  FloatingAddress,
  NamedResource,
  ProviderClient,
  RemoteShell,
  ServerHandle,
  ShellCredential,
} from "../interface/provider-client";
import { openSshSession } from "../ssh/ssh-session";
import { waitForState } from "../utils/provider-utils";
import { OpenStackServer } from "./openstack-server";
import {
  type CatalogService,
  FlavorListSchema,
  ImageListSchema,
  KeystoneV2TokenResponseSchema,
  KeystoneV3TokenResponseSchema,
  NetworkListSchema,
  NovaCreateServerResponseSchema,
  NovaFloatingIpListSchema,
  NovaServerResponseSchema,
} from "./types";

interface Session {
  token: string;
  computeUrl: string;
  catalog: CatalogService[];
}

export interface OpenStackClientOptions {
  /** Overrides the dispatcher, e.g. an undici MockAgent in tests */
  dispatcher?: Dispatcher;
  pollIntervalMs?: number;
  log?: (message: string) => void;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export class OpenStackClient implements ProviderClient {
  private readonly dispatcher?: Dispatcher;
  private readonly pollIntervalMs: number;
  private readonly log: (message: string) => void;
  private session?: Promise<Session>;

  constructor(
    private readonly settings: ConnectionSettings,
    options: OpenStackClientOptions = {}
  ) {
    this.dispatcher =
      options.dispatcher ??
      (settings.disableSslValidation
        ? new Agent({ connect: { rejectUnauthorized: false } })
        : undefined);
    this.pollIntervalMs = options.pollIntervalMs ?? SERVER_POLL_INTERVAL_MS;
    this.log = options.log ?? (() => undefined);
  }

  // ── Transport ────────────────────────────────────────────────────

  private async send(
    method: string,
    url: string,
    body?: Record<string, unknown>,
    token?: string
  ): Promise<{ status: number; subjectToken: string | null; data: unknown }> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
    };
    if (token) headers["X-Auth-Token"] = token;

    const res = await fetch(url, {
      method,
      headers,
      body: body ? JSON.stringify(body) : undefined,
      dispatcher: this.dispatcher,
    }).catch((error: unknown) => {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`OpenStack API ${method} ${url} failed: ${cause.message}`, undefined, cause);
    });

    if (!res.ok) {
      const text = await res.text();
      throw new ProviderError(
        `OpenStack API ${method} ${url} failed (${res.status}): ${text}`,
        res.status
      );
    }

    const text = await res.text();
    let data: unknown;
    if (text) {
      try {
        data = JSON.parse(text);
      } catch (error) {
        throw new ProviderError(
          `OpenStack API ${method} ${url} returned a body that is not JSON (${res.status})`,
          res.status,
          error instanceof Error ? error : undefined
        );
      }
    }
    return {
      status: res.status,
      subjectToken: res.headers.get("x-subject-token"),
      data,
    };
  }

  private async request<S extends z.ZodTypeAny>(
    schema: S,
    method: string,
    service: "compute" | "network",
    path: string,
    body?: Record<string, unknown>
  ): Promise<z.output<S>> {
    const session = await this.authenticate();
    const base =
      service === "compute" ? session.computeUrl : this.networkUrl(session.catalog);
    const { data } = await this.send(method, `${base}${path}`, body, session.token);
    return this.parse(schema, data, `${method} ${path}`);
  }

  private async requestVoid(
    method: string,
    path: string,
    body?: Record<string, unknown>
  ): Promise<void> {
    const session = await this.authenticate();
    await this.send(method, `${session.computeUrl}${path}`, body, session.token);
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ProviderError(`Unexpected OpenStack response for ${what}: ${result.error.message}`);
    }
    return result.data;
  }

  // ── Identity ─────────────────────────────────────────────────────

  private authenticate(): Promise<Session> {
    if (!this.session) {
      // a failed login must not poison later calls
      this.session = this.login().catch((error: unknown) => {
        this.session = undefined;
        throw error;
      });
    }
    return this.session;
  }

  private async login(): Promise<Session> {
    const authUrl = trimSlash(this.settings.openstackAuthUrl);
    const { token, catalog } = /\/v3(\/|$)/.test(authUrl)
      ? await this.loginV3(authUrl)
      : await this.loginV2(authUrl);

    const computeUrl = this.endpointFor(catalog, "compute", this.settings.openstackServiceName);
    this.log(`Authenticated against ${authUrl}`);

    return { token, computeUrl, catalog };
  }

  /** Neutron base URL, versioned. Only looked up when networks are listed. */
  private networkUrl(catalog: CatalogService[]): string {
    const url = this.endpointFor(catalog, "network");
    return `${url.replace(/\/v2\.0$/, "")}/v2.0`;
  }

  private async loginV2(authUrl: string): Promise<{ token: string; catalog: CatalogService[] }> {
    const url = authUrl.endsWith("/tokens") ? authUrl : `${authUrl}/tokens`;
    const auth: Record<string, unknown> = {
      passwordCredentials: {
        username: this.settings.openstackUsername,
        password: this.settings.openstackApiKey,
      },
    };
    if (this.settings.openstackTenant) {
      auth.tenantName = this.settings.openstackTenant;
    }

    const { data } = await this.send("POST", url, { auth });
    const parsed = this.parse(KeystoneV2TokenResponseSchema, data, "POST /tokens");
    return {
      token: parsed.access.token.id,
      catalog: parsed.access.serviceCatalog.map((svc) => ({
        type: svc.type,
        name: svc.name,
        endpoints: svc.endpoints.map((e) => ({ region: e.region, url: e.publicURL })),
      })),
    };
  }

  private async loginV3(authUrl: string): Promise<{ token: string; catalog: CatalogService[] }> {
    const url = authUrl.endsWith("/auth/tokens") ? authUrl : `${authUrl}/auth/tokens`;
    const auth: Record<string, unknown> = {
      identity: {
        methods: ["password"],
        password: {
          user: {
            name: this.settings.openstackUsername,
            domain: { id: "default" },
            password: this.settings.openstackApiKey,
          },
        },
      },
    };
    if (this.settings.openstackTenant) {
      auth.scope = {
        project: { name: this.settings.openstackTenant, domain: { id: "default" } },
      };
    }

    const { subjectToken: token, data } = await this.send("POST", url, { auth });
    if (!token) {
      throw new ProviderError("Keystone v3 response carried no X-Subject-Token header");
    }
    const parsed = this.parse(KeystoneV3TokenResponseSchema, data, "POST /auth/tokens");
    return {
      token,
      catalog: parsed.token.catalog.map((svc) => ({
        type: svc.type,
        name: svc.name,
        endpoints: svc.endpoints
          .filter((e) => e.interface === "public")
          .map((e) => ({ region: e.region_id ?? e.region ?? undefined, url: e.url })),
      })),
    };
  }

  private endpointFor(catalog: CatalogService[], type: string, name?: string): string {
    const region = this.settings.openstackRegion;
    const service = catalog.find((svc) => svc.type === type && (!name || svc.name === name));
    const endpoint = service?.endpoints.find((e) => !region || e.region === region);
    if (!endpoint) {
      const scope = [name && `name "${name}"`, region && `region "${region}"`]
        .filter(Boolean)
        .join(", ");
      throw new ProviderError(
        `No ${type} endpoint in the service catalog${scope ? ` for ${scope}` : ""}`
      );
    }
    return trimSlash(endpoint.url);
  }

  // ── Listings ─────────────────────────────────────────────────────

  async listImages(): Promise<NamedResource[]> {
    const data = await this.request(ImageListSchema, "GET", "compute", "/images");
    return data.images;
  }

  async listFlavors(): Promise<NamedResource[]> {
    const data = await this.request(FlavorListSchema, "GET", "compute", "/flavors");
    return data.flavors;
  }

  async listNetworks(): Promise<NamedResource[]> {
    const data = await this.request(NetworkListSchema, "GET", "network", "/networks");
    return data.networks;
  }

  async listFloatingAddresses(): Promise<FloatingAddress[]> {
    const data = await this.request(NovaFloatingIpListSchema, "GET", "compute", "/os-floating-ips");
    return data.floating_ips.map((f) => ({
      ip: f.ip,
      pool: f.pool,
      fixedIp: f.fixed_ip ?? undefined,
      instanceId: f.instance_id ?? undefined,
    }));
  }

  // ── Servers ──────────────────────────────────────────────────────

  async createServer(params: CreateServerParams): Promise<ServerHandle> {
    const server: Record<string, unknown> = {
      name: params.name,
      imageRef: params.imageRef,
      flavorRef: params.flavorRef,
    };
    if (params.keyName) server.key_name = params.keyName;
    if (params.securityGroups?.length) {
      server.security_groups = params.securityGroups.map((name) => ({ name }));
    }
    if (params.nics?.length) {
      server.networks = params.nics.map((nic) => ({ uuid: nic.netId }));
    }
    if (params.publicKey) {
      server.personality = [
        {
          path: AUTHORIZED_KEYS_PATH,
          contents: Buffer.from(params.publicKey).toString("base64"),
        },
      ];
    }
    if (params.userData) {
      server.user_data = Buffer.from(params.userData).toString("base64");
    }

    const data = await this.request(NovaCreateServerResponseSchema, "POST", "compute", "/servers", {
      server,
    });
    return new OpenStackServer({
      id: data.server.id,
      name: params.name,
      status: "BUILD",
      adminPass: data.server.adminPass,
      addresses: {},
    });
  }

  async getServer(id: string): Promise<ServerHandle | undefined> {
    try {
      const data = await this.request(
        NovaServerResponseSchema,
        "GET",
        "compute",
        `/servers/${encodeURIComponent(id)}`
      );
      return new OpenStackServer(data.server);
    } catch (error) {
      if (error instanceof ProviderError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  async waitForServer(id: string, timeoutMs: number): Promise<ServerHandle> {
    let lastStatus = "";
    const server = await waitForState(
      async () => {
        const current = await this.getServer(id);
        if (!current) {
          throw new ProviderError(`Server ${id} disappeared while waiting for it`, 404);
        }
        if (current.status !== lastStatus) {
          this.log(`Server ${id}: ${current.status}`);
          lastStatus = current.status;
        }
        if (current.status === "ERROR") {
          throw new ProviderError(`Server ${id} entered ERROR state`);
        }
        return current;
      },
      (current) => current.status === "ACTIVE",
      { maxWaitMs: timeoutMs, pollIntervalMs: this.pollIntervalMs }
    );
    if (!server) {
      throw new ProviderError(`Server ${id} did not become ACTIVE within ${timeoutMs}ms`);
    }
    return server;
  }

  async deleteServer(id: string): Promise<void> {
    await this.requestVoid("DELETE", `/servers/${encodeURIComponent(id)}`);
  }

  async associateAddress(server: ServerHandle, ip: string): Promise<void> {
    await this.requestVoid("POST", `/servers/${encodeURIComponent(server.id)}/action`, {
      addFloatingIp: { address: ip },
    });
  }

  // ── Remote execution ─────────────────────────────────────────────

  openShell(
    host: string,
    port: number,
    username: string,
    credential: ShellCredential
  ): Promise<RemoteShell> {
    return openSshSession(host, port, username, credential, this.log);
  }
}

export function createOpenStackClient(
  settings: ConnectionSettings,
  options?: OpenStackClientOptions
): OpenStackClient {
  return new OpenStackClient(settings, options);
}
