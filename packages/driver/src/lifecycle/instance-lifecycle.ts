/**
 * Instance Lifecycle
 *
 * Drives one OpenStack server through
 *   Unprovisioned → Requested → AddressAssigned → ShellReady → Bootstrapped
 * and tears it down again. Instance State is saved after every key change so
 * a failed create can always be cleaned up by destroy.
 */

import { readFile } from "node:fs/promises";
import { BaseDriver, type LogCallback } from "../base/base-driver";
import {
  buildHintCommands,
  buildKeySetupCommands,
} from "../bootstrap/bootstrap-script-builder";
import { connectionSettings, type InstanceConfig } from "../config/instance-config";
import { ConfigurationInvalidError } from "../errors/driver-errors";
import type { EnvironmentProbe } from "../interface/environment-probe";
import type { InstanceStateStore } from "../interface/instance-state";
import type {
  CreateServerParams,
  ProviderClient,
  ProviderClientFactory,
  ServerHandle,
  ShellCredential,
} from "../interface/provider-client";
import { generateServerName, type SuffixGenerator } from "../naming/name-generator";
import { FloatingIpAllocator } from "../network/floating-ip-allocator";
import { selectAddress } from "../network/ip-selector";
import { resolveNetworkRefs, resolveReference } from "../resolve/reference-resolver";
import type { ShellProbe } from "../ssh/shell-probe";

export interface InstanceLifecycleDeps {
  clientFactory: ProviderClientFactory;
  stateStore: InstanceStateStore;
  shellProbe: ShellProbe;
  environment: EnvironmentProbe;
  /** Suffix source for generated server names */
  nameSuffix?: SuffixGenerator;
  logCallback?: LogCallback;
}

export interface CreateResult {
  serverId: string;
  serverName: string;
  hostname: string;
}

export class InstanceLifecycle extends BaseDriver {
  private client?: ProviderClient;

  constructor(
    /** Base name of the instance, used for generated server names */
    readonly instanceName: string,
    readonly config: InstanceConfig,
    private readonly deps: InstanceLifecycleDeps
  ) {
    super(deps.logCallback);
  }

  /**
   * Provider client for this run. Building it validates the credential
   * group, so it throws ConfigurationInvalidError on partial credentials.
   */
  protected compute(): ProviderClient {
    if (!this.client) {
      this.client = this.deps.clientFactory(connectionSettings(this.config));
    }
    return this.client;
  }

  // ── Create ───────────────────────────────────────────────────────

  async create(): Promise<CreateResult> {
    const client = this.compute();
    const { stateStore } = this.deps;
    const state = await stateStore.load();

    const params = await this.buildCreateParams(client);
    const created = await client.createServer(params);
    state.serverId = created.id;
    await stateStore.save(state);
    this.log(`OpenStack instance <${created.id}> created.`);

    const server = await client.waitForServer(created.id, this.config.serverReadyTimeoutMs);
    this.log(`OpenStack instance <${created.id}> is ACTIVE.`);

    const hostname = await this.assignAddress(client, server);
    state.hostname = hostname;
    await stateStore.save(state);
    this.log(`OpenStack instance <${created.id}> reachable at <${hostname}>.`);

    await this.deps.shellProbe.waitForShell(hostname, this.config.port, this.config.sshTimeoutMs);

    await this.setupSsh(client, hostname, server.adminPass ?? created.adminPass);
    await this.addPlatformHint(client, hostname);
    this.log(`OpenStack instance <${created.id}> bootstrapped.`);

    return { serverId: created.id, serverName: params.name, hostname };
  }

  /**
   * Resolve references and read local files into create parameters. Only
   * configured options are included.
   */
  async buildCreateParams(client: ProviderClient): Promise<CreateServerParams> {
    const { imageRef, flavorRef, networkRef, publicKeyPath, privateKeyPath } = this.config;
    // the key pair is needed after the server exists; fail before creating it
    if (!imageRef || !flavorRef || !publicKeyPath || !privateKeyPath) {
      const missing = Object.entries({ imageRef, flavorRef, publicKeyPath, privateKeyPath })
        .filter(([, value]) => !value)
        .map(([field]) => field);
      throw new ConfigurationInvalidError(`Missing required settings: ${missing.join(", ")}`, missing);
    }

    const params: CreateServerParams = {
      name: this.config.serverName ?? this.defaultName(),
      imageRef: resolveReference(imageRef, await client.listImages()),
      flavorRef: resolveReference(flavorRef, await client.listFlavors()),
    };

    if (this.config.keyName) {
      params.keyName = this.config.keyName;
    }
    params.publicKey = await readFile(publicKeyPath, "utf-8");
    if (this.config.securityGroups?.length) {
      params.securityGroups = [...this.config.securityGroups];
    }
    if (networkRef !== undefined) {
      params.nics = resolveNetworkRefs(networkRef, await client.listNetworks());
    }
    if (this.config.userDataPath) {
      params.userData = await readFile(this.config.userDataPath, "utf-8");
    }

    return params;
  }

  defaultName(): string {
    return generateServerName(this.instanceName, this.deps.environment, this.deps.nameSuffix);
  }

  private async assignAddress(client: ProviderClient, server: ServerHandle): Promise<string> {
    const allocator = new FloatingIpAllocator(client, (message) => this.log(message));

    if (this.config.floatingIp) {
      await allocator.attach(server, this.config.floatingIp);
      return this.config.floatingIp;
    }
    if (this.config.floatingIpPool) {
      return allocator.attachFromPool(server, this.config.floatingIpPool);
    }

    return selectAddress(server.addresses, {
      family: this.config.useIpv6 ? 6 : 4,
      networkName: this.config.openstackNetworkName,
    });
  }

  // ── Bootstrap ────────────────────────────────────────────────────

  /**
   * Install the public key and lock the login password. Uses the admin
   * password handed out at creation, or the private key when there is none.
   */
  private async setupSsh(
    client: ProviderClient,
    hostname: string,
    adminPass: string | undefined
  ): Promise<string[]> {
    const { publicKeyPath, username } = this.config;
    if (!publicKeyPath) {
      throw new ConfigurationInvalidError("publicKeyPath is required to set up SSH access", [
        "publicKeyPath",
      ]);
    }

    const publicKey = await readFile(publicKeyPath, "utf-8");
    const credential = adminPass ? { password: adminPass } : this.keyCredential();
    this.log(`Installing SSH key for ${username}@${hostname}`);
    return this.runSequence(client, hostname, credential, buildKeySetupCommands(publicKey, username));
  }

  private async addPlatformHint(client: ProviderClient, hostname: string): Promise<string[]> {
    this.log(`Adding platform hint on ${hostname}`);
    return this.runSequence(client, hostname, this.keyCredential(), buildHintCommands());
  }

  private keyCredential(): ShellCredential {
    if (!this.config.privateKeyPath) {
      throw new ConfigurationInvalidError(
        "privateKeyPath is required when the server has no admin password",
        ["privateKeyPath"]
      );
    }
    return { privateKeyPath: this.config.privateKeyPath };
  }

  /**
   * Run commands in order over one channel; the first failure stops the
   * sequence. The channel is always closed.
   */
  async runSequence(
    client: ProviderClient,
    hostname: string,
    credential: ShellCredential,
    commands: string[]
  ): Promise<string[]> {
    const shell = await client.openShell(hostname, this.config.port, this.config.username, credential);
    try {
      const outputs: string[] = [];
      for (const command of commands) {
        outputs.push(await shell.run(command));
      }
      return outputs;
    } finally {
      shell.close();
    }
  }

  // ── Destroy ──────────────────────────────────────────────────────

  /**
   * Idempotent teardown. Without a saved server id nothing is called. Once
   * an id was saved, both state keys are cleared whatever the remote
   * outcome.
   */
  async destroy(): Promise<void> {
    const { stateStore } = this.deps;
    const state = await stateStore.load();
    const serverId = state.serverId;
    if (!serverId) return;

    try {
      const client = this.compute();
      const server = await client.getServer(serverId);
      if (server) {
        await client.deleteServer(server.id);
        this.log(`OpenStack instance <${serverId}> destroyed.`);
      } else {
        this.log(`OpenStack instance <${serverId}> already gone.`);
      }
    } finally {
      delete state.serverId;
      delete state.hostname;
      await stateStore.save(state);
    }
  }
}
