/**
 * Provider Client contract
 *
 * The lifecycle orchestrator talks to the cloud exclusively through this
 * interface. The OpenStack REST binding implements it; tests substitute
 * jest mocks.
 */

// =============================================================================
// Listings
// =============================================================================

/** Any listed resource that references can be resolved against. */
export interface NamedResource {
  id: string;
  name: string;
}

export interface FloatingAddress {
  ip: string;
  pool: string;
  /** Fixed IP the address is mapped to, when in use */
  fixedIp?: string;
  /** Server the address is associated with, when in use */
  instanceId?: string;
}

// =============================================================================
// Addresses
// =============================================================================

export type IpFamily = 4 | 6;

export interface AddressEntry {
  version?: IpFamily;
  addr: string;
}

/** Network group name → entries, as reported by the compute API. */
export type StructuredAddressMap = Record<string, AddressEntry[]>;

/**
 * Flat public/private lists. Deployments without the floating IP extension
 * cannot classify addresses and report `supported: false`.
 */
export type FlatAddresses =
  | { supported: true; public?: string[]; private?: string[] }
  | { supported: false };

/**
 * The address views a server may expose. Each view is probed explicitly;
 * none of them throw.
 */
export interface AddressSource {
  /** Structured map, when the provider returned one */
  structured(): StructuredAddressMap | undefined;
  /** Flat public/private lists, or the unsupported signal */
  flat(): FlatAddresses;
  /** Every address regardless of network naming */
  all(): string[] | undefined;
}

// =============================================================================
// Servers
// =============================================================================

export interface ServerHandle {
  readonly id: string;
  readonly name: string;
  readonly status: string;
  /** Administrative password returned at creation, when the cloud hands one out */
  readonly adminPass?: string;
  readonly addresses: AddressSource;
  /** Record a network group locally after an out-of-band attachment */
  setAddressGroup(group: string, entries: AddressEntry[]): void;
}

export interface NetworkInterfaceSpec {
  netId: string;
}

export interface CreateServerParams {
  name: string;
  imageRef: string;
  flavorRef: string;
  keyName?: string;
  /** Public key contents to inject into the server */
  publicKey?: string;
  securityGroups?: string[];
  nics?: NetworkInterfaceSpec[];
  /** Raw user-data; the client encodes it for the wire */
  userData?: string;
}

// =============================================================================
// Remote execution
// =============================================================================

export type ShellCredential =
  | { password: string }
  | { privateKeyPath: string };

export interface RemoteShell {
  /** Run a command and resolve with its stdout. Rejects on a non-zero exit. */
  run(command: string): Promise<string>;
  close(): void;
}

// =============================================================================
// Client
// =============================================================================

export interface ProviderClient {
  listImages(): Promise<NamedResource[]>;
  listFlavors(): Promise<NamedResource[]>;
  listNetworks(): Promise<NamedResource[]>;
  listFloatingAddresses(): Promise<FloatingAddress[]>;

  createServer(params: CreateServerParams): Promise<ServerHandle>;
  /** Poll until the server is ACTIVE; rejects when it enters ERROR or the bound passes */
  waitForServer(id: string, timeoutMs: number): Promise<ServerHandle>;
  /** Resolves undefined when no live server has the id */
  getServer(id: string): Promise<ServerHandle | undefined>;
  deleteServer(id: string): Promise<void>;
  associateAddress(server: ServerHandle, ip: string): Promise<void>;

  openShell(
    host: string,
    port: number,
    username: string,
    credential: ShellCredential
  ): Promise<RemoteShell>;
}

/**
 * Settings handed to a ProviderClient factory once the credential group has
 * been validated.
 */
export interface ConnectionSettings {
  provider: "OpenStack";
  openstackUsername: string;
  openstackApiKey: string;
  openstackAuthUrl: string;
  openstackTenant?: string;
  openstackRegion?: string;
  openstackServiceName?: string;
  disableSslValidation: boolean;
}

export type ProviderClientFactory = (settings: ConnectionSettings) => ProviderClient;
