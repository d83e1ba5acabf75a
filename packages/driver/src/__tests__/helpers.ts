import { join } from "node:path";
import type { EnvironmentProbe } from "../interface/environment-probe";
import type {
  AddressEntry,
  FlatAddresses,
  ProviderClient,
  RemoteShell,
  ServerHandle,
  StructuredAddressMap,
} from "../interface/provider-client";

export const FIXTURES = join(__dirname, "fixtures");
export const PUBLIC_KEY_FIXTURE = join(FIXTURES, "id_rsa.pub");
export const USER_DATA_FIXTURE = join(FIXTURES, "user-data.txt");

export const CREDENTIALS = {
  openstackUsername: "hello",
  openstackApiKey: "test-secret",
  openstackAuthUrl: "http://keystone.test:5000/v2.0",
};

export function makeProbe(overrides: Partial<EnvironmentProbe> = {}): EnvironmentProbe {
  return {
    login: () => "user",
    hostname: () => "host",
    homeDir: () => "/home/user",
    fileExists: () => false,
    ...overrides,
  };
}

export interface AddressViews {
  structured?: StructuredAddressMap;
  flat?: FlatAddresses;
  all?: string[];
}

export function makeServer(
  id = "test123",
  views: AddressViews = {},
  adminPass?: string
): ServerHandle {
  const structured = views.structured ? { ...views.structured } : undefined;
  const groups: StructuredAddressMap = structured ?? {};
  return {
    id,
    name: "server",
    status: "ACTIVE",
    adminPass,
    addresses: {
      structured: () => (Object.keys(groups).length > 0 ? groups : undefined),
      flat: () => views.flat ?? { supported: true },
      all: () => views.all,
    },
    setAddressGroup(group: string, entries: AddressEntry[]) {
      groups[group] = entries;
    },
  };
}

export function makeShell(): RemoteShell & { run: jest.Mock; close: jest.Mock } {
  return {
    run: jest.fn().mockResolvedValue(""),
    close: jest.fn(),
  };
}

export type MockProviderClient = { [K in keyof ProviderClient]: jest.Mock };

export function makeClient(server: ServerHandle = makeServer()): MockProviderClient {
  return {
    listImages: jest.fn().mockResolvedValue([
      { id: "111", name: "ubuntu" },
      { id: "222", name: "fedora" },
    ]),
    listFlavors: jest.fn().mockResolvedValue([
      { id: "1", name: "tiny" },
      { id: "2", name: "small" },
    ]),
    listNetworks: jest.fn().mockResolvedValue([
      { id: "1", name: "vlan1" },
      { id: "2", name: "vlan2" },
    ]),
    listFloatingAddresses: jest.fn().mockResolvedValue([]),
    createServer: jest.fn().mockResolvedValue(server),
    waitForServer: jest.fn().mockResolvedValue(server),
    getServer: jest.fn().mockResolvedValue(server),
    deleteServer: jest.fn().mockResolvedValue(undefined),
    associateAddress: jest.fn().mockResolvedValue(undefined),
    openShell: jest.fn().mockImplementation(async () => makeShell()),
  };
}
