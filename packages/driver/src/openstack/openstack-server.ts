import type {
  AddressEntry,
  AddressSource,
  FlatAddresses,
  ServerHandle,
  StructuredAddressMap,
} from "../interface/provider-client";
import type { NovaAddress, NovaServer } from "./types";

/**
 * Address views over a Nova `addresses` map.
 *
 * Public/private classification needs the `OS-EXT-IPS:type` attribute from
 * the floating IP extension; without it the flat view reports unsupported.
 */
class NovaAddressSource implements AddressSource {
  constructor(private readonly groups: Record<string, NovaAddress[]>) {}

  structured(): StructuredAddressMap | undefined {
    const names = Object.keys(this.groups);
    if (names.length === 0) return undefined;

    const map: StructuredAddressMap = {};
    for (const name of names) {
      map[name] = this.groups[name].map((a) =>
        a.version === undefined ? { addr: a.addr } : { version: a.version, addr: a.addr }
      );
    }
    return map;
  }

  flat(): FlatAddresses {
    const entries = Object.values(this.groups).flat();
    if (!entries.some((a) => a["OS-EXT-IPS:type"] !== undefined)) {
      return { supported: false };
    }
    return {
      supported: true,
      public: entries.filter((a) => a["OS-EXT-IPS:type"] === "floating").map((a) => a.addr),
      private: entries.filter((a) => a["OS-EXT-IPS:type"] === "fixed").map((a) => a.addr),
    };
  }

  all(): string[] | undefined {
    const entries = Object.values(this.groups).flat();
    return entries.length > 0 ? entries.map((a) => a.addr) : undefined;
  }

  setGroup(group: string, entries: AddressEntry[]): void {
    this.groups[group] = entries.map((e) => ({ ...e }));
  }
}

export class OpenStackServer implements ServerHandle {
  readonly id: string;
  readonly name: string;
  readonly status: string;
  readonly adminPass?: string;
  readonly addresses: AddressSource;
  private readonly source: NovaAddressSource;

  constructor(raw: NovaServer) {
    this.id = raw.id;
    this.name = raw.name;
    this.status = raw.status;
    this.adminPass = raw.adminPass;
    this.source = new NovaAddressSource({ ...raw.addresses });
    this.addresses = this.source;
  }

  setAddressGroup(group: string, entries: AddressEntry[]): void {
    this.source.setGroup(group, entries);
  }
}
