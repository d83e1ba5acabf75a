import { AddressUnavailableError } from "../errors/driver-errors";
import type {
  AddressEntry,
  AddressSource,
  IpFamily,
} from "../interface/provider-client";
import { matchesFamily, parseAddresses } from "./address-parser";

export interface IpSelectionOptions {
  family: IpFamily;
  /** Network group to read first, e.g. a tenant network label */
  networkName?: string;
}

function entryMatches(entry: AddressEntry, family: IpFamily): boolean {
  if (entry.version !== undefined) {
    return entry.version === family;
  }
  return matchesFamily(entry.addr, family);
}

function addrs(entries: AddressEntry[] | undefined): string[] | undefined {
  return entries?.map((e) => e.addr);
}

/**
 * Pick the address to reach a server on.
 *
 * Order: the configured network group, then the flat public/private lists,
 * then the structured `public`/`private` groups, then every address the
 * server reports. Public wins over private at each step.
 */
export function selectAddress(source: AddressSource, options: IpSelectionOptions): string {
  const { family, networkName } = options;
  const structured = source.structured();

  if (networkName && structured?.[networkName]) {
    const match = structured[networkName].find((e) => entryMatches(e, family));
    if (match) return match.addr;
  }

  let pub: string[] | undefined;
  let priv: string[] | undefined;

  const flat = source.flat();
  if (flat.supported) {
    pub = flat.public;
    priv = flat.private;
  }

  if (!pub && !priv) {
    pub = addrs(structured?.public);
    priv = addrs(structured?.private);
  }

  if (!pub && !priv) {
    const all = source.all();
    pub = all;
    priv = all;
  }

  const [publicMatches, privateMatches] = parseAddresses(pub, priv, family);
  const selected = publicMatches[0] ?? privateMatches[0];
  if (!selected) {
    throw new AddressUnavailableError(family);
  }
  return selected;
}
