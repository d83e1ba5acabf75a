import type { NamedResource, NetworkInterfaceSpec } from "../interface/provider-client";

/**
 * Compile `/pattern/` references. Anything else, including an invalid
 * pattern body, yields undefined.
 */
export function parseRegexReference(ref: string): RegExp | undefined {
  if (ref.length < 2 || !ref.startsWith("/") || !ref.endsWith("/")) {
    return undefined;
  }
  try {
    return new RegExp(ref.slice(1, -1));
  } catch {
    // not a usable pattern; treated as a literal reference
    return undefined;
  }
}

/**
 * Map an image/flavor/network reference to a provider id.
 *
 * Precedence: exact id, exact name, then `/regex/` against names in listing
 * order. An unmatched reference is returned as-is, since the provider may
 * accept ids that are not listed.
 */
export function resolveReference(ref: string, candidates: NamedResource[]): string {
  const byId = candidates.find((c) => c.id === ref);
  if (byId) return byId.id;

  const byName = candidates.find((c) => c.name === ref);
  if (byName) return byName.id;

  const pattern = parseRegexReference(ref);
  if (pattern) {
    const byPattern = candidates.find((c) => pattern.test(c.name));
    if (byPattern) return byPattern.id;
  }

  return ref;
}

/**
 * Resolve one or several network references into NIC specs, in order.
 */
export function resolveNetworkRefs(
  refs: string | string[],
  networks: NamedResource[]
): NetworkInterfaceSpec[] {
  const list = Array.isArray(refs) ? refs : [refs];
  return list.map((ref) => ({ netId: resolveReference(ref, networks) }));
}
