import { isIPv4, isIPv6 } from "node:net";
import type { IpFamily } from "../interface/provider-client";

export function matchesFamily(address: string, family: IpFamily): boolean {
  return family === 6 ? isIPv6(address) : isIPv4(address);
}

/**
 * Keep only the addresses of the requested family, preserving order.
 * Absent lists come back empty.
 */
export function parseAddresses(
  publicAddresses: string[] | undefined,
  privateAddresses: string[] | undefined,
  family: IpFamily = 4
): [string[], string[]] {
  return [
    (publicAddresses ?? []).filter((addr) => matchesFamily(addr, family)),
    (privateAddresses ?? []).filter((addr) => matchesFamily(addr, family)),
  ];
}
