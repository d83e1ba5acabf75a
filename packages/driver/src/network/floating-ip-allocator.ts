/**
 * Floating IP Allocator: attaches an explicit floating address, or the first
 * free one from a named pool.
 */

import { PoolExhaustedError } from "../errors/driver-errors";
import type {
  AddressEntry,
  FloatingAddress,
  ProviderClient,
  ServerHandle,
} from "../interface/provider-client";

export function isFreeInPool(address: FloatingAddress, pool: string): boolean {
  return address.pool === pool && !address.fixedIp && !address.instanceId;
}

export class FloatingIpAllocator {
  constructor(
    private readonly client: ProviderClient,
    private readonly log: (message: string) => void = () => undefined
  ) {}

  /**
   * Associate `ip` with the server and record it as the server's public
   * group. Returns the recorded group.
   */
  async attach(server: ServerHandle, ip: string): Promise<AddressEntry[]> {
    this.log(`Attaching floating IP <${ip}>`);
    await this.client.associateAddress(server, ip);

    const group: AddressEntry[] = [{ version: 4, addr: ip }];
    server.setAddressGroup("public", group);
    return group;
  }

  /**
   * Attach the first free address from `pool`. Returns the attached IP.
   */
  async attachFromPool(server: ServerHandle, pool: string): Promise<string> {
    const addresses = await this.client.listFloatingAddresses();
    const free = addresses.find((a) => isFreeInPool(a, pool));
    if (!free) {
      throw new PoolExhaustedError(pool);
    }

    this.log(`Selected floating IP <${free.ip}> from pool <${pool}>`);
    await this.attach(server, free.ip);
    return free.ip;
  }
}
