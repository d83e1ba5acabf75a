/**
 * OpenStack API response shapes (Keystone v2.0/v3, Nova, Neutron).
 *
 * Only the fields the driver reads are modelled; zod strips the rest.
 */

import { z } from "zod";

// -- Keystone v2.0 --

export const KeystoneV2EndpointSchema = z.object({
  region: z.string().optional(),
  publicURL: z.string(),
});

export const KeystoneV2ServiceSchema = z.object({
  type: z.string(),
  name: z.string().optional(),
  endpoints: z.array(KeystoneV2EndpointSchema),
});

export const KeystoneV2TokenResponseSchema = z.object({
  access: z.object({
    token: z.object({ id: z.string() }),
    serviceCatalog: z.array(KeystoneV2ServiceSchema).default([]),
  }),
});

// -- Keystone v3 --

export const KeystoneV3EndpointSchema = z.object({
  interface: z.string(),
  region: z.string().nullish(),
  region_id: z.string().nullish(),
  url: z.string(),
});

export const KeystoneV3ServiceSchema = z.object({
  type: z.string(),
  name: z.string().optional(),
  endpoints: z.array(KeystoneV3EndpointSchema),
});

export const KeystoneV3TokenResponseSchema = z.object({
  token: z.object({
    catalog: z.array(KeystoneV3ServiceSchema).default([]),
  }),
});

/** Catalog entry normalised across Keystone versions. */
export interface CatalogService {
  type: string;
  name?: string;
  endpoints: Array<{ region?: string; url: string }>;
}

// -- Nova / Neutron --

export const NamedResourceSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
});

export const ImageListSchema = z.object({ images: z.array(NamedResourceSchema) });
export const FlavorListSchema = z.object({ flavors: z.array(NamedResourceSchema) });
export const NetworkListSchema = z.object({ networks: z.array(NamedResourceSchema) });

export const NovaAddressSchema = z.object({
  version: z.union([z.literal(4), z.literal(6)]).optional(),
  addr: z.string(),
  "OS-EXT-IPS:type": z.enum(["fixed", "floating"]).optional(),
});
export type NovaAddress = z.infer<typeof NovaAddressSchema>;

export const NovaServerSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  status: z.string().default("BUILD"),
  adminPass: z.string().optional(),
  addresses: z.record(z.array(NovaAddressSchema)).default({}),
});
export type NovaServer = z.infer<typeof NovaServerSchema>;

export const NovaServerResponseSchema = z.object({ server: NovaServerSchema });

/** POST /servers only echoes id, links and adminPass. */
export const NovaCreateServerResponseSchema = z.object({
  server: z.object({
    id: z.string(),
    adminPass: z.string().optional(),
  }),
});

export const NovaFloatingIpListSchema = z.object({
  floating_ips: z.array(
    z.object({
      ip: z.string(),
      pool: z.string(),
      fixed_ip: z.string().nullish(),
      instance_id: z.string().nullish(),
    })
  ),
});
