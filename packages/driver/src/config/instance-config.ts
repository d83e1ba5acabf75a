/**
 * Instance Configuration
 *
 * The raw configuration (usually a JSON file) is validated with zod, then
 * resolved into a frozen InstanceConfig with every default applied. The
 * orchestrator only ever sees the resolved form.
 */

import { join } from "node:path";
import { z } from "zod";
import {
  DEFAULT_SSH_KEY_NAMES,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_USERNAME,
  SERVER_READY_TIMEOUT_MS,
  SSH_READY_TIMEOUT_MS,
} from "../constants";
import { ConfigurationInvalidError } from "../errors/driver-errors";
import type { EnvironmentProbe } from "../interface/environment-probe";
import type { ConnectionSettings } from "../interface/provider-client";

export const InstanceConfigSchema = z.object({
  // Credentials (required as a group)
  openstackUsername: z.string().min(1).optional(),
  openstackApiKey: z.string().min(1).optional(),
  openstackAuthUrl: z.string().min(1).optional(),

  // Scoping
  openstackTenant: z.string().optional(),
  openstackRegion: z.string().optional(),
  openstackServiceName: z.string().optional(),

  // Server shape
  imageRef: z.string().optional(),
  flavorRef: z.string().optional(),
  networkRef: z.union([z.string(), z.array(z.string())]).optional(),
  serverName: z.string().min(1).optional(),
  keyName: z.string().optional(),
  securityGroups: z.array(z.string()).optional(),
  userDataPath: z.string().optional(),

  // SSH
  username: z.string().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65535).optional(),
  privateKeyPath: z.string().optional(),
  publicKeyPath: z.string().optional(),

  // Addressing
  floatingIpPool: z.string().optional(),
  floatingIp: z.string().optional(),
  openstackNetworkName: z.string().optional(),
  useIpv6: z.boolean().default(false),

  // Transport
  disableSslValidation: z.boolean().default(false),

  // Bounds
  sshTimeoutMs: z.number().int().positive().default(SSH_READY_TIMEOUT_MS),
  serverReadyTimeoutMs: z.number().int().positive().default(SERVER_READY_TIMEOUT_MS),
});

export type InstanceConfigInput = z.input<typeof InstanceConfigSchema>;

type ParsedInstanceConfig = z.output<typeof InstanceConfigSchema>;

export type InstanceConfig = Readonly<
  ParsedInstanceConfig & {
    username: string;
    port: number;
  }
>;

export const REQUIRED_SERVER_SETTINGS = [
  "openstackUsername",
  "openstackApiKey",
  "openstackAuthUrl",
] as const;

export const OPTIONAL_SERVER_SETTINGS = [
  "openstackTenant",
  "openstackRegion",
  "openstackServiceName",
] as const;

/**
 * Validate raw configuration and apply defaults. Key paths default to the
 * caller's RSA key, falling back to DSA, based on which files exist.
 */
export function resolveInstanceConfig(
  input: unknown,
  probe: EnvironmentProbe
): InstanceConfig {
  const result = InstanceConfigSchema.safeParse(input);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join("."));
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationInvalidError(`Invalid instance configuration: ${details}`, fields);
  }

  const parsed = result.data;
  const discovered = discoverKeyPath(probe);
  const privateKeyPath = parsed.privateKeyPath ?? discovered;
  const publicKeyPath =
    parsed.publicKeyPath ?? (privateKeyPath ? `${privateKeyPath}.pub` : undefined);

  return Object.freeze({
    ...parsed,
    username: parsed.username ?? DEFAULT_SSH_USERNAME,
    port: parsed.port ?? DEFAULT_SSH_PORT,
    privateKeyPath,
    publicKeyPath,
  });
}

function discoverKeyPath(probe: EnvironmentProbe): string | undefined {
  for (const name of DEFAULT_SSH_KEY_NAMES) {
    const candidate = join(probe.homeDir(), ".ssh", name);
    if (probe.fileExists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Build the provider connection settings. Any missing member of the
 * credential group is an error, whatever else is supplied.
 */
export function connectionSettings(config: InstanceConfig): ConnectionSettings {
  const missing = REQUIRED_SERVER_SETTINGS.filter((key) => !config[key]);
  const { openstackUsername, openstackApiKey, openstackAuthUrl } = config;
  if (missing.length > 0 || !openstackUsername || !openstackApiKey || !openstackAuthUrl) {
    throw new ConfigurationInvalidError(
      `Missing required OpenStack settings: ${missing.join(", ")}`,
      [...missing],
      ["openstackUsername, openstackApiKey and openstackAuthUrl must all be set"]
    );
  }

  const settings: ConnectionSettings = {
    provider: "OpenStack",
    openstackUsername,
    openstackApiKey,
    openstackAuthUrl,
    disableSslValidation: config.disableSslValidation,
  };
  for (const key of OPTIONAL_SERVER_SETTINGS) {
    const value = config[key];
    if (value) {
      settings[key] = value;
    }
  }
  return settings;
}
