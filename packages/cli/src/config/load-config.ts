import fs from "fs-extra";
import path from "path";
import { ConfigurationInvalidError } from "@openstack-lifecycle/driver";

export interface LoadedConfig {
  instanceName: string;
  rawConfig: unknown;
}

/** `web-1.json` → `web-1` */
export function instanceNameFromPath(configPath: string): string {
  return path.basename(configPath, path.extname(configPath));
}

/**
 * Read the JSON configuration file. Validation happens in the driver.
 */
export async function loadInstanceConfig(configPath: string, name?: string): Promise<LoadedConfig> {
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigurationInvalidError(
      `Configuration file not found: ${configPath}`,
      [],
      ["Pass the path of a JSON configuration file with -c"]
    );
  }

  const rawConfig: unknown = await fs.readJson(configPath);
  return {
    instanceName: name ?? instanceNameFromPath(configPath),
    rawConfig,
  };
}
