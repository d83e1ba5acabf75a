import type { LogCallback } from "./base/base-driver";
import { resolveInstanceConfig } from "./config/instance-config";
import { type EnvironmentProbe, OsEnvironmentProbe } from "./interface/environment-probe";
import type { InstanceStateStore } from "./interface/instance-state";
import { InstanceLifecycle } from "./lifecycle/instance-lifecycle";
import { createOpenStackClient } from "./openstack/openstack-client";
import { TcpShellProbe } from "./ssh/shell-probe";

export interface OpenStackDriverOptions {
  stateStore: InstanceStateStore;
  logCallback?: LogCallback;
  environment?: EnvironmentProbe;
}

/**
 * Wire an InstanceLifecycle against the real OpenStack APIs, SSH and the
 * local machine.
 */
export function createOpenStackDriver(
  instanceName: string,
  rawConfig: unknown,
  options: OpenStackDriverOptions
): InstanceLifecycle {
  const environment = options.environment ?? new OsEnvironmentProbe();
  const config = resolveInstanceConfig(rawConfig, environment);
  const log = (message: string) => options.logCallback?.(message, "stdout");

  return new InstanceLifecycle(instanceName, config, {
    clientFactory: (settings) => createOpenStackClient(settings, { log }),
    stateStore: options.stateStore,
    shellProbe: new TcpShellProbe({}, log),
    environment,
    logCallback: options.logCallback,
  });
}
