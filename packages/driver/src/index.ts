// Interfaces
export * from "./interface/provider-client";
export * from "./interface/instance-state";
export * from "./interface/environment-probe";

// Configuration & errors
export * from "./config/instance-config";
export * from "./errors/driver-errors";
export * from "./constants";

// Core
export { resolveReference, resolveNetworkRefs, parseRegexReference } from "./resolve/reference-resolver";
export { generateServerName, randomSuffix, sanitizeNameComponent } from "./naming/name-generator";
export type { SuffixGenerator } from "./naming/name-generator";
export { parseAddresses, matchesFamily } from "./network/address-parser";
export { selectAddress } from "./network/ip-selector";
export type { IpSelectionOptions } from "./network/ip-selector";
export { FloatingIpAllocator, isFreeInPool } from "./network/floating-ip-allocator";
export { buildKeySetupCommands, buildHintCommands } from "./bootstrap/bootstrap-script-builder";
export { InstanceLifecycle } from "./lifecycle/instance-lifecycle";
export type { InstanceLifecycleDeps, CreateResult } from "./lifecycle/instance-lifecycle";
export { BaseDriver } from "./base/base-driver";
export type { LogCallback, LogStream } from "./base/base-driver";

// Provider binding
export { OpenStackClient, createOpenStackClient } from "./openstack/openstack-client";
export type { OpenStackClientOptions } from "./openstack/openstack-client";
export { OpenStackServer } from "./openstack/openstack-server";
export { TcpShellProbe } from "./ssh/shell-probe";
export type { ShellProbe, TcpShellProbeOptions } from "./ssh/shell-probe";
export { openSshSession } from "./ssh/ssh-session";

// Factory
export { createOpenStackDriver } from "./driver";
export type { OpenStackDriverOptions } from "./driver";
