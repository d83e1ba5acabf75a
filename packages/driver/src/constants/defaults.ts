/**
 * Default values for instance configuration and bootstrap.
 */

// SSH defaults
export const DEFAULT_SSH_USERNAME = "root";
export const DEFAULT_SSH_PORT = 22;

/** Key files probed in order of preference under ~/.ssh */
export const DEFAULT_SSH_KEY_NAMES = ["id_rsa", "id_dsa"] as const;

// Naming
export const MAX_SERVER_NAME_LENGTH = 63;
export const NAME_SUFFIX_LENGTH = 7;
export const NO_LOGIN_PLACEHOLDER = "nologin";

// Bootstrap hints
export const DEFAULT_HINTS_PATH = "/etc/chef/ohai/hints";
export const PLATFORM_HINT_NAME = "openstack";

// Nova personality target for injected public keys
export const AUTHORIZED_KEYS_PATH = "/root/.ssh/authorized_keys";
