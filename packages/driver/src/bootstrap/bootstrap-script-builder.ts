/**
 * Command sequences run on a freshly booted instance.
 *
 * Both builders return plain command lists; running them is the caller's
 * job (see InstanceLifecycle.runSequence).
 */

import { DEFAULT_HINTS_PATH, PLATFORM_HINT_NAME } from "../constants";

/**
 * Install `publicKey` for the login user and lock its password, leaving
 * key-based auth as the only way in.
 */
export function buildKeySetupCommands(publicKey: string, username: string): string[] {
  return [
    "mkdir .ssh",
    `echo "${publicKey.trim()}" >> ~/.ssh/authorized_keys`,
    `passwd -l ${username}`,
  ];
}

/**
 * Drop an empty `openstack.json` hint so in-guest metadata tooling detects
 * the platform without probing the network.
 */
export function buildHintCommands(hintsPath: string = DEFAULT_HINTS_PATH): string[] {
  return [
    `sudo mkdir -p ${hintsPath}`,
    `sudo touch ${hintsPath}/${PLATFORM_HINT_NAME}.json`,
  ];
}
