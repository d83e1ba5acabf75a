/**
 * Timeout constants for lifecycle operations.
 */

/** Maximum time to wait for sshd to answer on the instance (10 minutes) */
export const SSH_READY_TIMEOUT_MS = 600_000;

/** Polling interval for the SSH banner probe */
export const SSH_POLL_INTERVAL_MS = 2_000;

/** Timeout for a single TCP connect attempt */
export const SSH_CONNECT_TIMEOUT_MS = 5_000;

/** Maximum time to wait for a server to reach ACTIVE (10 minutes) */
export const SERVER_READY_TIMEOUT_MS = 600_000;

/** Polling interval while waiting on server status */
export const SERVER_POLL_INTERVAL_MS = 5_000;
