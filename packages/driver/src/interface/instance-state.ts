/**
 * Instance State persistence.
 *
 * `serverId` is present iff a create succeeded and destroy has not completed.
 */

export interface InstanceState {
  serverId?: string;
  hostname?: string;
}

export interface InstanceStateStore {
  load(): Promise<InstanceState>;
  save(state: InstanceState): Promise<void>;
}

/**
 * Keeps state in memory. Useful for embedding and tests.
 */
export class MemoryStateStore implements InstanceStateStore {
  private state: InstanceState;

  constructor(initial: InstanceState = {}) {
    this.state = { ...initial };
  }

  async load(): Promise<InstanceState> {
    return { ...this.state };
  }

  async save(state: InstanceState): Promise<void> {
    this.state = { ...state };
  }

  /** Synchronous view of the last saved state. */
  snapshot(): InstanceState {
    return { ...this.state };
  }
}
