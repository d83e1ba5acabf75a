import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import type { InstanceState, InstanceStateStore } from "@openstack-lifecycle/driver";

const InstanceStateSchema = z.object({
  serverId: z.string().optional(),
  hostname: z.string().optional(),
});

/**
 * Instance State kept in a JSON file. A missing file is an empty state.
 */
export class FileStateStore implements InstanceStateStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<InstanceState> {
    if (!(await fs.pathExists(this.filePath))) {
      return {};
    }

    const raw: unknown = await fs.readJson(this.filePath);
    const parsed = InstanceStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid state file ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async save(state: InstanceState): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeJson(this.filePath, state, { spaces: 2 });
  }
}
