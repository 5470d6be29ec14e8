import fs from "node:fs/promises";
import path from "node:path";
import { PolicyError } from "../policy/errors.js";

/**
 * Where found policies come from. The Fleet implementation downloads the
 * policy with `GET /api/fleet/agent_policies/<id>/download`; whatever the
 * source, the bytes are returned exactly as served.
 */
export interface PolicySource {
  downloadPolicy(policyId: string): Promise<Uint8Array>;
}

/** Policies previously saved as `<dir>/<policyId>.yml`. */
export class DirectoryPolicySource implements PolicySource {
  constructor(private readonly dir: string) {}

  async downloadPolicy(policyId: string): Promise<Uint8Array> {
    const file = path.join(this.dir, `${policyId}.yml`);
    try {
      return await fs.readFile(file);
    } catch (err) {
      throw new PolicyError(`failed to download policy "${policyId}" from ${file}`, { cause: err });
    }
  }
}
