import path from "node:path";

import type { GateSettings } from "../../../core/config.js";
import { ConfigError } from "../../../core/errors.js";
import { fail, ok, type Result } from "../types.js";

export type WorkspacePassName = "new" | "old";

export type WorkspacePass = {
  name: WorkspacePassName;
  branch: string;
  destinationRoot: string;
};

/**
 * Workspace passes for this run: always "new", plus "old" when upgrade testing is on.
 *
 * backward: the queue branch is upgraded to from an older one (old => queue branch).
 * forward: the queue branch is upgraded from, towards a newer one (queue branch => newer).
 */
export function planWorkspacePasses(
  settings: Pick<GateSettings, "config" | "queue">,
): Result<WorkspacePass[], ConfigError> {
  const { config, queue } = settings;
  const newRoot = path.join(config.base_dir, "new");
  const oldRoot = path.join(config.base_dir, "old");

  if (queue.branch.length === 0) {
    return fail(new ConfigError("The merge-queue branch is not set (ZUUL_BRANCH or --queue-branch)."));
  }

  if (config.upgrade.mode === "none") {
    return ok([{ name: "new", branch: queue.branch, destinationRoot: newRoot }]);
  }

  const table = config.upgrade.branches[config.upgrade.mode];
  const pair =
    table[queue.branch] ?? (config.upgrade.mode === "backward" ? table.default : undefined);
  if (!pair) {
    return fail(
      new ConfigError(
        `No ${config.upgrade.mode} upgrade branches configured for ${queue.branch} (upgrade.branches.${config.upgrade.mode}).`,
      ),
    );
  }

  return ok([
    { name: "new", branch: pair.new, destinationRoot: newRoot },
    { name: "old", branch: pair.old, destinationRoot: oldRoot },
  ]);
}
