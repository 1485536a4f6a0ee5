/**
 * Deployment readiness.
 */

import type { PollResult } from "../reconcile/types.js";
import type { SpringCloudDeploymentState } from "./types.js";

const IN_PROGRESS_PROVISIONING = new Set(["creating", "updating", "starting", "stopping"]);
const UNSETTLED_INSTANCE_STATUSES = new Set(["waiting", "pending"]);

/**
 * A deployment is done when it has instances, none of them is still waiting
 * or pending, and every one has registered with discovery as `UP` (active
 * deployment) or `OUT_OF_SERVICE` (staging deployment).
 */
export function isDeploymentDone(state: SpringCloudDeploymentState | null | undefined): boolean {
  if (!state || state.instances.length === 0) return false;
  const expectedDiscovery = state.active ? "UP" : "OUT_OF_SERVICE";
  return state.instances.every(
    (instance) =>
      !UNSETTLED_INSTANCE_STATUSES.has((instance.status ?? "").toLowerCase()) &&
      (instance.discoveryStatus ?? "").toUpperCase() === expectedDiscovery,
  );
}

export function classifyDeployment(state: SpringCloudDeploymentState): PollResult {
  const provisioning = (state.provisioningState ?? "").toLowerCase();
  if (provisioning === "failed") return "failed";
  if (IN_PROGRESS_PROVISIONING.has(provisioning)) return "deploying";
  if ((state.status ?? "").toLowerCase() === "stopped") return "stopped";
  return isDeploymentDone(state) ? "running" : "deploying";
}
