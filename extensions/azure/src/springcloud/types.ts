/**
 * Azure Spring Cloud types.
 */

import type { AppPlatformManagementClient } from "@azure/arm-appplatform";

// =============================================================================
// Services
// =============================================================================

/** An Azure Spring Cloud service (cluster). */
export interface SpringCloudService {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  provisioningState?: string;
  skuName?: string;
  skuTier?: string;
  fqdn?: string;
  powerState?: string;
  tags: Record<string, string>;
}

// =============================================================================
// Apps
// =============================================================================

export interface SpringCloudAppRef {
  resourceGroup: string;
  serviceName: string;
  appName: string;
}

/** An app within a Spring Cloud service. */
export interface SpringCloudAppState {
  id: string;
  name: string;
  resourceGroup: string;
  provisioningState?: string;
  activeDeploymentName?: string;
  url?: string;
  fqdn?: string;
  isPublic?: boolean;
  httpsOnly?: boolean;
}

export type SpringCloudAppPatch = {
  isPublic: boolean;
  httpsOnly: boolean;
};

/** Where to upload an artifact before pointing a deployment at it. */
export interface UploadLocation {
  uploadUrl: string;
  relativePath: string;
}

// =============================================================================
// Deployments
// =============================================================================

export interface SpringCloudDeploymentRef extends SpringCloudAppRef {
  deploymentName: string;
}

/** CPU cores, memory in GB and instance count, written as one unit. */
export type ScaleSettings = {
  cpu: number;
  memoryInGB: number;
  capacity: number;
};

export const SCALE_SETTING_KEYS = ["cpu", "memoryInGB", "capacity"] as const;

/** An instance within a deployment. */
export interface SpringCloudDeploymentInstance {
  name?: string;
  status?: string;
  discoveryStatus?: string;
  startTime?: string;
}

/** A deployment within an app. */
export interface SpringCloudDeploymentState {
  id: string;
  name: string;
  provisioningState?: string;
  status?: string;
  active?: boolean;
  runtimeVersion?: string;
  jvmOptions?: string;
  relativePath?: string;
  environmentVariables: Record<string, string>;
  cpu?: number;
  memoryInGB?: number;
  capacity?: number;
  instances: SpringCloudDeploymentInstance[];
}

/** Fields a deployment builder may write. */
export type SpringCloudDeploymentPatch = {
  scale: Partial<ScaleSettings>;
  runtimeVersion: string;
  jvmOptions: string;
  environmentVariables: Record<string, string>;
  relativePath: string;
};

/** An artifact whose remote path may only be known once it has been uploaded. */
export interface RemotableArtifact {
  remotePath(): string | undefined;
}

// =============================================================================
// SDK surface
// =============================================================================

type Client = AppPlatformManagementClient;

export type ServiceOperations = Pick<Client["services"], "get" | "list" | "listBySubscription">;

export type AppOperations = Pick<
  Client["apps"],
  "get" | "list" | "beginCreateOrUpdateAndWait" | "beginUpdateAndWait" | "beginDeleteAndWait" | "getResourceUploadUrl"
>;

export type DeploymentOperations = Pick<
  Client["deployments"],
  | "get"
  | "list"
  | "beginCreateOrUpdateAndWait"
  | "beginUpdateAndWait"
  | "beginDeleteAndWait"
  | "beginStartAndWait"
  | "beginStopAndWait"
>;

/** The parts of `AppPlatformManagementClient` this module calls. */
export type AppPlatformApi = {
  services: ServiceOperations;
  apps: AppOperations;
  deployments: DeploymentOperations;
};
