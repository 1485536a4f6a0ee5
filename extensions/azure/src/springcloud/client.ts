/**
 * Azure Spring Cloud remote clients.
 *
 * The only code in the module that speaks the App Platform wire format.
 * Reads go through `getOrNull` (retried, 404 -> null); writes are issued once.
 */

import type { AppResource, DeploymentResource } from "@azure/arm-appplatform";
import { getOrNull } from "../retry.js";
import type { Patch, RemoteResourceClient, WriteMode } from "../reconcile/types.js";
import { extractResourceGroup, type AzureRetryOptions } from "../types.js";
import { formatCpu, formatMemory, parseCpu, parseMemory } from "./convert.js";
import type {
  AppOperations,
  DeploymentOperations,
  SpringCloudAppPatch,
  SpringCloudAppRef,
  SpringCloudAppState,
  SpringCloudDeploymentPatch,
  SpringCloudDeploymentRef,
  SpringCloudDeploymentState,
  SpringCloudService,
  UploadLocation,
} from "./types.js";

/** Relative path the service accepts for a deployment created without an artifact. */
export const DEFAULT_RELATIVE_PATH = "<default>";

// =============================================================================
// Collaborator interfaces
// =============================================================================

export interface SpringCloudDeploymentClient
  extends RemoteResourceClient<SpringCloudDeploymentState, Patch<SpringCloudDeploymentPatch>> {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface SpringCloudAppClient extends RemoteResourceClient<SpringCloudAppState, Patch<SpringCloudAppPatch>> {
  getUploadLocation(): Promise<UploadLocation>;
}

// =============================================================================
// Deployments
// =============================================================================

export class ArmSpringCloudDeploymentClient implements SpringCloudDeploymentClient {
  constructor(
    private readonly operations: () => Promise<DeploymentOperations>,
    private readonly ref: SpringCloudDeploymentRef,
    private readonly retryOptions: AzureRetryOptions = {},
  ) {}

  async get(): Promise<SpringCloudDeploymentState | null> {
    const { resourceGroup, serviceName, appName, deploymentName } = this.ref;
    const ops = await this.operations();
    const resource = await getOrNull(
      () => ops.get(resourceGroup, serviceName, appName, deploymentName),
      this.retryOptions,
    );
    return resource ? mapDeployment(resource) : null;
  }

  async createOrUpdate(patch: Patch<SpringCloudDeploymentPatch>, mode: WriteMode): Promise<SpringCloudDeploymentState> {
    const { resourceGroup, serviceName, appName, deploymentName } = this.ref;
    const ops = await this.operations();
    const resource = toDeploymentResource(patch, mode);
    const written =
      mode === "create"
        ? await ops.beginCreateOrUpdateAndWait(resourceGroup, serviceName, appName, deploymentName, resource)
        : await ops.beginUpdateAndWait(resourceGroup, serviceName, appName, deploymentName, resource);
    return mapDeployment(written);
  }

  async delete(): Promise<void> {
    const { resourceGroup, serviceName, appName, deploymentName } = this.ref;
    const ops = await this.operations();
    await ops.beginDeleteAndWait(resourceGroup, serviceName, appName, deploymentName);
  }

  async start(): Promise<void> {
    const { resourceGroup, serviceName, appName, deploymentName } = this.ref;
    const ops = await this.operations();
    await ops.beginStartAndWait(resourceGroup, serviceName, appName, deploymentName);
  }

  async stop(): Promise<void> {
    const { resourceGroup, serviceName, appName, deploymentName } = this.ref;
    const ops = await this.operations();
    await ops.beginStopAndWait(resourceGroup, serviceName, appName, deploymentName);
  }
}

/**
 * Build the request body for a sparse patch. Only queued fields are sent; a
 * create always carries a source so the service accepts it.
 */
export function toDeploymentResource(patch: Patch<SpringCloudDeploymentPatch>, mode: WriteMode): DeploymentResource {
  const resource: DeploymentResource = {};
  const { scale } = patch;

  const hasSource = patch.relativePath !== undefined || patch.runtimeVersion !== undefined || patch.jvmOptions !== undefined;
  const hasRequests = scale?.cpu !== undefined || scale?.memoryInGB !== undefined;
  const hasSettings = hasRequests || patch.environmentVariables !== undefined;

  if (mode === "create" || hasSource || hasSettings) {
    resource.properties = {};
  }
  if (resource.properties && (mode === "create" || hasSource)) {
    resource.properties.source = {
      type: "Jar",
      relativePath: patch.relativePath ?? (mode === "create" ? DEFAULT_RELATIVE_PATH : undefined),
      runtimeVersion: patch.runtimeVersion,
      jvmOptions: patch.jvmOptions,
    };
  }
  if (resource.properties && hasSettings) {
    resource.properties.deploymentSettings = {
      resourceRequests: hasRequests
        ? {
            cpu: scale?.cpu !== undefined ? formatCpu(scale.cpu) : undefined,
            memory: scale?.memoryInGB !== undefined ? formatMemory(scale.memoryInGB) : undefined,
          }
        : undefined,
      environmentVariables: patch.environmentVariables,
    };
  }
  if (scale?.capacity !== undefined) {
    resource.sku = { capacity: scale.capacity };
  }
  return resource;
}

// =============================================================================
// Apps
// =============================================================================

export class ArmSpringCloudAppClient implements SpringCloudAppClient {
  constructor(
    private readonly operations: () => Promise<AppOperations>,
    private readonly ref: SpringCloudAppRef,
    private readonly retryOptions: AzureRetryOptions = {},
  ) {}

  async get(): Promise<SpringCloudAppState | null> {
    const { resourceGroup, serviceName, appName } = this.ref;
    const ops = await this.operations();
    const resource = await getOrNull(() => ops.get(resourceGroup, serviceName, appName), this.retryOptions);
    return resource ? mapApp(resource) : null;
  }

  async createOrUpdate(patch: Patch<SpringCloudAppPatch>, mode: WriteMode): Promise<SpringCloudAppState> {
    const { resourceGroup, serviceName, appName } = this.ref;
    const ops = await this.operations();
    const resource: AppResource = {
      properties: { public: patch.isPublic, httpsOnly: patch.httpsOnly },
    };
    const written =
      mode === "create"
        ? await ops.beginCreateOrUpdateAndWait(resourceGroup, serviceName, appName, resource)
        : await ops.beginUpdateAndWait(resourceGroup, serviceName, appName, resource);
    return mapApp(written);
  }

  async delete(): Promise<void> {
    const { resourceGroup, serviceName, appName } = this.ref;
    const ops = await this.operations();
    await ops.beginDeleteAndWait(resourceGroup, serviceName, appName);
  }

  async getUploadLocation(): Promise<UploadLocation> {
    const { resourceGroup, serviceName, appName } = this.ref;
    const ops = await this.operations();
    const definition = await ops.getResourceUploadUrl(resourceGroup, serviceName, appName);
    if (!definition.uploadUrl || !definition.relativePath) {
      throw new Error(`No upload location was returned for app(${appName})`);
    }
    return { uploadUrl: definition.uploadUrl, relativePath: definition.relativePath };
  }
}

// =============================================================================
// Mapping helpers
// =============================================================================

export function mapService(s: unknown): SpringCloudService {
  const typed = s as {
    id?: string; name?: string; location?: string;
    properties?: { provisioningState?: string; fqdn?: string; powerState?: string };
    sku?: { name?: string; tier?: string };
    tags?: Record<string, string>;
  };
  return {
    id: typed.id ?? "",
    name: typed.name ?? "",
    resourceGroup: extractResourceGroup(typed.id),
    location: typed.location ?? "",
    provisioningState: typed.properties?.provisioningState,
    skuName: typed.sku?.name,
    skuTier: typed.sku?.tier,
    fqdn: typed.properties?.fqdn,
    powerState: typed.properties?.powerState,
    tags: typed.tags ?? {},
  };
}

export function mapApp(app: unknown): SpringCloudAppState {
  const typed = app as {
    id?: string; name?: string;
    properties?: {
      provisioningState?: string;
      activeDeploymentName?: string;
      url?: string;
      fqdn?: string;
      httpsOnly?: boolean;
      public?: boolean;
    };
  };
  return {
    id: typed.id ?? "",
    name: typed.name ?? "",
    resourceGroup: extractResourceGroup(typed.id),
    provisioningState: typed.properties?.provisioningState,
    activeDeploymentName: typed.properties?.activeDeploymentName,
    url: typed.properties?.url,
    fqdn: typed.properties?.fqdn,
    isPublic: typed.properties?.public,
    httpsOnly: typed.properties?.httpsOnly,
  };
}

export function mapDeployment(d: unknown): SpringCloudDeploymentState {
  const typed = d as {
    id?: string; name?: string;
    properties?: {
      provisioningState?: string;
      status?: string;
      active?: boolean;
      source?: { type?: string; relativePath?: string; runtimeVersion?: string; jvmOptions?: string };
      deploymentSettings?: {
        resourceRequests?: { cpu?: string; memory?: string };
        environmentVariables?: Record<string, string>;
      };
      instances?: Array<{ name?: string; status?: string; discoveryStatus?: string; startTime?: string }>;
    };
    sku?: { capacity?: number };
  };
  const source = typed.properties?.source;
  const settings = typed.properties?.deploymentSettings;
  return {
    id: typed.id ?? "",
    name: typed.name ?? "",
    provisioningState: typed.properties?.provisioningState,
    status: typed.properties?.status,
    active: typed.properties?.active,
    runtimeVersion: source?.runtimeVersion,
    jvmOptions: source?.jvmOptions,
    relativePath: source?.relativePath,
    environmentVariables: settings?.environmentVariables ?? {},
    cpu: parseCpu(settings?.resourceRequests?.cpu),
    memoryInGB: parseMemory(settings?.resourceRequests?.memory),
    capacity: typed.sku?.capacity,
    instances: (typed.properties?.instances ?? []).map((i) => ({
      name: i.name,
      status: i.status,
      discoveryStatus: i.discoveryStatus,
      startTime: i.startTime,
    })),
  };
}
