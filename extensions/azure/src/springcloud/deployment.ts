/**
 * Spring Cloud deployment facade and builder.
 */

import { NotFoundError } from "../errors.js";
import { diffRecord, diffText, diffUnit } from "../reconcile/differ.js";
import { RemoteEntity } from "../reconcile/entity.js";
import { ReconcilingBuilder, type ReconcilingBuilderOptions } from "../reconcile/builder.js";
import { pollUntil, DEFAULT_POLL_INTERVAL_MS } from "../reconcile/poller.js";
import type { Patch, WriteMode } from "../reconcile/types.js";
import type { TelemetryClient } from "../telemetry.js";
import { silentLogger, type ToolkitLogger } from "../types.js";
import type { SpringCloudDeploymentClient } from "./client.js";
import { normalizeRuntimeVersion } from "./convert.js";
import { classifyDeployment } from "./status.js";
import {
  SCALE_SETTING_KEYS,
  type RemotableArtifact,
  type ScaleSettings,
  type SpringCloudDeploymentPatch,
  type SpringCloudDeploymentRef,
  type SpringCloudDeploymentState,
} from "./types.js";

export type SpringCloudFacadeOptions = {
  logger?: ToolkitLogger;
  telemetry?: TelemetryClient;
  /** Poll interval for `waitUntilReady`. */
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

type DeploymentField = keyof SpringCloudDeploymentPatch;

const SETTINGS_FIELDS: readonly DeploymentField[] = ["runtimeVersion", "jvmOptions", "environmentVariables", "relativePath"];

// =============================================================================
// Facade
// =============================================================================

export class SpringCloudDeployment {
  private readonly cache: RemoteEntity<SpringCloudDeploymentState>;
  private readonly logger: ToolkitLogger;

  constructor(
    readonly ref: SpringCloudDeploymentRef,
    private readonly client: SpringCloudDeploymentClient,
    private readonly options: SpringCloudFacadeOptions = {},
  ) {
    this.cache = new RemoteEntity(() => client.get());
    this.logger = options.logger ?? silentLogger;
  }

  get name(): string {
    return this.ref.deploymentName;
  }

  private get label(): string {
    return `deployment(${this.name})`;
  }

  exists(): Promise<boolean> {
    return this.cache.exists();
  }

  async refresh(): Promise<Readonly<SpringCloudDeploymentState> | null> {
    await this.cache.refresh();
    return this.cache.current();
  }

  /** Last observed remote state, or `null` when absent or not yet read. */
  entity(): Readonly<SpringCloudDeploymentState> | null {
    return this.cache.current();
  }

  /** One builder for both creating and updating this deployment. */
  reconcile(): SpringCloudDeploymentBuilder {
    return new SpringCloudDeploymentBuilder(this.cache, this.client, {
      label: this.label,
      logger: this.options.logger,
      telemetry: this.options.telemetry,
    });
  }

  async scale(settings: Partial<ScaleSettings>): Promise<Readonly<SpringCloudDeploymentState>> {
    if (!(await this.exists())) throw new NotFoundError(this.label);
    return this.reconcile().configScaleSettings(settings).commit();
  }

  async start(): Promise<void> {
    this.logger.info(`Starting ${this.label}...`);
    await this.client.start();
  }

  async stop(): Promise<void> {
    this.logger.info(`Stopping ${this.label}...`);
    await this.client.stop();
  }

  async delete(): Promise<void> {
    this.logger.info(`Deleting ${this.label}...`);
    await this.client.delete();
    this.cache.markAbsent();
  }

  /**
   * Poll until the deployment settles.
   * @returns whether it settled as running with every instance discovered
   * @throws PollTimeoutError when it is still deploying after `timeoutSeconds`
   */
  async waitUntilReady(timeoutSeconds: number): Promise<boolean> {
    this.logger.info("Getting deployment status...");
    const state = await pollUntil(
      async () => {
        const snapshot = await this.cache.refresh();
        if (snapshot.kind !== "present") throw new NotFoundError(this.label);
        return snapshot.state;
      },
      (current) => classifyDeployment(current) !== "deploying",
      {
        timeoutMs: timeoutSeconds * 1000,
        intervalMs: this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
        sleep: this.options.sleep,
        now: this.options.now,
        onPoll: (current, attempt) =>
          this.logger.debug?.(`${this.label} poll #${attempt}: ${current.provisioningState ?? "?"}/${current.status ?? "?"}`),
      },
    );
    return classifyDeployment(state) === "running";
  }
}

// =============================================================================
// Builder
// =============================================================================

export class SpringCloudDeploymentBuilder extends ReconcilingBuilder<SpringCloudDeploymentState, SpringCloudDeploymentPatch> {
  protected readonly fields = ["scale", ...SETTINGS_FIELDS] as const;
  private artifact: RemotableArtifact | undefined;

  constructor(
    entity: RemoteEntity<SpringCloudDeploymentState>,
    private readonly deployments: SpringCloudDeploymentClient,
    options: Omit<ReconcilingBuilderOptions, "operation">,
  ) {
    super(entity, deployments, { ...options, operation: "springcloud.deployment" });
  }

  configEnvironmentVariables(env?: Record<string, string>): this {
    return this.queue("environmentVariables", (remote) => diffRecord(env, remote?.environmentVariables));
  }

  configJvmOptions(jvmOptions?: string): this {
    return this.queue("jvmOptions", (remote) => diffText(jvmOptions, remote?.jvmOptions));
  }

  configRuntimeVersion(version?: string): this {
    return this.queue("runtimeVersion", (remote) => diffText(normalizeRuntimeVersion(version), remote?.runtimeVersion));
  }

  /** The artifact's remote path is compared again at commit time. */
  configArtifact(artifact?: RemotableArtifact): this {
    if (artifact) this.artifact = artifact;
    return this.queueArtifact();
  }

  configScaleSettings(settings?: Partial<ScaleSettings>): this {
    return this.queue("scale", (remote) => diffUnit(settings, scaleOf(remote), SCALE_SETTING_KEYS));
  }

  protected override async resolveDeferred(): Promise<void> {
    this.queueArtifact();
  }

  /** The service rejects scaling combined with other changes, so updates scale first on their own. */
  protected override stages(_patch: Patch<SpringCloudDeploymentPatch>, mode: WriteMode): (readonly DeploymentField[])[] {
    return mode === "update" ? [["scale"], SETTINGS_FIELDS] : [this.fields];
  }

  protected override async afterCommit(state: Readonly<SpringCloudDeploymentState>): Promise<Readonly<SpringCloudDeploymentState>> {
    this.logger.info(`Starting deployment(${state.name})...`);
    await this.deployments.start();
    return state;
  }

  private queueArtifact(): this {
    return this.queue("relativePath", (remote) => diffText(this.artifact?.remotePath(), remote?.relativePath));
  }
}

function scaleOf(state: Readonly<SpringCloudDeploymentState> | null): ScaleSettings | null {
  if (!state || state.cpu === undefined || state.memoryInGB === undefined || state.capacity === undefined) return null;
  return { cpu: state.cpu, memoryInGB: state.memoryInGB, capacity: state.capacity };
}
