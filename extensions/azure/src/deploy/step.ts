/**
 * Spring Cloud deploy step.
 *
 * `execute()` runs `init` -> `doExecute` -> `handleSuccess`, or
 * `handleException` when any phase throws. Every run reports exactly one
 * `deploy.start` and one of `deploy.success` / `deploy.failure`.
 */

import { getAzureCloud, DEFAULT_AZURE_CLOUD, type AzureCloudName, type HttpProxy } from "../cloud.js";
import { resolveDeployConfig, readAzureEnvironment, type AzureEnvironment, type ResolvedDeployConfig } from "../config.js";
import { createCredentialsManager, type AzureCredentialsManager } from "../credentials/index.js";
import { isUserError, UsageError } from "../errors.js";
import { createSpringCloudManager, type AzureSpringCloudManager } from "../springcloud/manager.js";
import type { SpringCloudFacadeOptions } from "../springcloud/deployment.js";
import type { SpringCloudAppState, SpringCloudDeploymentState } from "../springcloud/types.js";
import { createNoopTelemetry, type TelemetryClient, type TelemetryProperties } from "../telemetry.js";
import { createConsoleLogger, type AzureCredentialMethod, type AzureRetryOptions, type ToolkitLogger } from "../types.js";

export const DEPLOY_OPERATION = "springcloud.deploy";
export const TOOLKIT_NAME = "azure-resource-toolkit";
export const TOOLKIT_VERSION = "0.1.0";

export const ERROR_CODE_SUCCESS = "0";
export const ERROR_CODE_FAILURE = "1";

export type DeployCredentials = Pick<AzureCredentialsManager, "verify">;
export type DeployTarget = Pick<AzureSpringCloudManager, "app" | "deployment">;

export type DeployConnection = {
  credentials: DeployCredentials;
  manager: DeployTarget;
};

export type DeployStepOptions = {
  /** Parsed, not yet validated, deploy configuration. */
  config: unknown;
  env?: AzureEnvironment;
  logger?: ToolkitLogger;
  telemetry?: TelemetryClient;
  pluginName?: string;
  pluginVersion?: string;
  /** Used when the configuration names no `authMethod`. */
  authMethod?: AzureCredentialMethod;
  /** Used when the configuration names no `cloud`. */
  cloud?: AzureCloudName;
  /** Used when the configuration names no `proxy`. */
  proxy?: HttpProxy;
  retry?: AzureRetryOptions;
  /** Overrides `waitUntilReady` from the configuration. */
  wait?: boolean;
  /** Overrides `timeoutSeconds` from the configuration. */
  timeoutSeconds?: number;
  facadeOptions?: SpringCloudFacadeOptions;
  /** Builds the credential and manager for a resolved configuration. */
  connect?: (config: ResolvedDeployConfig) => DeployConnection;
  now?: () => number;
};

export type DeployResult = {
  app: Readonly<SpringCloudAppState>;
  deployment: Readonly<SpringCloudDeploymentState>;
  /** Whether the deployment settled as running; `undefined` when not waited for. */
  ready?: boolean;
  durationMs: number;
};

export class DeployStep {
  private readonly logger: ToolkitLogger;
  private readonly telemetry: TelemetryClient;
  private readonly now: () => number;
  private readonly telemetries: TelemetryProperties = {};
  private timeStart = 0;
  private config: ResolvedDeployConfig | undefined;
  private connection: DeployConnection | undefined;

  constructor(private readonly options: DeployStepOptions) {
    this.logger = options.logger ?? createConsoleLogger();
    this.telemetry = options.telemetry ?? createNoopTelemetry();
    this.now = options.now ?? Date.now;
  }

  /** Properties reported with the last telemetry event. */
  get telemetryProperties(): Readonly<TelemetryProperties> {
    return { ...this.telemetries };
  }

  async execute(): Promise<DeployResult> {
    try {
      await this.init();
      const result = await this.doExecute();
      this.handleSuccess();
      return { ...result, durationMs: this.now() - this.timeStart };
    } catch (error) {
      this.handleException(error);
      throw error;
    }
  }

  protected async init(): Promise<void> {
    this.timeStart = this.now();
    this.telemetries.pluginName = this.options.pluginName ?? TOOLKIT_NAME;
    this.telemetries.pluginVersion = this.options.pluginVersion ?? TOOLKIT_VERSION;
    this.track("deploy.start");

    const resolved = resolveDeployConfig(this.options.config, this.options.env ?? readAzureEnvironment());
    const config: ResolvedDeployConfig = {
      ...resolved,
      authMethod: resolved.authMethod ?? this.options.authMethod,
      cloud: resolved.cloud ?? this.options.cloud,
      proxy: resolved.proxy ?? this.options.proxy,
    };
    this.config = config;
    this.traceConfiguration(config);

    const connection = (this.options.connect ?? ((c: ResolvedDeployConfig) => this.connect(c)))(config);
    await connection.credentials.verify(config.authMethod);
    const cloud = getAzureCloud(config.cloud);
    if (cloud.name !== DEFAULT_AZURE_CLOUD) {
      this.logger.info(`Using Azure environment: ${cloud.name}.`);
    }
    this.logger.info(`Auth method: ${config.authMethod ?? "default"}`);
    this.logger.info(`Subscription: ${config.subscriptionId}`);
    this.connection = connection;
  }

  protected async doExecute(): Promise<Omit<DeployResult, "durationMs">> {
    const { config, connection } = this;
    if (!config || !connection) throw new UsageError("Deploy step was not initialised");
    const { resourceGroup, clusterName, appName, deploymentName } = config;

    const app = connection.manager.app(resourceGroup, clusterName, appName);
    await app.refresh();
    const appState = await app.reconcile().configPublic(config.isPublic).configHttpsOnly(config.httpsOnly).commit();

    const deployment = connection.manager.deployment(resourceGroup, clusterName, appName, deploymentName);
    await deployment.refresh();
    const artifactPath = config.artifactPath;
    const deploymentState = await deployment
      .reconcile()
      .configEnvironmentVariables(config.environment)
      .configJvmOptions(config.jvmOptions)
      .configRuntimeVersion(config.runtimeVersion)
      .configArtifact(artifactPath ? { remotePath: () => artifactPath } : undefined)
      .configScaleSettings({ cpu: config.cpu, memoryInGB: config.memoryInGB, capacity: config.instanceCount })
      .commit();

    const wait = this.options.wait ?? config.waitUntilReady;
    if (!wait) {
      return { app: appState, deployment: deploymentState };
    }

    const ready = await deployment.waitUntilReady(this.options.timeoutSeconds ?? config.timeoutSeconds);
    const latest = deployment.entity() ?? deploymentState;
    if (ready) {
      this.logger.info(`Deployment(${deploymentName}) is running.`);
    } else {
      this.logger.warn(`Deployment(${deploymentName}) settled as ${latest.status ?? latest.provisioningState ?? "unknown"}.`);
    }
    if (appState.isPublic && appState.url) {
      this.logger.info(`Application url: ${appState.url}`);
    }
    return { app: appState, deployment: latest, ready };
  }

  protected handleSuccess(): void {
    this.telemetries.errorCode = ERROR_CODE_SUCCESS;
    this.telemetries.duration = String(this.now() - this.timeStart);
    this.track("deploy.success");
  }

  protected handleException(error: unknown): void {
    this.telemetries.errorCode = ERROR_CODE_FAILURE;
    this.telemetries.errorType = isUserError(error) ? "user" : "system";
    this.telemetries.errorMessage = error instanceof Error ? error.message : String(error);
    this.telemetries.duration = String(this.now() - this.timeStart);
    this.track("deploy.failure");
  }

  private traceConfiguration(config: ResolvedDeployConfig): void {
    this.telemetries.subscriptionId = config.subscriptionId;
    this.telemetries.authMethod = config.authMethod ?? "default";
    this.telemetries.public = String(config.isPublic ?? false);
    if (config.runtimeVersion) this.telemetries.runtimeVersion = config.runtimeVersion;
    if (config.cpu !== undefined) this.telemetries.cpu = String(config.cpu);
    if (config.memoryInGB !== undefined) this.telemetries.memory = String(config.memoryInGB);
    if (config.instanceCount !== undefined) this.telemetries.instanceCount = String(config.instanceCount);
    this.telemetries.jvmOptions = String(Boolean(config.jvmOptions));
  }

  private connect(config: ResolvedDeployConfig): DeployConnection {
    const env = this.options.env ?? readAzureEnvironment();
    const credentials = createCredentialsManager({
      defaultSubscription: config.subscriptionId,
      defaultTenantId: config.tenantId,
      credentialMethod: config.authMethod,
      clientId: env.clientId,
      clientSecret: env.clientSecret,
      cloud: config.cloud,
      proxy: config.proxy,
      logger: this.logger,
    });
    const manager = createSpringCloudManager(credentials, config.subscriptionId, this.options.retry, {
      logger: this.logger,
      telemetry: this.telemetry,
      ...this.options.facadeOptions,
    });
    return { credentials, manager };
  }

  private track(type: "deploy.start" | "deploy.success" | "deploy.failure"): void {
    const duration = this.telemetries.duration;
    this.telemetry.track({
      type,
      operation: DEPLOY_OPERATION,
      durationMs: duration === undefined ? undefined : Number(duration),
      properties: { ...this.telemetries },
    });
  }
}

export function createDeployStep(options: DeployStepOptions): DeployStep {
  return new DeployStep(options);
}
