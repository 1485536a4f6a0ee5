/**
 * Azure Resource Toolkit — Barrel Exports
 *
 * Re-exports all modules for convenient single-import access.
 */

// Core utilities
export type { AzureCredentialMethod, AzureRetryOptions, ToolkitLogger } from "./types.js";
export { createConsoleLogger, silentLogger, extractResourceGroup } from "./types.js";
export {
  withAzureRetry,
  getOrNull,
  shouldRetryAzureError,
  isNotFoundError,
  getStatusCode,
  getErrorCode,
  formatErrorMessage,
} from "./retry.js";
export {
  ConfigurationError,
  RemoteUnavailableError,
  NotFoundError,
  PollTimeoutError,
  UsageError,
  isUserError,
} from "./errors.js";
export {
  createNoopTelemetry,
  createTelemetryClient,
  ListenerTelemetryClient,
  type TelemetryClient,
  type TelemetryEvent,
  type TelemetryEventType,
  type TelemetryProperties,
  type RecordedTelemetryEvent,
} from "./telemetry.js";

// Clouds
export {
  AZURE_CLOUD_NAMES,
  DEFAULT_AZURE_CLOUD,
  getAzureCloud,
  parseHttpProxy,
  toProxySettings,
  type ArmClientOptions,
  type AzureCloud,
  type AzureCloudName,
  type HttpProxy,
  type ProxySettings,
} from "./cloud.js";

// Configuration
export {
  configSchema,
  deployConfigSchema,
  getDefaultConfig,
  loadDeployConfig,
  loadToolkitConfig,
  resolveToolkitConfig,
  readJsonFile,
  readAzureEnvironment,
  resolveDeployConfig,
  type AzureEnvironment,
  type DeployConfig,
  type ResolvedDeployConfig,
  type ResolvedToolkitConfig,
  type ToolkitConfig,
} from "./config.js";

// Credentials
export { AzureCredentialsManager, createCredentialsManager } from "./credentials/index.js";
export type { CredentialsManagerOptions, CredentialResolutionResult } from "./credentials/index.js";

// Reconciliation
export * from "./reconcile/index.js";

// Services
export * from "./springcloud/index.js";
export * from "./sql/index.js";

// Deploy step & CLI
export * from "./deploy/index.js";
export { buildProgram, runCli, CLI_NAME, type CliDependencies, type CliIO } from "./cli/index.js";
