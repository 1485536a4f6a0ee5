/**
 * Toolkit configuration schemas (TypeBox), defaults and the deploy config loader.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { DEFAULT_AZURE_CLOUD, type AzureCloudName } from "./cloud.js";
import { ConfigurationError } from "./errors.js";
import type { AzureRetryOptions } from "./types.js";

const credentialMethodSchema = Type.Union([
  Type.Literal("default"),
  Type.Literal("cli"),
  Type.Literal("service-principal"),
  Type.Literal("managed-identity"),
  Type.Literal("device-code"),
  Type.Literal("browser"),
]);

const cloudSchema = Type.Union([Type.Literal("AzureCloud"), Type.Literal("AzureChinaCloud"), Type.Literal("AzureUSGovernment")]);

const proxySchema = Type.Object({
  host: Type.String({ minLength: 1 }),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
});

export const configSchema = Type.Object({
  defaultSubscription: Type.Optional(Type.String({ description: "Default Azure subscription ID" })),
  defaultTenantId: Type.Optional(Type.String({ description: "Default Azure AD tenant ID" })),
  credentialMethod: Type.Optional(credentialMethodSchema),
  cloud: Type.Optional(cloudSchema),
  proxy: Type.Optional(proxySchema),
  retryConfig: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Number({ minimum: 1 })),
      minDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
      maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
    })
  ),
  telemetry: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
    })
  ),
});

export type ToolkitConfig = Static<typeof configSchema>;

/** Toolkit settings after defaults. */
export type ResolvedToolkitConfig = ToolkitConfig & {
  cloud: AzureCloudName;
  retryConfig: AzureRetryOptions;
  telemetryEnabled: boolean;
};

export function getDefaultConfig(): ToolkitConfig {
  return {
    credentialMethod: "default",
    cloud: DEFAULT_AZURE_CLOUD,
    retryConfig: { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30000 },
    telemetry: { enabled: true },
  };
}

function schemaIssues(errors: Iterable<{ path: string; message: string }>): string[] {
  const issues: string[] = [];
  for (const error of errors) {
    issues.push(`${error.path || "(root)"}: ${error.message}`);
  }
  return issues;
}

/**
 * Validate toolkit settings and lay them over the defaults. Nested objects
 * are merged one level deep.
 * @throws ConfigurationError listing every schema violation
 */
export function resolveToolkitConfig(raw: unknown = {}): ResolvedToolkitConfig {
  if (!Check(configSchema, raw)) {
    throw new ConfigurationError("Invalid toolkit settings", schemaIssues(Errors(configSchema, raw)));
  }
  const defaults = getDefaultConfig();
  const telemetry = { ...defaults.telemetry, ...raw.telemetry };
  return {
    ...defaults,
    ...raw,
    cloud: raw.cloud ?? DEFAULT_AZURE_CLOUD,
    retryConfig: { ...defaults.retryConfig, ...raw.retryConfig },
    telemetry,
    telemetryEnabled: telemetry.enabled ?? true,
  };
}

/** Read toolkit settings from a JSON file. */
export async function loadToolkitConfig(path: string): Promise<ResolvedToolkitConfig> {
  return resolveToolkitConfig(await readJsonFile(path, "Toolkit settings"));
}

// =============================================================================
// Deploy configuration
// =============================================================================

export const deployConfigSchema = Type.Object({
  subscriptionId: Type.Optional(Type.String({ minLength: 1 })),
  tenantId: Type.Optional(Type.String({ minLength: 1 })),
  authMethod: Type.Optional(credentialMethodSchema),
  cloud: Type.Optional(cloudSchema),
  proxy: Type.Optional(proxySchema),
  resourceGroup: Type.String({ minLength: 1 }),
  clusterName: Type.String({ minLength: 1 }),
  appName: Type.String({ minLength: 1, maxLength: 32 }),
  deploymentName: Type.Optional(Type.String({ minLength: 1 })),
  isPublic: Type.Optional(Type.Boolean()),
  httpsOnly: Type.Optional(Type.Boolean()),
  runtimeVersion: Type.Optional(Type.String()),
  jvmOptions: Type.Optional(Type.String()),
  environment: Type.Optional(Type.Record(Type.String(), Type.String())),
  cpu: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  memoryInGB: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  instanceCount: Type.Optional(Type.Integer({ minimum: 1 })),
  /** Relative path of an artifact already uploaded to the service's storage. */
  artifactPath: Type.Optional(Type.String({ minLength: 1 })),
  waitUntilReady: Type.Optional(Type.Boolean()),
  timeoutSeconds: Type.Optional(Type.Integer({ minimum: 1 })),
});

export type DeployConfig = Static<typeof deployConfigSchema>;

/** Deploy configuration after environment fallbacks and defaults. */
export type ResolvedDeployConfig = DeployConfig & {
  subscriptionId: string;
  deploymentName: string;
  waitUntilReady: boolean;
  timeoutSeconds: number;
};

export const DEFAULT_DEPLOYMENT_NAME = "default";
export const DEFAULT_DEPLOY_TIMEOUT_SECONDS = 600;

/** Azure settings read from the process environment. */
export type AzureEnvironment = {
  subscriptionId?: string;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
};

export function readAzureEnvironment(env: NodeJS.ProcessEnv = process.env): AzureEnvironment {
  return {
    subscriptionId: env.AZURE_SUBSCRIPTION_ID || undefined,
    tenantId: env.AZURE_TENANT_ID || undefined,
    clientId: env.AZURE_CLIENT_ID || undefined,
    clientSecret: env.AZURE_CLIENT_SECRET || undefined,
  };
}

/**
 * Validate a parsed deploy configuration and fill in defaults.
 * @throws ConfigurationError listing every schema violation
 */
export function resolveDeployConfig(raw: unknown, env: AzureEnvironment = readAzureEnvironment()): ResolvedDeployConfig {
  if (!Check(deployConfigSchema, raw)) {
    throw new ConfigurationError("Invalid deploy configuration", schemaIssues(Errors(deployConfigSchema, raw)));
  }

  const subscriptionId = raw.subscriptionId ?? env.subscriptionId;
  if (!subscriptionId) {
    throw new ConfigurationError("Invalid deploy configuration", [
      "/subscriptionId: required (or set AZURE_SUBSCRIPTION_ID)",
    ]);
  }

  return {
    ...raw,
    subscriptionId,
    tenantId: raw.tenantId ?? env.tenantId,
    deploymentName: raw.deploymentName ?? DEFAULT_DEPLOYMENT_NAME,
    waitUntilReady: raw.waitUntilReady ?? true,
    timeoutSeconds: raw.timeoutSeconds ?? DEFAULT_DEPLOY_TIMEOUT_SECONDS,
  };
}

/** Read and parse a JSON file; a parse failure is a configuration error. */
export async function readJsonFile(path: string, what = "Deploy configuration"): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`${what} ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

/** Read a JSON deploy configuration from disk. */
export async function loadDeployConfig(path: string, env?: AzureEnvironment): Promise<ResolvedDeployConfig> {
  return resolveDeployConfig(await readJsonFile(path), env);
}
