/**
 * Azure Resource Toolkit — Credentials Manager
 *
 * Resolves a TokenCredential from @azure/identity for the configured method
 * and checks that it can actually reach the management plane.
 */

import type { AccessToken, TokenCredential } from "@azure/identity";
import { getAzureCloud, toProxySettings, type ArmClientOptions, type AzureCloud, type AzureCloudName, type HttpProxy } from "../cloud.js";
import { ConfigurationError, RemoteUnavailableError } from "../errors.js";
import { silentLogger, type AzureCredentialMethod, type ToolkitLogger } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  defaultSubscription?: string;
  defaultTenantId?: string;
  credentialMethod?: AzureCredentialMethod;
  /** Client id for service principals and user-assigned managed identities. */
  clientId?: string;
  clientSecret?: string;
  /** Sovereign cloud to authenticate against. Default: `AzureCloud`. */
  cloud?: AzureCloudName;
  /** HTTP proxy for token requests and management calls. */
  proxy?: HttpProxy;
  /** Credential lifetime in the cache. Default: one hour. */
  cacheTtlMs?: number;
  logger?: ToolkitLogger;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

/** @azure/identity errors that mean "this credential cannot log in here". */
const LOGIN_FAILURE_ERRORS = new Set([
  "CredentialUnavailableError",
  "AuthenticationRequiredError",
  "AggregateAuthenticationError",
]);

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<string, { credential: TokenCredential; expiresAt: number }>();

  constructor(private readonly ttlMs: number) {}

  get(key: string): TokenCredential | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.credential;
  }

  set(key: string, credential: TokenCredential): void {
    this.cache.set(key, { credential, expiresAt: Date.now() + this.ttlMs });
  }

}

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private options: CredentialsManagerOptions;
  private cache: CredentialCache;
  private logger: ToolkitLogger;
  private cloud: AzureCloud;

  constructor(options: CredentialsManagerOptions = {}) {
    this.options = {
      ...options,
      credentialMethod: options.credentialMethod ?? "default",
      defaultSubscription: options.defaultSubscription ?? (process.env.AZURE_SUBSCRIPTION_ID || undefined),
      defaultTenantId: options.defaultTenantId ?? (process.env.AZURE_TENANT_ID || undefined),
      clientId: options.clientId ?? (process.env.AZURE_CLIENT_ID || undefined),
      clientSecret: options.clientSecret ?? (process.env.AZURE_CLIENT_SECRET || undefined),
    };
    this.cache = new CredentialCache(options.cacheTtlMs ?? 3_600_000);
    this.logger = options.logger ?? silentLogger;
    this.cloud = getAzureCloud(options.cloud);
  }

  /**
   * Get an Azure TokenCredential, using the configured method.
   */
  async getCredential(method?: AzureCredentialMethod): Promise<CredentialResolutionResult> {
    const resolvedMethod = method ?? this.options.credentialMethod ?? "default";
    const cacheKey = `${resolvedMethod}:${this.options.defaultTenantId ?? ""}`;

    let credential = this.cache.get(cacheKey);
    if (!credential) {
      credential = await this.createCredential(resolvedMethod);
      this.cache.set(cacheKey, credential);
    }

    return {
      credential,
      method: resolvedMethod,
      subscriptionId: this.options.defaultSubscription,
      tenantId: this.options.defaultTenantId,
    };
  }

  /**
   * Request a management-plane token for the configured cloud to prove the
   * credential works.
   * @throws RemoteUnavailableError when the credential cannot log in
   */
  async verify(method?: AzureCredentialMethod): Promise<AccessToken> {
    const { credential, method: resolved } = await this.getCredential(method);
    let token: AccessToken | null;
    try {
      token = await credential.getToken(this.cloud.managementScope);
    } catch (error) {
      if (error instanceof Error && LOGIN_FAILURE_ERRORS.has(error.name)) {
        throw new RemoteUnavailableError(`Failed to log in with the ${resolved} credential: ${error.message}`, error);
      }
      throw error;
    }
    if (!token) {
      throw new RemoteUnavailableError(`The ${resolved} credential returned no token for ${this.cloud.managementScope}`);
    }
    this.logger.debug?.(`Authenticated with the ${resolved} credential`);
    return token;
  }

  getSubscriptionId(): string | undefined {
    return this.options.defaultSubscription;
  }

  getCloud(): AzureCloud {
    return this.cloud;
  }

  /** Endpoint, token scope and proxy for management clients built on this credential. */
  clientOptions(): ArmClientOptions {
    return {
      endpoint: this.cloud.resourceManagerEndpoint,
      credentialScopes: [this.cloud.managementScope],
      proxyOptions: toProxySettings(this.options.proxy),
    };
  }

  /**
   * Create a credential using the specified method.
   * Dynamic import of @azure/identity so it is only loaded when first needed.
   */
  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");
    const { defaultTenantId: tenantId, clientId, clientSecret } = this.options;
    const common = { authorityHost: this.cloud.authorityHost, proxyOptions: toProxySettings(this.options.proxy) };

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential(tenantId ? { ...common, tenantId } : common);

      case "service-principal": {
        if (!tenantId || !clientId || !clientSecret) {
          throw new ConfigurationError("Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET");
        }
        return new identity.ClientSecretCredential(tenantId, clientId, clientSecret, common);
      }

      case "managed-identity":
        return new identity.ManagedIdentityCredential(clientId ? { ...common, clientId } : common);

      case "device-code":
        return new identity.DeviceCodeCredential({
          ...common,
          tenantId,
          clientId,
          userPromptCallback: (info) => this.logger.info(info.message),
        });

      case "browser":
        return new identity.InteractiveBrowserCredential({ ...common, tenantId, clientId });

      case "default":
        return new identity.DefaultAzureCredential(common);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}
