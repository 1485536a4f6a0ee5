/**
 * Azure Spring Cloud manager.
 *
 * Lists services, apps and deployments and hands out facades that reconcile
 * a single app or deployment.
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { SpringCloudApp } from "./app.js";
import { ArmSpringCloudAppClient, ArmSpringCloudDeploymentClient, mapApp, mapDeployment, mapService } from "./client.js";
import { SpringCloudDeployment, type SpringCloudFacadeOptions } from "./deployment.js";
import type {
  AppPlatformApi,
  SpringCloudAppState,
  SpringCloudDeploymentState,
  SpringCloudService,
} from "./types.js";

export class AzureSpringCloudManager {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;
  private retryOptions: AzureRetryOptions;
  private facadeOptions: SpringCloudFacadeOptions;

  constructor(
    credentialsManager: AzureCredentialsManager,
    subscriptionId: string,
    retryOptions?: AzureRetryOptions,
    facadeOptions?: SpringCloudFacadeOptions,
  ) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions ?? {};
    this.facadeOptions = facadeOptions ?? {};
  }

  protected async getClient(): Promise<AppPlatformApi> {
    const { AppPlatformManagementClient } = await import("@azure/arm-appplatform");
    const { credential } = await this.credentialsManager.getCredential();
    return new AppPlatformManagementClient(credential, this.subscriptionId, this.credentialsManager.clientOptions());
  }

  // ---------------------------------------------------------------------------
  // Service operations
  // ---------------------------------------------------------------------------

  /** List Spring Cloud services, optionally filtered by resource group. */
  async listServices(resourceGroup?: string): Promise<SpringCloudService[]> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      const results: SpringCloudService[] = [];
      const iter = resourceGroup ? client.services.list(resourceGroup) : client.services.listBySubscription();
      for await (const s of iter) {
        results.push(mapService(s));
      }
      return results;
    }, this.retryOptions);
  }

  /** Get a single Spring Cloud service. Returns null if not found. */
  async getService(resourceGroup: string, serviceName: string): Promise<SpringCloudService | null> {
    const client = await this.getClient();
    const svc = await getOrNull(() => client.services.get(resourceGroup, serviceName), this.retryOptions);
    return svc ? mapService(svc) : null;
  }

  // ---------------------------------------------------------------------------
  // App operations
  // ---------------------------------------------------------------------------

  /** List apps in a Spring Cloud service. */
  async listApps(resourceGroup: string, serviceName: string): Promise<SpringCloudAppState[]> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      const results: SpringCloudAppState[] = [];
      for await (const app of client.apps.list(resourceGroup, serviceName)) {
        results.push(mapApp(app));
      }
      return results;
    }, this.retryOptions);
  }

  /** Get a single app. Returns null if not found. */
  async getApp(resourceGroup: string, serviceName: string, appName: string): Promise<Readonly<SpringCloudAppState> | null> {
    return this.app(resourceGroup, serviceName, appName).refresh();
  }

  /** Facade over one app, whether or not it exists yet. */
  app(resourceGroup: string, serviceName: string, appName: string): SpringCloudApp {
    const ref = { resourceGroup, serviceName, appName };
    const client = new ArmSpringCloudAppClient(async () => (await this.getClient()).apps, ref, this.retryOptions);
    return new SpringCloudApp(ref, client, this.facadeOptions);
  }

  // ---------------------------------------------------------------------------
  // Deployment operations
  // ---------------------------------------------------------------------------

  /** List deployments for an app. */
  async listDeployments(resourceGroup: string, serviceName: string, appName: string): Promise<SpringCloudDeploymentState[]> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      const results: SpringCloudDeploymentState[] = [];
      for await (const d of client.deployments.list(resourceGroup, serviceName, appName)) {
        results.push(mapDeployment(d));
      }
      return results;
    }, this.retryOptions);
  }

  /** Facade over one deployment, whether or not it exists yet. */
  deployment(resourceGroup: string, serviceName: string, appName: string, deploymentName: string): SpringCloudDeployment {
    const ref = { resourceGroup, serviceName, appName, deploymentName };
    const client = new ArmSpringCloudDeploymentClient(
      async () => (await this.getClient()).deployments,
      ref,
      this.retryOptions,
    );
    return new SpringCloudDeployment(ref, client, this.facadeOptions);
  }
}

/** Factory function for creating a Spring Cloud manager. */
export function createSpringCloudManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  facadeOptions?: SpringCloudFacadeOptions,
): AzureSpringCloudManager {
  return new AzureSpringCloudManager(credentialsManager, subscriptionId, retryOptions, facadeOptions);
}
