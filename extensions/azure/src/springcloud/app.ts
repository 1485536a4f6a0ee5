/**
 * Spring Cloud app facade and builder.
 */

import { diffValue } from "../reconcile/differ.js";
import { RemoteEntity } from "../reconcile/entity.js";
import { ReconcilingBuilder, type ReconcilingBuilderOptions } from "../reconcile/builder.js";
import { silentLogger, type ToolkitLogger } from "../types.js";
import type { SpringCloudAppClient } from "./client.js";
import type { SpringCloudFacadeOptions } from "./deployment.js";
import type { SpringCloudAppPatch, SpringCloudAppRef, SpringCloudAppState, UploadLocation } from "./types.js";

export class SpringCloudApp {
  private readonly cache: RemoteEntity<SpringCloudAppState>;
  private readonly logger: ToolkitLogger;

  constructor(
    readonly ref: SpringCloudAppRef,
    private readonly client: SpringCloudAppClient,
    private readonly options: SpringCloudFacadeOptions = {},
  ) {
    this.cache = new RemoteEntity(() => client.get());
    this.logger = options.logger ?? silentLogger;
  }

  get name(): string {
    return this.ref.appName;
  }

  exists(): Promise<boolean> {
    return this.cache.exists();
  }

  async refresh(): Promise<Readonly<SpringCloudAppState> | null> {
    await this.cache.refresh();
    return this.cache.current();
  }

  entity(): Readonly<SpringCloudAppState> | null {
    return this.cache.current();
  }

  reconcile(): SpringCloudAppBuilder {
    return new SpringCloudAppBuilder(this.cache, this.client, {
      label: `app(${this.name})`,
      logger: this.options.logger,
      telemetry: this.options.telemetry,
    });
  }

  /** Ask the service where an artifact for this app should be uploaded. */
  async requestUploadLocation(): Promise<UploadLocation> {
    const location = await this.client.getUploadLocation();
    this.logger.debug?.(`Upload location for app(${this.name}): ${location.relativePath}`);
    return location;
  }

  async delete(): Promise<void> {
    this.logger.info(`Deleting app(${this.name})...`);
    await this.client.delete();
    this.cache.markAbsent();
  }
}

export class SpringCloudAppBuilder extends ReconcilingBuilder<SpringCloudAppState, SpringCloudAppPatch> {
  protected readonly fields = ["isPublic", "httpsOnly"] as const;

  constructor(
    entity: RemoteEntity<SpringCloudAppState>,
    client: SpringCloudAppClient,
    options: Omit<ReconcilingBuilderOptions, "operation">,
  ) {
    super(entity, client, { ...options, operation: "springcloud.app" });
  }

  configPublic(isPublic?: boolean): this {
    return this.queue("isPublic", (remote) => diffValue(isPublic, remote?.isPublic));
  }

  configHttpsOnly(httpsOnly?: boolean): this {
    return this.queue("httpsOnly", (remote) => diffValue(httpsOnly, remote?.httpsOnly));
  }
}
