/**
 * Azure SQL Server facade and builder.
 */

import { ConfigurationError } from "../errors.js";
import { changed, diffText, diffValue, isBlank, UNCHANGED, UNSPECIFIED } from "../reconcile/differ.js";
import { RemoteEntity } from "../reconcile/entity.js";
import { ReconcilingBuilder, type ReconcilingBuilderOptions } from "../reconcile/builder.js";
import type { Patch, WriteMode } from "../reconcile/types.js";
import type { TelemetryClient } from "../telemetry.js";
import { silentLogger, type ToolkitLogger } from "../types.js";
import type { SqlServerClient } from "./client.js";
import type { SqlFirewallRule, SqlServerPatch, SqlServerRef, SqlServerState } from "./types.js";

export type SqlServerFacadeOptions = {
  logger?: ToolkitLogger;
  telemetry?: TelemetryClient;
};

type ServerField = keyof SqlServerPatch;

const SERVER_FIELDS: readonly ServerField[] = ["region", "administratorLogin", "administratorPassword"];
const FIREWALL_FIELDS: readonly ServerField[] = ["accessFromAzureServices", "localMachineIp"];

/** `East US` and `eastus` name the same region. */
export function normalizeRegion(region: string): string {
  return region.replace(/\s+/g, "").toLowerCase();
}

// =============================================================================
// Facade
// =============================================================================

export class SqlServer {
  private readonly cache: RemoteEntity<SqlServerState>;
  private readonly logger: ToolkitLogger;

  constructor(
    readonly ref: SqlServerRef,
    private readonly client: SqlServerClient,
    private readonly options: SqlServerFacadeOptions = {},
  ) {
    this.cache = new RemoteEntity(() => client.get());
    this.logger = options.logger ?? silentLogger;
  }

  get name(): string {
    return this.ref.serverName;
  }

  exists(): Promise<boolean> {
    return this.cache.exists();
  }

  async refresh(): Promise<Readonly<SqlServerState> | null> {
    await this.cache.refresh();
    return this.cache.current();
  }

  entity(): Readonly<SqlServerState> | null {
    return this.cache.current();
  }

  firewallRules(): Promise<SqlFirewallRule[]> {
    return this.client.listFirewallRules();
  }

  reconcile(): SqlServerBuilder {
    return new SqlServerBuilder(this.cache, this.client, {
      label: `sqlserver(${this.name})`,
      logger: this.options.logger,
      telemetry: this.options.telemetry,
    });
  }

  async delete(): Promise<void> {
    this.logger.info(`Deleting sqlserver(${this.name})...`);
    await this.client.delete();
    this.cache.markAbsent();
  }
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Region and administrator login can only be set when the server is
 * created; the password is write-only and never sent on update.
 */
export class SqlServerBuilder extends ReconcilingBuilder<SqlServerState, SqlServerPatch> {
  protected readonly fields = [...SERVER_FIELDS, ...FIREWALL_FIELDS] as const;

  constructor(
    entity: RemoteEntity<SqlServerState>,
    client: SqlServerClient,
    options: Omit<ReconcilingBuilderOptions, "operation">,
  ) {
    super(entity, client, { ...options, operation: "sql.server" });
  }

  configRegion(region?: string): this {
    const desired = region && !isBlank(region) ? normalizeRegion(region) : undefined;
    return this.queue("region", (remote) => diffValue(desired, remote?.location ? normalizeRegion(remote.location) : undefined));
  }

  configAdministratorLogin(login?: string): this {
    return this.queue("administratorLogin", (remote) => diffText(login, remote?.administratorLogin));
  }

  configAdministratorPassword(password?: string): this {
    return this.queue("administratorPassword", () => (password === undefined || isBlank(password) ? UNSPECIFIED : changed(password)));
  }

  configAccessFromAzureServices(enabled?: boolean): this {
    return this.queue("accessFromAzureServices", (remote) => diffValue(enabled, remote?.accessFromAzureServices));
  }

  /**
   * Allow or remove the local machine rule.
   * @param ipAddress public address of this machine; required when enabling
   */
  configAccessFromLocalMachine(enabled?: boolean, ipAddress?: string): this {
    if (enabled === undefined) return this;
    if (!enabled) {
      return this.queue("localMachineIp", (remote) => (remote?.localMachineIp ? changed(null) : UNCHANGED));
    }
    const ip = ipAddress?.trim();
    if (!ip) {
      throw new ConfigurationError("Access from the local machine needs its public IP address");
    }
    return this.queue("localMachineIp", (remote) => diffValue(ip, remote?.localMachineIp));
  }

  protected override async resolveDeferred(mode: WriteMode): Promise<void> {
    if (mode === "update") this.queue("administratorPassword", () => UNCHANGED);
  }

  protected override validate(patch: Patch<SqlServerPatch>, mode: WriteMode): void {
    const issues: string[] = [];
    if (mode === "create") {
      if (!patch.region) issues.push("region is required");
      if (!patch.administratorLogin) issues.push("administrator login is required");
      if (!patch.administratorPassword) issues.push("administrator password is required");
    } else {
      if (patch.region !== undefined) issues.push("region cannot be changed after creation");
      if (patch.administratorLogin !== undefined) issues.push("administrator login cannot be changed after creation");
    }
    if (issues.length > 0) {
      throw new ConfigurationError(`Cannot ${mode} ${this.options.label}`, issues);
    }
  }

  /** The server is created on its own; firewall rules follow in a second write. */
  protected override stages(_patch: Patch<SqlServerPatch>, mode: WriteMode): (readonly ServerField[])[] {
    return mode === "create" ? [SERVER_FIELDS, FIREWALL_FIELDS] : [FIREWALL_FIELDS];
  }
}
