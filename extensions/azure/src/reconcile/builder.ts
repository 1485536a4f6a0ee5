/**
 * Reconciling builder.
 *
 * One builder type covers both creation and update: `configX()` calls diff the
 * caller's desired value against the cached remote state and queue only what
 * differs; `commit()` re-runs every diff against the state it has just read,
 * writes what is left and folds the response back into the cache.
 *
 * Phases: `empty` -> `dirty` -> `committed`. A failed write leaves the builder
 * `dirty` with the unapplied fields still queued, so `commit()` may be retried.
 */

import { UsageError } from "../errors.js";
import { createNoopTelemetry, type TelemetryClient } from "../telemetry.js";
import { silentLogger, type ToolkitLogger } from "../types.js";
import type { RemoteEntity } from "./entity.js";
import type { BuilderPhase, FieldDiff, Patch, RemoteResourceClient, WriteMode } from "./types.js";

/** Computes one field's diff against a remote state (`null` when absent or unread). */
export type FieldDiffer<S, V> = (remote: Readonly<S> | null) => FieldDiff<V>;

type FieldRequest<S, P> = {
  field: keyof P;
  apply: (remote: Readonly<S> | null) => void;
};

export type ReconcilingBuilderOptions = {
  /** Telemetry operation prefix, e.g. `springcloud.deployment`. */
  operation: string;
  /** Human label used in log lines, e.g. `deployment(default)`. */
  label: string;
  logger?: ToolkitLogger;
  telemetry?: TelemetryClient;
};

export abstract class ReconcilingBuilder<S extends object, P extends object> {
  /** Every patchable field, in the order they are written. */
  protected abstract readonly fields: readonly (keyof P)[];

  protected readonly logger: ToolkitLogger;
  protected readonly telemetry: TelemetryClient;
  private readonly queued: Patch<P> = {};
  private requests: FieldRequest<S, P>[] = [];
  private committed = false;
  private inFlight = false;

  protected constructor(
    protected readonly entity: RemoteEntity<S>,
    protected readonly client: RemoteResourceClient<S, Patch<P>>,
    protected readonly options: ReconcilingBuilderOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.telemetry = options.telemetry ?? createNoopTelemetry();
  }

  get phase(): BuilderPhase {
    if (this.committed) return "committed";
    return this.isEmpty() ? "empty" : "dirty";
  }

  /** A copy of the fields queued for the next write. */
  get patch(): Patch<P> {
    return this.pick(this.fields);
  }

  /** The remote state the diffs are computed against. */
  protected remote(): Readonly<S> | null {
    return this.entity.current();
  }

  /**
   * Record one field diff and apply it to the queue. "Unspecified" never
   * touches a queued value; "unchanged" drops it, so the final patch only
   * depends on the last value requested for each field. The diff is kept and
   * run again at commit time against the freshly read remote state.
   */
  protected queue<K extends keyof P>(field: K, differ: FieldDiffer<S, P[K]>): this {
    this.assertNotCommitted();
    const request: FieldRequest<S, P> = { field, apply: (remote) => this.apply(field, differ(remote)) };
    this.requests.push(request);
    request.apply(this.remote());
    return this;
  }

  private apply<K extends keyof P>(field: K, diff: FieldDiff<P[K]>): void {
    switch (diff.kind) {
      case "unspecified":
        break;
      case "unchanged":
        delete this.queued[field];
        break;
      case "changed":
        this.queued[field] = diff.value;
        break;
    }
  }

  /** Rebuild the queue from the recorded diffs against the current cache. */
  private rediff(): void {
    for (const key of this.fields) delete this.queued[key];
    const remote = this.remote();
    for (const request of this.requests) request.apply(remote);
  }

  /**
   * Resolve fields that can only be diffed at commit time (an artifact whose
   * remote path is known only after upload, for instance).
   */
  protected async resolveDeferred(_mode: WriteMode): Promise<void> {}

  /** Reject patches that cannot be written in this mode. */
  protected validate(_patch: Patch<P>, _mode: WriteMode): void {}

  /**
   * Split the queued fields into ordered write stages. One stage by default;
   * override when the remote API rejects some combination of fields in one call.
   */
  protected stages(_patch: Patch<P>, _mode: WriteMode): (readonly (keyof P)[])[] {
    return [this.fields];
  }

  /** Runs once after the last write succeeded. May return a newer state. */
  protected async afterCommit(state: Readonly<S>, _mode: WriteMode): Promise<Readonly<S>> {
    return state;
  }

  /**
   * Write the queued patch. An empty patch against an existing resource is a
   * no-op that returns the cached state.
   */
  async commit(): Promise<Readonly<S>> {
    this.assertNotCommitted();
    if (this.inFlight) throw new UsageError(`A commit of ${this.options.label} is already in progress`);
    this.inFlight = true;

    const start = Date.now();
    let mode: WriteMode = "update";
    try {
      mode = (await this.entity.exists()) ? "update" : "create";
      this.rediff();
      await this.resolveDeferred(mode);

      const existing = this.remote();
      if (existing && this.isEmpty()) {
        this.logger.info(`Skip updating ${this.options.label} since its properties are not changed.`);
        this.committed = true;
        this.telemetry.track({ type: "azure.operation.skip", operation: `${this.options.operation}.${mode}` });
        return existing;
      }

      const patch = this.patch;
      this.validate(patch, mode);

      const verb = mode === "create" ? "creating" : "updating";
      this.logger.info(`Start ${verb} ${this.options.label}...`);

      let state = existing;
      let stageMode = mode;
      for (const keys of this.stages(patch, mode)) {
        const stagePatch = this.pick(keys);
        if (stageMode === "update" && keys.every((key) => stagePatch[key] === undefined)) continue;

        const written = await this.client.createOrUpdate(stagePatch, stageMode);
        state = this.entity.replace(written);
        for (const key of keys) delete this.queued[key];
        this.requests = this.requests.filter((request) => !keys.includes(request.field));
        stageMode = "update";
      }

      if (!state) {
        throw new UsageError(`Nothing was written for ${this.options.label}; no stage covered the create`);
      }

      this.committed = true;
      const result = await this.afterCommit(state, mode);
      this.logger.info(`${capitalize(this.options.label)} is successfully ${mode === "create" ? "created" : "updated"}.`);
      this.telemetry.track({
        type: "azure.operation.success",
        operation: `${this.options.operation}.${mode}`,
        durationMs: Date.now() - start,
      });
      return result;
    } catch (error) {
      this.telemetry.track({
        type: "azure.operation.failure",
        operation: `${this.options.operation}.${mode}`,
        durationMs: Date.now() - start,
        properties: { errorMessage: error instanceof Error ? error.message : String(error) },
      });
      throw error;
    } finally {
      this.inFlight = false;
    }
  }

  private isEmpty(): boolean {
    return this.fields.every((key) => this.queued[key] === undefined);
  }

  private pick(keys: readonly (keyof P)[]): Patch<P> {
    const out: Patch<P> = {};
    for (const key of keys) {
      const value = this.queued[key];
      if (value !== undefined) out[key] = value;
    }
    return out;
  }

  private assertNotCommitted(): void {
    if (this.committed) throw new UsageError(`${capitalize(this.options.label)} is already committed`);
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
