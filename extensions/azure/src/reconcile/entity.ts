/**
 * Remote entity cache.
 *
 * Single slot holding the last observed state of one remote resource. The
 * slot is replaced wholesale on every refresh or write, never merged. Stored
 * states are deep copies, frozen all the way down.
 */

import { NotFoundError } from "../errors.js";
import type { RemoteSnapshot } from "./types.js";

export class RemoteEntity<S extends object> {
  private snapshot: RemoteSnapshot<S> = { kind: "unknown" };

  constructor(private readonly fetch: () => Promise<S | null>) {}

  /** The current tagged snapshot. */
  get state(): RemoteSnapshot<S> {
    return this.snapshot;
  }

  /** The remote state when known to exist, otherwise `null`. */
  current(): Readonly<S> | null {
    return this.snapshot.kind === "present" ? this.snapshot.state : null;
  }

  /**
   * Re-read the remote resource. A missing resource is a normal outcome and
   * leaves the cache `absent`.
   */
  async refresh(): Promise<RemoteSnapshot<S>> {
    let fetched: S | null;
    try {
      fetched = await this.fetch();
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      fetched = null;
    }
    this.snapshot = fetched === null ? { kind: "absent" } : { kind: "present", state: snapshotOf(fetched) };
    return this.snapshot;
  }

  /** Whether the resource exists, refreshing once if nothing is known yet. */
  async exists(): Promise<boolean> {
    if (this.snapshot.kind === "unknown") await this.refresh();
    return this.snapshot.kind === "present";
  }

  /** Replace the slot with the state returned by a write. */
  replace(state: S): Readonly<S> {
    const frozen = snapshotOf(state);
    this.snapshot = { kind: "present", state: frozen };
    return frozen;
  }

  markAbsent(): void {
    this.snapshot = { kind: "absent" };
  }
}

function snapshotOf<S extends object>(state: S): Readonly<S> {
  const copy = structuredClone(state);
  deepFreeze(copy);
  return copy;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const nested of Object.values(value)) deepFreeze(nested);
}
