/**
 * Reconciliation Types
 *
 * Shared vocabulary for the differ, the remote entity cache, the reconciling
 * builder and the poller.
 */

// =============================================================================
// Remote state
// =============================================================================

/** What the cache knows about the remote resource. */
export type RemoteSnapshot<S> =
  | { kind: "unknown" }
  | { kind: "absent" }
  | { kind: "present"; state: Readonly<S> };

/** Whether a commit creates the resource or patches an existing one. */
export type WriteMode = "create" | "update";

/**
 * Remote management API for one resource. The collaborator owns the wire
 * format; the core never builds requests itself.
 */
export interface RemoteResourceClient<S, P> {
  /** Fetch the resource. `null` (or a `NotFoundError`) means it does not exist. */
  get(): Promise<S | null>;
  /** Write the given sparse patch and return the resulting remote state. */
  createOrUpdate(patch: P, mode: WriteMode): Promise<S>;
  delete(): Promise<void>;
}

// =============================================================================
// Diffing
// =============================================================================

/**
 * Outcome of comparing one desired field with its remote counterpart.
 *
 * - `unspecified`: the caller did not ask for anything (blank or absent input)
 * - `unchanged`: the caller asked for exactly what is already there
 * - `changed`: a remote write is needed
 */
export type FieldDiff<T> =
  | { kind: "unspecified" }
  | { kind: "unchanged" }
  | { kind: "changed"; value: T };

// =============================================================================
// Builder
// =============================================================================

export type BuilderPhase = "empty" | "dirty" | "committed";

/** Sparse patch: every field optional, present only when it must be written. */
export type Patch<P> = { [K in keyof P]?: P[K] };

// =============================================================================
// Polling
// =============================================================================

/** Classification of a remote snapshot while waiting for it to settle. */
export type PollResult = "running" | "failed" | "stopped" | "deploying";

export type PollOptions<S> = {
  /** Overall budget. */
  timeoutMs: number;
  /** Sleep between refreshes. Clamped to `MIN_POLL_INTERVAL_MS`. */
  intervalMs?: number;
  /** Maximum number of refresh calls. Default: unlimited (deadline only). */
  maxAttempts?: number;
  /** Called after every refresh. */
  onPoll?: (state: S, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};
