/**
 * Azure Resource Toolkit — Telemetry
 *
 * Fire-and-forget event sink for operation outcomes. Callers receive a
 * `TelemetryClient` by injection; `createNoopTelemetry()` is the default.
 */

import type { ToolkitLogger } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type TelemetryEventType =
  | "azure.operation.success"
  | "azure.operation.failure"
  | "azure.operation.skip"
  | "deploy.start"
  | "deploy.success"
  | "deploy.failure";

export type TelemetryProperties = Record<string, string>;

export type TelemetryEvent = {
  type: TelemetryEventType;
  /** Operation name, e.g. `springcloud.deployment.update`. */
  operation: string;
  durationMs?: number;
  properties?: TelemetryProperties;
};

export type RecordedTelemetryEvent = TelemetryEvent & {
  timestamp: number;
  seq: number;
};

export type TelemetryListener = (event: RecordedTelemetryEvent) => void;

export interface TelemetryClient {
  /** Record an event. Never throws and never blocks on listeners. */
  track(event: TelemetryEvent): void;
}

// =============================================================================
// Implementations
// =============================================================================

/** A client that drops every event. */
export function createNoopTelemetry(): TelemetryClient {
  return { track: () => {} };
}

export type TelemetryClientOptions = {
  /** When false the client behaves like the no-op client. Default: true. */
  enabled?: boolean;
  /** Properties merged into every event (plugin name, version, ...). */
  commonProperties?: TelemetryProperties;
  logger?: ToolkitLogger;
};

/**
 * Listener-based telemetry client. Each event is stamped with a timestamp and
 * a per-client sequence number before it is handed to the listeners.
 */
export class ListenerTelemetryClient implements TelemetryClient {
  private readonly listeners = new Set<TelemetryListener>();
  private readonly enabled: boolean;
  private readonly commonProperties: TelemetryProperties;
  private readonly logger?: ToolkitLogger;
  private seq = 0;

  constructor(options: TelemetryClientOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.commonProperties = options.commonProperties ?? {};
    this.logger = options.logger;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(listener: TelemetryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  track(event: TelemetryEvent): void {
    if (!this.enabled) return;

    const recorded: RecordedTelemetryEvent = {
      ...event,
      properties: { ...this.commonProperties, ...event.properties },
      timestamp: Date.now(),
      seq: ++this.seq,
    };

    for (const listener of this.listeners) {
      try {
        listener(recorded);
      } catch (error) {
        // a broken sink must not fail the operation being reported
        this.logger?.debug?.(`Telemetry listener failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

export function createTelemetryClient(options?: TelemetryClientOptions): ListenerTelemetryClient {
  return new ListenerTelemetryClient(options);
}
