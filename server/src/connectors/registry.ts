/**
 * Capability Registry
 *
 * Owns every connector for the process lifetime: one connector per id,
 * per-connector sandbox policy, a cached health state, and a semaphore
 * that bounds concurrent store access.
 *
 * Lifecycle:
 *   1. registerConnector() for each source at startup, then freeze()
 *   2. connectAll() connects eagerly, each connect bounded by a timeout;
 *      failures mark the source unreachable
 *   3. the sandbox calls healthCheck() + acquirePermit() per query
 *   4. closeAll() once at shutdown
 */

import { createComponentLogger } from "../logging.js";
import { DuplicateConnectorError, RegistryFrozenError, UnknownConnectorError, errorMessage } from "../errors.js";
import { FreshnessTracker } from "./freshness.js";
import { Semaphore } from "./semaphore.js";
import { DEFAULT_CONNECTOR_POLICY, type Connector, type ConnectorPolicy, type HealthState } from "./types.js";

const log = createComponentLogger("capabilities");

const HEALTH_RANK: Record<HealthState, number> = { healthy: 0, degraded: 1, unreachable: 2 };

export interface ConnectorHandle {
  id: string;
  connector: Connector;
  policy: ConnectorPolicy;
  health: HealthState;
  /** Epoch ms of the last health observation, null before the first. */
  checkedAt: number | null;
}

export interface HealthReport {
  status: HealthState;
  connectors: Record<string, { kind: string; state: HealthState; checkedAt: string | null }>;
}

export interface CapabilityRegistryOptions {
  /** Upper bound on a single connector health check (default: 5s) */
  healthTimeoutMs?: number;
  /** Upper bound on connector.connect() in connectAll (default: healthTimeoutMs) */
  connectTimeoutMs?: number;
  /** Health results are reused for this long (default: 10s) */
  healthCacheMs?: number;
  /** Passed to the freshness tracker; 0 = always fetch live */
  staleThresholdMs?: number;
  now?: () => number;
}

export class CapabilityRegistry {
  readonly freshness: FreshnessTracker;
  private handles = new Map<string, ConnectorHandle>();
  private permits = new Map<string, Semaphore>();
  private inFlightHealth = new Map<string, Promise<HealthState>>();
  private frozen = false;
  private healthTimeoutMs: number;
  private connectTimeoutMs: number;
  private healthCacheMs: number;
  private now: () => number;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.healthTimeoutMs = options.healthTimeoutMs ?? 5_000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? this.healthTimeoutMs;
    this.healthCacheMs = options.healthCacheMs ?? 10_000;
    this.now = options.now ?? Date.now;
    this.freshness = new FreshnessTracker(options.staleThresholdMs ?? 0, this.now);
  }

  // ============================================
  // REGISTRATION
  // ============================================

  registerConnector(id: string, connector: Connector, policy: Partial<ConnectorPolicy> = {}): ConnectorHandle {
    if (this.frozen) throw new RegistryFrozenError("Capability registry", `connector "${id}"`);
    if (this.handles.has(id)) throw new DuplicateConnectorError(id);

    const handle: ConnectorHandle = {
      id,
      connector,
      policy: { ...DEFAULT_CONNECTOR_POLICY, ...policy },
      health: "healthy",
      checkedAt: null,
    };
    this.handles.set(id, handle);
    this.permits.set(id, new Semaphore(handle.policy.maxConcurrency));

    log.info("Connector registered", { id, kind: connector.kind, ...handle.policy });
    return handle;
  }

  /** Reject further registration; the registry is read-only from here on. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(id: string): Connector {
    return this.getHandle(id).connector;
  }

  getHandle(id: string): ConnectorHandle {
    const handle = this.handles.get(id);
    if (!handle) throw new UnknownConnectorError(id);
    return handle;
  }

  ids(): string[] {
    return [...this.handles.keys()];
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /** Connect every source. A source that fails stays registered as unreachable. */
  async connectAll(): Promise<void> {
    await Promise.all(
      [...this.handles.values()].map(async handle => {
        try {
          await this.connectWithin(handle);
          this.record(handle, "healthy");
          log.info("Connector connected", { id: handle.id, kind: handle.connector.kind });
        } catch (err) {
          this.record(handle, "unreachable");
          log.warn("Connector failed to connect; marked unreachable", { id: handle.id, error: errorMessage(err) });
        }
      }),
    );
  }

  private async connectWithin(handle: ConnectorHandle): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`connect timed out after ${this.connectTimeoutMs}ms`)),
        this.connectTimeoutMs,
      );
    });
    try {
      await Promise.race([handle.connector.connect(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async closeAll(): Promise<void> {
    for (const handle of this.handles.values()) {
      try {
        await handle.connector.close();
        log.info("Connector closed", { id: handle.id });
      } catch (err) {
        log.error("Connector close failed", err, { id: handle.id });
      }
    }
  }

  // ============================================
  // HEALTH
  // ============================================

  async healthCheck(id: string): Promise<HealthState> {
    const handle = this.getHandle(id);
    if (handle.checkedAt !== null && this.now() - handle.checkedAt < this.healthCacheMs) {
      return handle.health;
    }

    const pending = this.inFlightHealth.get(id);
    if (pending) return pending;

    const check = this.checkNow(handle).finally(() => this.inFlightHealth.delete(id));
    this.inFlightHealth.set(id, check);
    return check;
  }

  async healthCheckAll(): Promise<HealthReport> {
    const report: HealthReport = { status: "healthy", connectors: {} };
    const states = await Promise.all(this.ids().map(async id => [id, await this.healthCheck(id)] as const));

    for (const [id, state] of states) {
      const handle = this.getHandle(id);
      report.connectors[id] = {
        kind: handle.connector.kind,
        state,
        checkedAt: handle.checkedAt === null ? null : new Date(handle.checkedAt).toISOString(),
      };
      if (HEALTH_RANK[state] > HEALTH_RANK[report.status]) report.status = state;
    }
    return report;
  }

  /** Record a health observation made outside a health check (e.g. a failed query). */
  markHealth(id: string, state: HealthState): void {
    this.record(this.getHandle(id), state);
  }

  private record(handle: ConnectorHandle, state: HealthState): void {
    if (handle.health !== state) {
      log.info("Connector health changed", { id: handle.id, from: handle.health, to: state });
    }
    handle.health = state;
    handle.checkedAt = this.now();
  }

  private async checkNow(handle: ConnectorHandle): Promise<HealthState> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<HealthState>(resolve => {
      timer = setTimeout(() => {
        log.warn("Health check timed out", { id: handle.id, timeoutMs: this.healthTimeoutMs });
        resolve("unreachable");
      }, this.healthTimeoutMs);
    });

    let state: HealthState;
    try {
      state = await Promise.race([handle.connector.health(), timeout]);
    } catch (err) {
      log.warn("Health check failed", { id: handle.id, error: errorMessage(err) });
      state = "unreachable";
    } finally {
      clearTimeout(timer);
    }

    this.record(handle, state);
    return state;
  }

  // ============================================
  // CONCURRENCY
  // ============================================

  /** Wait for one of the connector's concurrency permits; call the result to give it back. */
  async acquirePermit(id: string): Promise<() => void> {
    const semaphore = this.permits.get(id);
    if (!semaphore) throw new UnknownConnectorError(id);
    return semaphore.acquire();
  }

  /** Run `fn` while holding one of the connector's concurrency permits. */
  async withPermit<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const semaphore = this.permits.get(id);
    if (!semaphore) throw new UnknownConnectorError(id);
    return semaphore.run(fn);
  }
}
