/**
 * Freshness Tracker
 *
 * Records which dynamic entities were fetched, from where and when, so
 * callers can ask whether a fact needs a fresh fetch. Holds metadata only,
 * never the fetched values. With the default threshold of 0 every entity
 * is always stale: every question goes back to the store.
 */

export interface EntityState {
  entityType: string;
  entityId: string;
  connectorId: string;
  lastAccessed: string;
  stale: boolean;
}

export class FreshnessTracker {
  private entities = new Map<string, EntityState>();

  constructor(
    private readonly staleThresholdMs = 0,
    private readonly now: () => number = Date.now,
  ) {}

  private key(entityType: string, entityId: string): string {
    return `${entityType}:${entityId}`;
  }

  markAccessed(entityType: string, entityId: string, connectorId: string): void {
    this.entities.set(this.key(entityType, entityId), {
      entityType,
      entityId,
      connectorId,
      lastAccessed: new Date(this.now()).toISOString(),
      stale: false,
    });
  }

  invalidate(entityType: string, entityId: string): void {
    const state = this.entities.get(this.key(entityType, entityId));
    if (state) state.stale = true;
  }

  invalidateAll(entityType?: string): void {
    for (const state of this.entities.values()) {
      if (entityType === undefined || state.entityType === entityType) state.stale = true;
    }
  }

  isStale(entityType: string, entityId: string): boolean {
    if (this.staleThresholdMs === 0) return true;

    const state = this.entities.get(this.key(entityType, entityId));
    if (!state || state.stale) return true;

    return this.now() - Date.parse(state.lastAccessed) > this.staleThresholdMs;
  }

  get(entityType: string, entityId: string): EntityState | undefined {
    const state = this.entities.get(this.key(entityType, entityId));
    return state ? { ...state } : undefined;
  }

  list(): EntityState[] {
    return [...this.entities.values()].map(s => ({ ...s }));
  }
}
