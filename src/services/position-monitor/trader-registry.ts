/**
 * Monitor Registry
 * Owns the per-trader polling state. Every mutation is a synchronous method,
 * so on the event loop each transition runs to completion without
 * interleaving with another writer.
 */

import { InvalidInputError, describeError } from '../../utils/error-handler';
import { PositionSnapshot, TraderId, TraderState } from '../../types/monitor';

export function defaultAlias(traderId: TraderId): string {
  return `Trader-${traderId.slice(0, 8)}`;
}

export class MonitorRegistry {
  private traders: Map<TraderId, TraderState> = new Map();

  add(traderId: TraderId, alias?: string): Readonly<TraderState> {
    if (this.traders.has(traderId)) {
      throw new InvalidInputError(`Trader ${traderId} is already monitored`);
    }

    const state: TraderState = {
      traderId,
      alias: alias?.trim() || defaultAlias(traderId),
      enabled: true,
      snapshot: null,
      consecutiveFailures: 0,
      lastPollAt: null,
      lastSuccessAt: null,
      lastError: null,
    };
    this.traders.set(traderId, state);
    return state;
  }

  remove(traderId: TraderId): Readonly<TraderState> {
    const state = this.require(traderId);
    this.traders.delete(traderId);
    return state;
  }

  has(traderId: TraderId): boolean {
    return this.traders.has(traderId);
  }

  get(traderId: TraderId): Readonly<TraderState> | undefined {
    return this.traders.get(traderId);
  }

  list(): Readonly<TraderState>[] {
    return Array.from(this.traders.values());
  }

  ids(): TraderId[] {
    return Array.from(this.traders.keys());
  }

  get size(): number {
    return this.traders.size;
  }

  setEnabled(traderId: TraderId, enabled: boolean): Readonly<TraderState> {
    const state = this.require(traderId);
    state.enabled = enabled;
    return state;
  }

  setAlias(traderId: TraderId, alias: string): Readonly<TraderState> {
    const state = this.require(traderId);
    state.alias = alias.trim() || defaultAlias(traderId);
    return state;
  }

  /**
   * Returns false when `entry` is no longer the registered state for its id
   * (removed, or removed and added again while the poll was running).
   */
  isCurrent(entry: Readonly<TraderState>): boolean {
    return this.traders.get(entry.traderId) === entry;
  }

  recordPollStart(entry: Readonly<TraderState>, at: Date): boolean {
    const state = this.current(entry);
    if (!state) return false;
    state.lastPollAt = at;
    return true;
  }

  /**
   * Replaces the stored snapshot whether or not the diff produced events.
   */
  recordSuccess(entry: Readonly<TraderState>, snapshot: PositionSnapshot, at: Date): boolean {
    const state = this.current(entry);
    if (!state) return false;
    state.snapshot = snapshot;
    state.consecutiveFailures = 0;
    state.lastSuccessAt = at;
    state.lastError = null;
    return true;
  }

  /**
   * Keeps the last good snapshot so the next success diffs against a real
   * observation. Returns the new failure count, or null for a stale entry.
   */
  recordFailure(entry: Readonly<TraderState>, error: unknown): number | null {
    const state = this.current(entry);
    if (!state) return null;
    state.consecutiveFailures += 1;
    state.lastError = describeError(error);
    return state.consecutiveFailures;
  }

  private current(entry: Readonly<TraderState>): TraderState | undefined {
    const state = this.traders.get(entry.traderId);
    return state === entry ? state : undefined;
  }

  private require(traderId: TraderId): TraderState {
    const state = this.traders.get(traderId);
    if (!state) {
      throw new InvalidInputError(`Trader ${traderId} is not monitored`);
    }
    return state;
  }
}
