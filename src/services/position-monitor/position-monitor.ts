/**
 * Position Monitor
 * Polls every enabled trader on its own timer, diffs each fresh snapshot
 * against the stored one and hands the resulting events to the dispatcher
 */

import { EventEmitter } from 'events';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/error-handler';
import {
  EventDispatcher,
  Position,
  PositionEvent,
  PositionSnapshot,
  SnapshotFetcher,
  TraderHealth,
  TraderId,
  TraderState,
} from '../../types/monitor';
import { DEFAULT_SIZE_EPSILON, diffSnapshots } from './position-diff-detector';
import { MonitorRegistry } from './trader-registry';

const DEFAULT_FAILURE_THRESHOLD = 5;

/**
 * Resolves true once `work` settles, or false as soon as `signal` aborts.
 * A send still pending at abort keeps running but is no longer awaited.
 */
async function untilAborted(work: Promise<void>, signal: AbortSignal): Promise<boolean> {
  let onAbort = (): void => undefined;
  const aborted = new Promise<boolean>(resolve => {
    onAbort = () => resolve(false);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([work.then(() => true), aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

export interface PositionMonitorConfig {
  registry: MonitorRegistry;
  fetcher: SnapshotFetcher;
  dispatcher: EventDispatcher;
  /** Minimum spacing between the starts of two cycles of one trader */
  pollIntervalMs: number;
  sizeEpsilon?: number;
  /** Consecutive fetch failures after which a trader is reported degraded */
  failureThreshold?: number;
  now?: () => Date;
}

interface ActiveCycle {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Emits:
 * - `positionEvents` (traderId, events) for every cycle that detected changes
 * - `health` (TraderHealth) after every cycle and user operation
 * - `degraded` / `recovered` (TraderHealth) when crossing the failure threshold
 * - `tickSkipped` (traderId) when the previous cycle was still running
 * - `deliveryFailed` (event, error)
 */
export class PositionMonitor extends EventEmitter {
  private registry: MonitorRegistry;
  private fetcher: SnapshotFetcher;
  private dispatcher: EventDispatcher;
  private pollIntervalMs: number;
  private sizeEpsilon: number;
  private failureThreshold: number;
  private now: () => Date;
  private timers: Map<TraderId, NodeJS.Timeout> = new Map();
  private cycles: Map<TraderId, ActiveCycle> = new Map();
  private running = false;

  constructor(monitorConfig: PositionMonitorConfig) {
    super();
    this.registry = monitorConfig.registry;
    this.fetcher = monitorConfig.fetcher;
    this.dispatcher = monitorConfig.dispatcher;
    this.pollIntervalMs = monitorConfig.pollIntervalMs;
    this.sizeEpsilon = monitorConfig.sizeEpsilon ?? DEFAULT_SIZE_EPSILON;
    this.failureThreshold = monitorConfig.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.now = monitorConfig.now ?? (() => new Date());
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    for (const traderId of this.registry.ids()) {
      this.schedule(traderId);
    }

    logger.info('Position monitor started', {
      traders: this.registry.size,
      pollIntervalMs: this.pollIntervalMs,
    });
  }

  /**
   * Clears every timer and aborts in-flight cycles, including a notification
   * send that has not returned yet. Resolves once every cycle has settled; an
   * aborted cycle neither commits state nor dispatches further events.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const traderId of Array.from(this.timers.keys())) {
      this.unschedule(traderId);
    }

    const pending = Array.from(this.cycles.values());
    for (const cycle of pending) {
      cycle.controller.abort();
    }
    await Promise.allSettled(pending.map(cycle => cycle.done));

    logger.info('Position monitor stopped', { cancelledCycles: pending.length });
  }

  isRunning(): boolean {
    return this.running;
  }

  addTrader(traderId: TraderId, alias?: string): TraderHealth {
    const state = this.registry.add(traderId, alias);
    logger.info('Trader added', { traderId, alias: state.alias });

    if (this.running) {
      this.schedule(traderId);
    }
    return this.publishHealth(state);
  }

  removeTrader(traderId: TraderId): void {
    const state = this.registry.remove(traderId);
    this.unschedule(traderId);

    // Released right away so a re-added trader gets a fresh cycle
    const cycle = this.cycles.get(traderId);
    if (cycle) {
      cycle.controller.abort();
      this.cycles.delete(traderId);
    }

    logger.info('Trader removed', { traderId, alias: state.alias });
  }

  /**
   * Resumes polling from the retained baseline, so positions opened while
   * disabled show up as ordinary OPEN events.
   */
  enableTrader(traderId: TraderId): TraderHealth {
    const state = this.registry.setEnabled(traderId, true);
    logger.info('Trader enabled', { traderId });
    return this.publishHealth(state);
  }

  disableTrader(traderId: TraderId): TraderHealth {
    const state = this.registry.setEnabled(traderId, false);
    logger.info('Trader disabled', { traderId });
    return this.publishHealth(state);
  }

  setAlias(traderId: TraderId, alias: string): TraderHealth {
    const state = this.registry.setAlias(traderId, alias);
    return this.publishHealth(state);
  }

  getHealth(traderId: TraderId): TraderHealth | undefined {
    const state = this.registry.get(traderId);
    return state ? this.toHealth(state) : undefined;
  }

  getAllHealth(): TraderHealth[] {
    return this.registry.list().map(state => this.toHealth(state));
  }

  /**
   * Positions of the last successful snapshot, sorted by key.
   */
  getPositions(traderId: TraderId): Position[] {
    const snapshot = this.registry.get(traderId)?.snapshot;
    if (!snapshot) {
      return [];
    }
    return Array.from(snapshot.positions.values()).sort((a, b) =>
      a.key < b.key ? -1 : a.key > b.key ? 1 : 0
    );
  }

  private schedule(traderId: TraderId): void {
    if (this.timers.has(traderId)) {
      return;
    }

    const timer = setInterval(() => this.tick(traderId), this.pollIntervalMs);
    this.timers.set(traderId, timer);
    this.tick(traderId);
  }

  private unschedule(traderId: TraderId): void {
    const timer = this.timers.get(traderId);
    if (timer) {
      clearInterval(timer);
      this.timers.delete(traderId);
    }
  }

  private tick(traderId: TraderId): void {
    if (!this.running) {
      return;
    }

    const entry = this.registry.get(traderId);
    if (!entry || !entry.enabled) {
      return;
    }

    if (this.cycles.has(traderId)) {
      logger.debug('Previous cycle still running, skipping tick', { traderId });
      this.emit('tickSkipped', traderId);
      return;
    }

    const controller = new AbortController();
    const done = this.runCycle(entry, controller.signal).finally(() => {
      if (this.cycles.get(traderId)?.controller === controller) {
        this.cycles.delete(traderId);
      }
    });
    this.cycles.set(traderId, { controller, done });
  }

  private async runCycle(entry: Readonly<TraderState>, signal: AbortSignal): Promise<void> {
    const traderId = entry.traderId;

    try {
      this.registry.recordPollStart(entry, this.now());

      let snapshot: PositionSnapshot;
      try {
        snapshot = await this.fetcher.fetchPositions(traderId, { signal });
      } catch (error) {
        if (signal.aborted) {
          logger.debug('Fetch cancelled', { traderId });
          return;
        }
        this.handleFetchFailure(entry, error);
        return;
      }

      if (signal.aborted || !this.registry.isCurrent(entry)) {
        logger.debug('Discarding snapshot of a cancelled cycle', { traderId });
        return;
      }

      // Diff and commit run in the same synchronous step: a change is
      // detected once even if the dispatch below is interrupted.
      const previous = entry.snapshot;
      const previousFailures = entry.consecutiveFailures;
      const events = diffSnapshots(previous, snapshot, { sizeEpsilon: this.sizeEpsilon });
      this.registry.recordSuccess(entry, snapshot, this.now());

      if (previous === null) {
        logger.info('Baseline established', {
          traderId,
          alias: entry.alias,
          positionCount: snapshot.positions.size,
        });
      }

      const health = this.publishHealth(entry);
      if (previousFailures >= this.failureThreshold) {
        logger.info('Trader recovered', { traderId, previousFailures });
        this.emit('recovered', health);
      }

      if (events.length === 0) {
        return;
      }

      logger.info('Detected position changes', {
        traderId,
        alias: entry.alias,
        changeCount: events.length,
      });
      this.emit('positionEvents', traderId, events);

      await this.dispatchEvents(entry, events, signal);
    } catch (error) {
      logger.error('Polling cycle failed', { traderId, error: describeError(error) });
    }
  }

  private handleFetchFailure(entry: Readonly<TraderState>, error: unknown): void {
    const failures = this.registry.recordFailure(entry, error);
    if (failures === null) {
      return;
    }

    logger.warn('Failed to fetch positions', {
      traderId: entry.traderId,
      consecutiveFailures: failures,
      error: describeError(error),
    });

    const health = this.publishHealth(entry);
    if (failures === this.failureThreshold) {
      logger.warn('Trader degraded', {
        traderId: entry.traderId,
        consecutiveFailures: failures,
      });
      this.emit('degraded', health);
    }
  }

  private async dispatchEvents(
    entry: Readonly<TraderState>,
    events: PositionEvent[],
    signal: AbortSignal
  ): Promise<void> {
    for (const [index, event] of events.entries()) {
      if (signal.aborted) {
        logger.info('Dispatch interrupted by shutdown', {
          traderId: entry.traderId,
          undelivered: events.length - index,
        });
        return;
      }

      try {
        const delivered = await untilAborted(this.dispatcher.dispatch(event, entry.alias), signal);
        if (!delivered) {
          logger.info('Dispatch interrupted by shutdown', {
            traderId: entry.traderId,
            undelivered: events.length - index,
          });
          return;
        }
      } catch (error) {
        // Not re-queued: the next real change still fires on its own
        logger.error('Failed to deliver notification', {
          traderId: entry.traderId,
          key: event.key,
          kind: event.kind,
          error: describeError(error),
        });
        this.emit('deliveryFailed', event, error);
      }
    }
  }

  private publishHealth(state: Readonly<TraderState>): TraderHealth {
    const health = this.toHealth(state);
    this.emit('health', health);
    return health;
  }

  private toHealth(state: Readonly<TraderState>): TraderHealth {
    return {
      traderId: state.traderId,
      alias: state.alias,
      status: !state.enabled ? 'disabled' : state.snapshot === null ? 'uninitialized' : 'active',
      enabled: state.enabled,
      degraded: state.consecutiveFailures >= this.failureThreshold,
      inFlight: this.cycles.has(state.traderId),
      consecutiveFailures: state.consecutiveFailures,
      positionCount: state.snapshot?.positions.size ?? 0,
      lastPollAt: state.lastPollAt,
      lastSuccessAt: state.lastSuccessAt,
      lastError: state.lastError,
    };
  }
}
