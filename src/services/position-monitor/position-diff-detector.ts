/**
 * Position Diff Detector
 * Compares two position snapshots of one trader and classifies every change
 * as OPEN, CLOSE, INCREASE or DECREASE
 */

import {
  Position,
  PositionEvent,
  PositionEventKind,
  PositionSide,
  PositionSnapshot,
  TraderId,
} from '../../types/monitor';

export const DEFAULT_SIZE_EPSILON = 0.0001;

// CLOSE first so a flip reads as "closed long, opened short"
const KIND_PRIORITY: Record<PositionEventKind, number> = {
  CLOSE: 0,
  DECREASE: 1,
  INCREASE: 2,
  OPEN: 3,
};

export interface DiffOptions {
  /** Size changes at or below this are treated as feed rounding */
  sizeEpsilon?: number;
  detectedAt?: Date;
}

/**
 * One exchange row before aggregation. `posSide` is the exchange's raw value:
 * `long`, `short`, or `net` (side taken from the sign of `size`).
 */
export interface PositionInput {
  instId: string;
  posSide: string;
  size: number;
  entryPrice: number;
  markPrice?: number;
  unrealizedPnl?: number;
  leverage?: number;
}

/**
 * Create a unique key for a position (instrument + side)
 */
export function getPositionKey(position: { instId: string; side: PositionSide }): string {
  return `${position.instId}:${position.side}`;
}

function resolveSide(posSide: string, size: number): PositionSide {
  const normalized = posSide.trim().toLowerCase();
  if (normalized === 'long' || normalized === 'short') {
    return normalized;
  }
  return size < 0 ? 'short' : 'long';
}

function mergeOptional(
  a: number | undefined,
  b: number | undefined,
  merge: (x: number, y: number) => number
): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return merge(a, b);
}

/**
 * Build a snapshot from raw exchange rows. Rows sharing a key (copy-trading
 * sub-positions) are folded into one position: sizes add up, the entry price
 * becomes the size-weighted average. Unrealized PnL is only kept when every
 * row of the key reported it.
 */
export function createSnapshot(
  traderId: TraderId,
  rows: PositionInput[],
  observedAt: Date = new Date()
): PositionSnapshot {
  const merged = new Map<string, Position>();
  const pnlMissing = new Set<string>();

  for (const row of rows) {
    if (!row.instId || !Number.isFinite(row.size) || row.size === 0) continue;
    if (!Number.isFinite(row.entryPrice)) continue;

    const side = resolveSide(row.posSide, row.size);
    const size = Math.abs(row.size);
    const key = getPositionKey({ instId: row.instId, side });
    const existing = merged.get(key);

    if (row.unrealizedPnl === undefined) {
      pnlMissing.add(key);
    }

    if (!existing) {
      merged.set(key, {
        key,
        instId: row.instId,
        side,
        size,
        entryPrice: row.entryPrice,
        markPrice: row.markPrice,
        unrealizedPnl: row.unrealizedPnl,
        leverage: row.leverage,
      });
      continue;
    }

    const totalSize = existing.size + size;
    merged.set(key, {
      key,
      instId: existing.instId,
      side,
      size: totalSize,
      entryPrice: (existing.entryPrice * existing.size + row.entryPrice * size) / totalSize,
      markPrice: row.markPrice ?? existing.markPrice,
      unrealizedPnl: mergeOptional(existing.unrealizedPnl, row.unrealizedPnl, (x, y) => x + y),
      leverage: mergeOptional(existing.leverage, row.leverage, Math.max),
    });
  }

  const positions = new Map<string, Position>();
  for (const [key, position] of merged) {
    const unrealizedPnl = pnlMissing.has(key) ? undefined : position.unrealizedPnl;
    positions.set(key, Object.freeze({ ...position, unrealizedPnl }));
  }

  return Object.freeze({ traderId, observedAt, positions });
}

function buildEvent(
  kind: PositionEventKind,
  before: Position | undefined,
  after: Position | undefined,
  traderId: TraderId,
  detectedAt: Date
): PositionEvent | null {
  const reference = after ?? before;
  if (!reference) return null;

  const sizeBefore = before?.size ?? 0;
  const sizeAfter = after?.size ?? 0;
  const sizeDelta = Math.abs(sizeAfter - sizeBefore);

  let price: number;
  let pnlDelta: number | null;

  switch (kind) {
    case 'OPEN':
      price = reference.entryPrice;
      pnlDelta = after?.unrealizedPnl ?? null;
      break;
    case 'CLOSE':
      price = before?.markPrice ?? reference.entryPrice;
      pnlDelta = before?.unrealizedPnl ?? null;
      break;
    case 'INCREASE':
      price = reference.entryPrice;
      pnlDelta = pnlDifference(before, after);
      break;
    default:
      price = after?.markPrice ?? before?.entryPrice ?? reference.entryPrice;
      pnlDelta = pnlDifference(before, after);
      break;
  }

  return {
    traderId,
    key: reference.key,
    instId: reference.instId,
    side: reference.side,
    kind,
    sizeBefore,
    sizeAfter,
    price,
    sizeDelta,
    notionalDelta: sizeDelta * price,
    pnlDelta,
    leverage: after?.leverage ?? before?.leverage,
    detectedAt,
  };
}

function pnlDifference(before?: Position, after?: Position): number | null {
  if (before?.unrealizedPnl === undefined || after?.unrealizedPnl === undefined) {
    return null;
  }
  return after.unrealizedPnl - before.unrealizedPnl;
}

export function compareEvents(a: PositionEvent, b: PositionEvent): number {
  const byKind = KIND_PRIORITY[a.kind] - KIND_PRIORITY[b.kind];
  if (byKind !== 0) return byKind;
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

/**
 * Detect changes between two snapshots of the same trader.
 *
 * A null `previous` means no baseline yet: nothing is reported and `current`
 * becomes the baseline. A side flip surfaces as CLOSE of the old key plus OPEN
 * of the new one, since the side is part of the key. A position whose size is
 * within the epsilon of zero is treated as absent on either side.
 *
 * Pure: equal inputs always give the same ordered output.
 */
export function diffSnapshots(
  previous: PositionSnapshot | null,
  current: PositionSnapshot,
  options: DiffOptions = {}
): PositionEvent[] {
  if (previous === null) {
    return [];
  }

  const epsilon = options.sizeEpsilon ?? DEFAULT_SIZE_EPSILON;
  const detectedAt = options.detectedAt ?? current.observedAt;
  const traderId = current.traderId;
  const events: PositionEvent[] = [];

  const push = (kind: PositionEventKind, before?: Position, after?: Position): void => {
    const event = buildEvent(kind, before, after, traderId, detectedAt);
    if (event) events.push(event);
  };

  // A size within epsilon of zero counts as no position at all
  const held = (snapshot: PositionSnapshot, key: string): Position | undefined => {
    const position = snapshot.positions.get(key);
    return position && position.size > epsilon ? position : undefined;
  };

  for (const key of current.positions.keys()) {
    const after = held(current, key);
    if (!after) continue;

    const before = held(previous, key);
    if (!before) {
      push('OPEN', undefined, after);
      continue;
    }

    const change = after.size - before.size;
    if (Math.abs(change) <= epsilon) continue;

    push(change > 0 ? 'INCREASE' : 'DECREASE', before, after);
  }

  for (const key of previous.positions.keys()) {
    const before = held(previous, key);
    if (before && !held(current, key)) {
      push('CLOSE', before, undefined);
    }
  }

  return events.sort(compareEvents);
}
