import { PositionSnapshot, TraderId, toTraderId } from '@/types/monitor';
import { PositionInput, createSnapshot } from '@/services/position-monitor/position-diff-detector';

export const TRADER_X: TraderId = toTraderId('TRADERX000000001');
export const TRADER_Y: TraderId = toTraderId('TRADERY000000002');

export const OBSERVED_AT = new Date('2024-03-01T00:00:00.000Z');

export type RowInput = Omit<PositionInput, 'entryPrice'> & { entryPrice?: number };

export function snapshotOf(
  rows: RowInput[],
  traderId: TraderId = TRADER_X,
  observedAt: Date = OBSERVED_AT
): PositionSnapshot {
  return createSnapshot(
    traderId,
    rows.map(row => ({ entryPrice: 100, ...row })),
    observedAt
  );
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
