import {
  createSnapshot,
  diffSnapshots,
  getPositionKey,
} from '@/services/position-monitor/position-diff-detector';
import { Position, PositionEvent, PositionSnapshot } from '@/types/monitor';
import { OBSERVED_AT, TRADER_X, snapshotOf } from '../../../helpers/fixtures';

const BTC = 'BTC-USDT-SWAP';
const ETH = 'ETH-USDT-SWAP';
const SOL = 'SOL-USDT-SWAP';

function summarize(events: PositionEvent[]): string[] {
  return events.map(event => `${event.kind} ${event.key} ${event.sizeBefore}->${event.sizeAfter}`);
}

describe('diffSnapshots', () => {
  describe('baseline', () => {
    it('reports nothing without a previous snapshot', () => {
      const current = snapshotOf([
        { instId: BTC, posSide: 'long', size: 3 },
        { instId: ETH, posSide: 'short', size: 7 },
      ]);

      expect(diffSnapshots(null, current)).toEqual([]);
    });

    it('reports nothing for an empty first snapshot', () => {
      expect(diffSnapshots(null, snapshotOf([]))).toEqual([]);
    });
  });

  describe('scenarios', () => {
    it('orders an increase before an open', () => {
      const previous = snapshotOf([{ instId: BTC, posSide: 'long', size: 5 }]);
      const current = snapshotOf([
        { instId: BTC, posSide: 'long', size: 8 },
        { instId: ETH, posSide: 'short', size: 2 },
      ]);

      expect(summarize(diffSnapshots(previous, current))).toEqual([
        `INCREASE ${BTC}:long 5->8`,
        `OPEN ${ETH}:short 0->2`,
      ]);
    });

    it('closes a position that disappeared', () => {
      const previous = snapshotOf([{ instId: BTC, posSide: 'long', size: 10 }]);

      expect(summarize(diffSnapshots(previous, snapshotOf([])))).toEqual([`CLOSE ${BTC}:long 10->0`]);
    });

    it('reports a side flip as a close followed by an open', () => {
      const previous = snapshotOf([{ instId: BTC, posSide: 'long', size: 10 }]);
      const current = snapshotOf([{ instId: BTC, posSide: 'short', size: 10 }]);

      expect(summarize(diffSnapshots(previous, current))).toEqual([
        `CLOSE ${BTC}:long 10->0`,
        `OPEN ${BTC}:short 0->10`,
      ]);
    });

    it('reports a decrease that leaves part of the position open', () => {
      const previous = snapshotOf([{ instId: ETH, posSide: 'short', size: 6 }]);
      const current = snapshotOf([{ instId: ETH, posSide: 'short', size: 4 }]);

      expect(summarize(diffSnapshots(previous, current))).toEqual([`DECREASE ${ETH}:short 6->4`]);
    });
  });

  describe('zero-size positions', () => {
    const zeroSized = (instId: string): PositionSnapshot => ({
      traderId: TRADER_X,
      observedAt: OBSERVED_AT,
      positions: new Map<string, Position>([
        [`${instId}:long`, { key: `${instId}:long`, instId, side: 'long', size: 0, entryPrice: 100 }],
      ]),
    });

    it('closes a position whose size dropped to zero', () => {
      const previous = snapshotOf([{ instId: BTC, posSide: 'long', size: 5 }]);

      expect(summarize(diffSnapshots(previous, zeroSized(BTC)))).toEqual([`CLOSE ${BTC}:long 5->0`]);
    });

    it('does not open a position reported with zero size', () => {
      expect(diffSnapshots(snapshotOf([]), zeroSized(ETH))).toEqual([]);
    });

    it('opens a position that grows from zero size', () => {
      const current = snapshotOf([{ instId: ETH, posSide: 'long', size: 2 }]);

      expect(summarize(diffSnapshots(zeroSized(ETH), current))).toEqual([`OPEN ${ETH}:long 0->2`]);
    });
  });

  describe('properties', () => {
    const a = snapshotOf([
      { instId: BTC, posSide: 'long', size: 1 },
      { instId: ETH, posSide: 'long', size: 2 },
      { instId: SOL, posSide: 'short', size: 3 },
    ]);
    const b = snapshotOf([
      { instId: ETH, posSide: 'long', size: 2 },
      { instId: SOL, posSide: 'short', size: 5 },
      { instId: 'XRP-USDT-SWAP', posSide: 'long', size: 100 },
    ]);

    it('opens every key only in the new snapshot and closes every key only in the old one', () => {
      const events = diffSnapshots(a, b);

      expect(events.filter(event => event.kind === 'OPEN').map(event => event.key)).toEqual([
        'XRP-USDT-SWAP:long',
      ]);
      expect(events.filter(event => event.kind === 'CLOSE').map(event => event.key)).toEqual([
        `${BTC}:long`,
      ]);
      expect(events.filter(event => event.key === `${ETH}:long`)).toEqual([]);
      expect(events).toHaveLength(3);
    });

    it('reports nothing for identical snapshots', () => {
      expect(diffSnapshots(a, a)).toEqual([]);
      expect(diffSnapshots(b, snapshotOf([
        { instId: ETH, posSide: 'long', size: 2 },
        { instId: SOL, posSide: 'short', size: 5 },
        { instId: 'XRP-USDT-SWAP', posSide: 'long', size: 100 },
      ]))).toEqual([]);
    });

    it('reports nothing once the new snapshot has become the baseline', () => {
      expect(diffSnapshots(a, b)).not.toEqual([]);
      expect(diffSnapshots(b, b)).toEqual([]);
    });

    it('returns the same ordered output for equal inputs', () => {
      expect(diffSnapshots(a, b)).toEqual(diffSnapshots(a, b));
    });

    it('orders by kind, then by key', () => {
      const previous = snapshotOf([
        { instId: 'AAA-USDT-SWAP', posSide: 'long', size: 5 },
        { instId: 'BBB-USDT-SWAP', posSide: 'long', size: 5 },
        { instId: 'CCC-USDT-SWAP', posSide: 'long', size: 5 },
      ]);
      const current = snapshotOf([
        { instId: 'ZZZ-USDT-SWAP', posSide: 'long', size: 1 },
        { instId: 'CCC-USDT-SWAP', posSide: 'long', size: 7 },
        { instId: 'BBB-USDT-SWAP', posSide: 'long', size: 3 },
        { instId: 'DDD-USDT-SWAP', posSide: 'short', size: 1 },
      ]);

      expect(diffSnapshots(previous, current).map(event => `${event.kind} ${event.key}`)).toEqual([
        'CLOSE AAA-USDT-SWAP:long',
        'DECREASE BBB-USDT-SWAP:long',
        'INCREASE CCC-USDT-SWAP:long',
        'OPEN DDD-USDT-SWAP:short',
        'OPEN ZZZ-USDT-SWAP:long',
      ]);
    });
  });

  describe('size epsilon', () => {
    const previous = snapshotOf([{ instId: BTC, posSide: 'long', size: 1 }]);
    const current = snapshotOf([{ instId: BTC, posSide: 'long', size: 1.00005 }]);

    it('ignores changes within the default epsilon', () => {
      expect(diffSnapshots(previous, current)).toEqual([]);
    });

    it('uses the configured epsilon', () => {
      expect(diffSnapshots(previous, current, { sizeEpsilon: 0 }).map(event => event.kind)).toEqual([
        'INCREASE',
      ]);
    });

    it('still reports changes larger than the epsilon', () => {
      const grown = snapshotOf([{ instId: BTC, posSide: 'long', size: 1.5 }]);
      expect(diffSnapshots(previous, grown, { sizeEpsilon: 0.1 }).map(event => event.kind)).toEqual([
        'INCREASE',
      ]);
    });
  });

  describe('derived metrics', () => {
    it('prices an open at its entry price', () => {
      const previous = snapshotOf([]);
      const current = snapshotOf([
        { instId: ETH, posSide: 'short', size: 2, entryPrice: 2000, unrealizedPnl: -5, leverage: 10 },
      ]);

      expect(diffSnapshots(previous, current)).toEqual([
        {
          traderId: TRADER_X,
          key: `${ETH}:short`,
          instId: ETH,
          side: 'short',
          kind: 'OPEN',
          sizeBefore: 0,
          sizeAfter: 2,
          price: 2000,
          sizeDelta: 2,
          notionalDelta: 4000,
          pnlDelta: -5,
          leverage: 10,
          detectedAt: OBSERVED_AT,
        },
      ]);
    });

    it('prices a close at the last mark price and reports its unrealized pnl', () => {
      const previous = snapshotOf([
        { instId: BTC, posSide: 'long', size: 10, entryPrice: 100, markPrice: 110, unrealizedPnl: 100 },
      ]);

      const [event] = diffSnapshots(previous, snapshotOf([]));
      expect(event).toMatchObject({ kind: 'CLOSE', price: 110, sizeDelta: 10, notionalDelta: 1100, pnlDelta: 100 });
    });

    it('prices a decrease at the current mark price and diffs the pnl', () => {
      const previous = snapshotOf([
        { instId: BTC, posSide: 'long', size: 10, entryPrice: 100, unrealizedPnl: 50 },
      ]);
      const current = snapshotOf([
        { instId: BTC, posSide: 'long', size: 4, entryPrice: 100, markPrice: 120, unrealizedPnl: 30 },
      ]);

      const [event] = diffSnapshots(previous, current);
      expect(event).toMatchObject({ kind: 'DECREASE', price: 120, sizeDelta: 6, notionalDelta: 720, pnlDelta: -20 });
    });

    it('marks pnl as unavailable when either side did not report it', () => {
      const previous = snapshotOf([{ instId: BTC, posSide: 'long', size: 1, unrealizedPnl: 3 }]);
      const current = snapshotOf([{ instId: BTC, posSide: 'long', size: 2, entryPrice: 150 }]);

      const [event] = diffSnapshots(previous, current);
      expect(event).toMatchObject({ kind: 'INCREASE', price: 150, notionalDelta: 150, pnlDelta: null });
    });

    it('stamps events with the observation time unless told otherwise', () => {
      const previous = snapshotOf([]);
      const current = snapshotOf([{ instId: BTC, posSide: 'long', size: 1 }]);
      const detectedAt = new Date('2024-03-02T00:00:00.000Z');

      expect(diffSnapshots(previous, current)[0]?.detectedAt).toEqual(OBSERVED_AT);
      expect(diffSnapshots(previous, current, { detectedAt })[0]?.detectedAt).toEqual(detectedAt);
    });
  });
});

describe('createSnapshot', () => {
  it('keys positions by instrument and side', () => {
    expect(getPositionKey({ instId: BTC, side: 'short' })).toBe(`${BTC}:short`);
  });

  it('folds sub-positions of one key into a single position', () => {
    const snapshot = createSnapshot(TRADER_X, [
      { instId: BTC, posSide: 'long', size: 2, entryPrice: 100, unrealizedPnl: 10, leverage: 3 },
      { instId: BTC, posSide: 'long', size: 3, entryPrice: 200, unrealizedPnl: 5, leverage: 5, markPrice: 210 },
    ]);

    expect(snapshot.positions.get(`${BTC}:long`)).toEqual({
      key: `${BTC}:long`,
      instId: BTC,
      side: 'long',
      size: 5,
      entryPrice: 160,
      markPrice: 210,
      unrealizedPnl: 15,
      leverage: 5,
    });
  });

  it('drops the folded pnl when one sub-position did not report it', () => {
    const snapshot = createSnapshot(TRADER_X, [
      { instId: BTC, posSide: 'long', size: 2, entryPrice: 100, unrealizedPnl: 10 },
      { instId: BTC, posSide: 'long', size: 2, entryPrice: 100 },
    ]);

    expect(snapshot.positions.get(`${BTC}:long`)?.unrealizedPnl).toBeUndefined();
  });

  it('takes the side of a net position from the sign of its size', () => {
    const snapshot = createSnapshot(TRADER_X, [
      { instId: ETH, posSide: 'net', size: -1.5, entryPrice: 2500 },
      { instId: SOL, posSide: 'net', size: 4, entryPrice: 90 },
    ]);

    expect(Array.from(snapshot.positions.keys()).sort()).toEqual([`${ETH}:short`, `${SOL}:long`]);
    expect(snapshot.positions.get(`${ETH}:short`)?.size).toBe(1.5);
  });

  it('skips empty and unreadable rows', () => {
    const snapshot = createSnapshot(TRADER_X, [
      { instId: BTC, posSide: 'long', size: 0, entryPrice: 100 },
      { instId: ETH, posSide: 'long', size: Number.NaN, entryPrice: 100 },
      { instId: SOL, posSide: 'long', size: 1, entryPrice: Number.NaN },
      { instId: '', posSide: 'long', size: 1, entryPrice: 100 },
    ]);

    expect(snapshot.positions.size).toBe(0);
  });

  it('freezes the snapshot and its positions', () => {
    const snapshot = createSnapshot(TRADER_X, [{ instId: BTC, posSide: 'long', size: 1, entryPrice: 1 }]);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.positions.get(`${BTC}:long`))).toBe(true);
  });
});
