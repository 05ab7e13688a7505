import { ErrorType, InvalidInputError } from '../utils/error-handler';

declare const traderIdBrand: unique symbol;

/**
 * OKX lead-trader `uniqueCode`. Only produced by {@link toTraderId}, so any
 * value of this type has passed validation.
 */
export type TraderId = string & { readonly [traderIdBrand]: true };

const TRADER_ID_PATTERN = /^[A-Za-z0-9]{12,20}$/;

export function isTraderId(value: string): value is TraderId {
  return TRADER_ID_PATTERN.test(value);
}

export function toTraderId(value: string): TraderId {
  const trimmed = value.trim();
  if (!isTraderId(trimmed)) {
    throw new InvalidInputError(`Invalid trader id: "${value}"`);
  }
  return trimmed;
}

export type PositionSide = 'long' | 'short';

export interface Position {
  readonly key: string;
  readonly instId: string;
  readonly side: PositionSide;
  /** Magnitude, always > 0 */
  readonly size: number;
  readonly entryPrice: number;
  readonly markPrice?: number;
  readonly unrealizedPnl?: number;
  readonly leverage?: number;
}

export interface PositionSnapshot {
  readonly traderId: TraderId;
  readonly observedAt: Date;
  readonly positions: ReadonlyMap<string, Position>;
}

export type PositionEventKind = 'OPEN' | 'CLOSE' | 'INCREASE' | 'DECREASE';

export interface PositionEvent {
  traderId: TraderId;
  key: string;
  instId: string;
  side: PositionSide;
  kind: PositionEventKind;
  sizeBefore: number;
  sizeAfter: number;
  price: number;
  sizeDelta: number;
  notionalDelta: number;
  /** null when either snapshot did not report PnL */
  pnlDelta: number | null;
  leverage?: number;
  detectedAt: Date;
}

export interface TraderError {
  type: ErrorType;
  message: string;
}

export interface TraderState {
  readonly traderId: TraderId;
  alias: string;
  enabled: boolean;
  /** null until the first successful fetch establishes a baseline */
  snapshot: PositionSnapshot | null;
  consecutiveFailures: number;
  lastPollAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: TraderError | null;
}

export type TraderStatus = 'uninitialized' | 'active' | 'disabled';

export interface TraderHealth {
  traderId: TraderId;
  alias: string;
  status: TraderStatus;
  enabled: boolean;
  degraded: boolean;
  inFlight: boolean;
  consecutiveFailures: number;
  positionCount: number;
  lastPollAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: TraderError | null;
}

export interface LeadTraderSummary {
  id: TraderId;
  alias: string;
  pnl?: number;
  pnlRatio?: number;
  winRatio?: number;
  aum?: number;
  copyTraderNum?: number;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/** Retrieves the current open positions of one trader. */
export interface SnapshotFetcher {
  fetchPositions(traderId: TraderId, options?: FetchOptions): Promise<PositionSnapshot>;
}

/** Delivers one event; rejects with DeliveryError. */
export interface EventDispatcher {
  dispatch(event: PositionEvent, alias: string): Promise<void>;
}

export interface LeadTraderDirectory {
  listLeadTraders(limit?: number): Promise<LeadTraderSummary[]>;
}
