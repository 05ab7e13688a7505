/**
 * Wire shapes of the OKX v5 REST API. All numeric fields arrive as strings,
 * empty when not applicable.
 */

export interface OkxSubPosition {
  instId: string;
  instType?: string;
  posSide: string;
  subPos: string;
  subPosId?: string;
  openAvgPx: string;
  markPx?: string;
  upl?: string;
  uplRatio?: string;
  lever?: string;
  margin?: string;
  mgnMode?: string;
  openTime?: string;
  ccy?: string;
}

export interface OkxLeadTraderRank {
  uniqueCode: string;
  nickName: string;
  portLink?: string;
  pnl?: string;
  pnlRatio?: string;
  winRatio?: string;
  aum?: string;
  copyTraderNum?: string;
  accCopyTraderNum?: string;
}
