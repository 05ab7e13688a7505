/**
 * Notification Templates
 * Renders position events and trader status as Telegram HTML
 */

import {
  LeadTraderSummary,
  Position,
  PositionEvent,
  PositionEventKind,
  PositionSide,
  TraderHealth,
} from '../../types/monitor';

const ACTION_LABELS: Record<PositionEventKind, Record<PositionSide, string>> = {
  OPEN: { long: '🟢 Open long', short: '🔴 Open short' },
  CLOSE: { long: '🔵 Close long', short: '🟠 Close short' },
  INCREASE: { long: '🟢 Add to long', short: '🔴 Add to short' },
  DECREASE: { long: '🔵 Reduce long', short: '🟠 Reduce short' },
};

const STATUS_ICONS: Record<TraderHealth['status'], string> = {
  active: '🟢',
  uninitialized: '⏳',
  disabled: '⏸️',
};

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function formatAmount(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 8 });
}

export function formatUsd(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatSigned(value: number): string {
  const sign = value > 0 ? '+' : value < 0 ? '-' : '';
  return `${sign}${formatUsd(Math.abs(value))}`;
}

/** `YYYY-MM-DD HH:mm:ss UTC` */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}

export function baseCurrency(instId: string): string {
  return instId.split('-')[0] || instId;
}

export function formatPositionEvent(event: PositionEvent, alias: string): string {
  const coin = escapeHtml(baseCurrency(event.instId));
  const deltaSign = event.sizeAfter > event.sizeBefore ? '+' : '-';

  const lines = [
    '🔔 <b>Position update</b>',
    '',
    `Trader: <b>${escapeHtml(alias)}</b>`,
    `Action: ${ACTION_LABELS[event.kind][event.side]}`,
    `Instrument: ${escapeHtml(event.instId)}`,
    `Size: ${formatAmount(event.sizeBefore)} → ${formatAmount(event.sizeAfter)} ${coin} (${deltaSign}${formatAmount(event.sizeDelta)})`,
    `Price: $${formatAmount(event.price)}`,
    `Notional: $${formatUsd(event.notionalDelta)}`,
  ];

  if (event.pnlDelta !== null) {
    lines.push(`PnL: ${formatSigned(event.pnlDelta)}`);
  }
  if (event.leverage !== undefined) {
    lines.push(`Leverage: ${formatAmount(event.leverage)}x`);
  }

  lines.push('', `Time: ${formatTimestamp(event.detectedAt)}`);
  return lines.join('\n');
}

export function formatHealthLine(health: TraderHealth): string {
  const icon = health.degraded ? '⚠️' : STATUS_ICONS[health.status];
  const parts = [
    `${icon} <b>${escapeHtml(health.alias)}</b> <code>${health.traderId}</code>`,
    `status: ${health.status}${health.degraded ? ' (degraded)' : ''}`,
    `positions: ${health.positionCount}`,
  ];

  if (health.lastPollAt) {
    parts.push(`last poll: ${formatTimestamp(health.lastPollAt)}`);
  }
  if (health.consecutiveFailures > 0) {
    parts.push(`failures: ${health.consecutiveFailures}`);
  }
  if (health.lastError) {
    parts.push(`last error: ${escapeHtml(health.lastError.message)}`);
  }

  return parts.join('\n   ');
}

export function formatStatusReport(healths: TraderHealth[], running: boolean): string {
  const header = `📡 <b>Monitor ${running ? 'running' : 'stopped'}</b> · ${healths.length} trader(s)`;
  if (healths.length === 0) {
    return `${header}\n\nNo traders monitored. Use /add &lt;link or id&gt; [alias].`;
  }
  return `${header}\n\n${healths.map(formatHealthLine).join('\n\n')}`;
}

export function formatPositionsList(alias: string, positions: Position[]): string {
  const header = `📊 <b>${escapeHtml(alias)}</b> · ${positions.length} open position(s)`;
  if (positions.length === 0) {
    return header;
  }

  const lines = positions.map(position => {
    const pnl = position.unrealizedPnl !== undefined ? ` · PnL ${formatSigned(position.unrealizedPnl)}` : '';
    const leverage = position.leverage !== undefined ? ` · ${formatAmount(position.leverage)}x` : '';
    return `• ${escapeHtml(position.instId)} ${position.side} ${formatAmount(position.size)} @ $${formatAmount(position.entryPrice)}${leverage}${pnl}`;
  });

  return `${header}\n\n${lines.join('\n')}`;
}

export function formatLeadTraderList(traders: LeadTraderSummary[]): string {
  if (traders.length === 0) {
    return '📭 No lead traders found.';
  }

  const lines = traders.map((trader, index) => {
    const pnl = trader.pnl !== undefined ? ` · PnL ${formatSigned(trader.pnl)}` : '';
    const winRatio = trader.winRatio !== undefined ? ` · win ${(trader.winRatio * 100).toFixed(1)}%` : '';
    return `${index + 1}. <b>${escapeHtml(trader.alias)}</b> <code>${trader.id}</code>${pnl}${winRatio}`;
  });

  return `🏆 <b>Lead traders</b>\n\n${lines.join('\n')}`;
}

export function formatMonitorStarted(healths: TraderHealth[], pollIntervalSeconds: number): string {
  const traders = healths.length > 0 ? healths.map(health => escapeHtml(health.alias)).join(', ') : 'none';
  return [
    '🚀 <b>Position monitor started</b>',
    '',
    `Traders: ${traders}`,
    `Poll interval: ${formatAmount(pollIntervalSeconds)}s`,
  ].join('\n');
}

export function formatMonitorStopped(): string {
  return '⏹️ <b>Position monitor stopped</b>';
}
