import {
  AccountStatus,
  ArbitrageReport,
  ExecutionOutcome,
  MarketStatus,
  ProfitEstimate,
} from '../arbitrage/arbitrage.interface';
import { ProfitCalculator } from '../arbitrage/profit-calculator';
import { formatSigned, formatUsd } from '../common/helper';
import { LoopAck } from '../scheduler/loop.interface';
import { TradeRecord, TradingMode } from '../trading/trade.interface';

// Telegram HTML parse mode

export const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export const modeLabel = (mode: TradingMode): string =>
  mode === 'simulation' ? 'Simulation' : 'Real';

const percent = (value: number) => ProfitCalculator.formatProfitPercentage(value);

const route = (estimate: ProfitEstimate) => `${estimate.buyVenue} → ${estimate.sellVenue}`;

export function formatError(message: string): string {
  return `<b>❗ ${escapeHtml(message)}</b>`;
}

export function formatMarketStatus(status: MarketStatus, mode: TradingMode, quoteCurrency: string): string {
  const { a, b } = status.quotes;
  return [
    `<b>📊 Prices for ${status.symbol} (${modeLabel(mode)})</b>`,
    '',
    `<b>${a.venue}:</b> Ask <b>${formatUsd(a.ask)} ${quoteCurrency}</b>, Bid <b>${formatUsd(a.bid)} ${quoteCurrency}</b>`,
    `<b>${b.venue}:</b> Ask <b>${formatUsd(b.ask)} ${quoteCurrency}</b>, Bid <b>${formatUsd(b.bid)} ${quoteCurrency}</b>`,
    '',
    '<b>Spreads:</b>',
    `• ${a.venue} → ${b.venue}: <b>${formatUsd(status.spreads.A_TO_B)} ${quoteCurrency}</b>`,
    `• ${b.venue} → ${a.venue}: <b>${formatUsd(status.spreads.B_TO_A)} ${quoteCurrency}</b>`,
  ].join('\n');
}

export function formatLeg(record: TradeRecord): string {
  const head = `${record.action} ${record.venue} @ ${formatUsd(record.price)}`;
  switch (record.status) {
    case 'SIMULATED':
      return `${head}: simulated`;
    case 'FILLED':
      return `${head}: filled (order ${escapeHtml(record.orderId ?? 'n/a')})`;
    case 'FAILED':
      return `${head}: FAILED (${escapeHtml(record.failureReason ?? 'unknown error')})`;
  }
}

export function formatExecution(execution: ExecutionOutcome, quoteCurrency: string): string[] {
  const lines = [
    `• ${formatLeg(execution.buy)}`,
    `• ${formatLeg(execution.sell)}`,
    `Expected profit: <b>${formatUsd(execution.expectedProfit)} ${quoteCurrency}</b>`,
  ];

  if (execution.partial) {
    const failed = execution.buy.status === 'FAILED' ? execution.buy : execution.sell;
    const held = failed === execution.buy ? execution.sell : execution.buy;
    lines.push(
      `<b>⚠️ Partial execution: ${held.action} on ${held.venue} went through but ${failed.action} on ${failed.venue} failed. Manual intervention required.</b>`,
    );
  } else if (execution.buy.status === 'FAILED') {
    lines.push('<b>⚠️ Both legs failed. No position was opened.</b>');
  }

  return lines;
}

export function formatArbitrageReport(report: ArbitrageReport, mode: TradingMode, quoteCurrency: string): string {
  const { a, b } = report.quotes;
  const { A_TO_B: aToB, B_TO_A: bToA } = report.estimates;

  const lines = [
    `<b>📊 Arbitrage analysis for ${report.symbol} (${modeLabel(mode)})</b>`,
    '',
    `<b>${a.venue}:</b> Ask = <b>${formatUsd(a.ask)}</b>, Bid = <b>${formatUsd(a.bid)}</b>`,
    `<b>${b.venue}:</b> Ask = <b>${formatUsd(b.ask)}</b>, Bid = <b>${formatUsd(b.bid)}</b>`,
    '',
    '<b>Estimated profit after fees:</b>',
    `• ${route(aToB)}: <b>${percent(aToB.netProfitPercent)}</b> (net ${formatUsd(aToB.netProfit)} ${quoteCurrency})`,
    `• ${route(bToA)}: <b>${percent(bToA.netProfitPercent)}</b> (net ${formatUsd(bToA.netProfit)} ${quoteCurrency})`,
    '',
  ];

  if (!report.plan) {
    lines.push(`<b>✅ No arbitrage opportunity</b> above ${percent(report.thresholdPercent)} (${modeLabel(mode)}).`);
    return lines.join('\n');
  }

  lines.push(
    `<b>🔴 Opportunity:</b> buy on <b>${report.plan.buy.venue}</b> and sell on <b>${report.plan.sell.venue}</b> (${modeLabel(mode)}).`,
  );
  if (report.execution) {
    lines.push(...formatExecution(report.execution, quoteCurrency));
  }
  return lines.join('\n');
}

/**
 * Push message for a loop iteration that traded.
 */
export function formatOpportunityNotification(
  report: ArbitrageReport & { execution: ExecutionOutcome },
  mode: TradingMode,
  quoteCurrency: string,
): string {
  const { estimate, buy, sell } = report.execution.plan;
  return [
    `<b>📊 ${modeLabel(mode)} opportunity for ${report.symbol}</b>`,
    `<b>${route(estimate)}:</b> ${percent(estimate.netProfitPercent)} (net ${formatUsd(estimate.netProfit)} ${quoteCurrency} per unit)`,
    `Buy on <b>${buy.venue}</b> at <b>${formatUsd(buy.price)}</b>, sell on <b>${sell.venue}</b> at <b>${formatUsd(sell.price)}</b>.`,
    ...formatExecution(report.execution, quoteCurrency),
  ].join('\n');
}

export function formatAccountStatus(status: AccountStatus): string {
  const lines = ['<b>💼 Account status</b>', ''];
  for (const account of status.venues) {
    lines.push(
      `<b>${account.venue}:</b> ${formatUsd(account.free)} ${status.currency} (${formatSigned(account.change)} ${status.currency})`,
    );
  }
  return lines.join('\n');
}

export function formatHistory(records: TradeRecord[], mode: TradingMode): string {
  if (records.length === 0) {
    return `<b>No ${modeLabel(mode).toLowerCase()} trades recorded yet.</b>`;
  }

  const rows = records.map((record) =>
    [
      record.timestamp.toISOString().replace('T', ' ').substring(0, 19),
      record.action.padEnd(4),
      record.venue.padEnd(8),
      formatUsd(record.price).padStart(10),
      record.status,
    ].join(' '),
  );
  return [
    `<b>📜 Recent trades (${modeLabel(mode)})</b>`,
    `<pre>${escapeHtml(rows.join('\n'))}</pre>`,
  ].join('\n');
}

export function formatLoopAck(ack: LoopAck, mode: TradingMode, pollingIntervalMs: number): string {
  const label = modeLabel(mode);
  switch (ack) {
    case 'STARTED':
      return `<b>🔄 ${label} arbitrage loop started (every ${pollingIntervalMs / 1000}s).</b>`;
    case 'ALREADY_RUNNING':
      return `<b>${label} arbitrage loop is already running.</b>`;
    case 'STOPPED':
      return `<b>⏹ ${label} arbitrage loop stopped.</b>`;
    case 'NOT_RUNNING':
      return `<b>No ${label.toLowerCase()} arbitrage loop is running.</b>`;
  }
}

export const HELP_TEXT = [
  '📖 <b>Available commands</b>',
  '',
  '<u>Simulation</u>',
  '• <b>/status</b> - prices and spreads',
  '• <b>/arbitrage</b> - analyse and simulate an arbitrage',
  '• <b>/account_status</b> - balances and change since first check',
  '• <b>/history [n]</b> - recent simulated trades',
  '• <b>/start_loop</b> - start the continuous simulation loop',
  '• <b>/stop_loop</b> - stop the simulation loop',
  '',
  '<u>Real trading</u>',
  '• <b>/real_status</b> - prices and spreads',
  '• <b>/real_account</b> - balances',
  '• <b>/real_history [n]</b> - recent real trades',
  '• <b>/real_arbitrage</b> - analyse and execute a real arbitrage',
  '• <b>/start_real_loop</b> - start the continuous real loop',
  '• <b>/stop_real_loop</b> - stop the real loop',
  '',
  '• <b>/help</b> - this message',
].join('\n');
