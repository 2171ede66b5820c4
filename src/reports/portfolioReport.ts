import Decimal from 'decimal.js';
import { InstrumentIndex, Position } from '@/models';
import { INSTRUMENT_TYPES } from '@/constants/instruments';
import { dotLeader, formatAmount, rule, signPrefix } from './format';

const WIDTH = 80;

function metric(label: string, value: string): string {
  return `    ${dotLeader(label, 24)} ${value}`;
}

/**
 * Open positions with instrument metadata, position value and unrealised P/L
 *
 * Tickers missing from `instruments` are shown by ticker only. Money is
 * summed with decimal.js so totals don't drift.
 */
export function formatPortfolio(
  positions: readonly Position[],
  instruments?: InstrumentIndex
): string[] {
  if (positions.length === 0) {
    return ['', rule('=', WIDTH), 'PORTFOLIO', rule('=', WIDTH), 'No open positions', rule('=', WIDTH), ''];
  }

  const lines = [
    '',
    rule('=', WIDTH),
    `PORTFOLIO - ${positions.length} Position(s)`,
    rule('=', WIDTH),
    '',
  ];

  let totalValue = new Decimal(0);
  let totalPpl = new Decimal(0);

  for (const position of positions) {
    const instrument = instruments?.get(position.ticker);
    const name = instrument?.name ?? position.ticker;
    const shortName = instrument?.shortName ?? position.ticker;
    const type = instrument?.type ?? INSTRUMENT_TYPES.STOCK;

    const positionValue = new Decimal(position.quantity).times(position.currentPrice);
    const costBasis = new Decimal(position.quantity).times(position.averagePrice);
    const pplPercent = costBasis.isZero()
      ? new Decimal(0)
      : new Decimal(position.ppl).dividedBy(costBasis).times(100);

    totalValue = totalValue.plus(positionValue);
    totalPpl = totalPpl.plus(position.ppl);

    const displayName =
      type === INSTRUMENT_TYPES.STOCK ? `${name} (${shortName})` : `${name} (${shortName} ${type})`;

    lines.push(
      `  ${displayName}`,
      `  ISIN: ${instrument?.isin ?? 'N/A'}`,
      metric('Quantity', formatAmount(position.quantity).padStart(20)),
      metric('Avg Price', formatAmount(position.averagePrice).padStart(20)),
      metric('Current Price', formatAmount(position.currentPrice).padStart(20)),
      metric('Position Value', formatAmount(positionValue).padStart(20)),
      metric(
        'Unrealised PnL',
        `${signPrefix(position.ppl)}${formatAmount(position.ppl).padStart(19)} ` +
          `(${signPrefix(pplPercent)}${pplPercent.toFixed(2)}%)`
      ),
      ''
    );
  }

  lines.push(
    rule('-', WIDTH),
    `  ${dotLeader('Total Portfolio Value', 24)} ${formatAmount(totalValue).padStart(20)}`,
    `  ${dotLeader('Total Unrealised PnL', 24)} ${signPrefix(totalPpl)}${formatAmount(totalPpl).padStart(19)}`,
    rule('=', WIDTH),
    ''
  );

  return lines;
}
