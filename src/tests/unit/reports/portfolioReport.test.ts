import { formatPortfolio } from '@/reports/portfolioReport';
import { Instrument } from '@/models';
import { buildInstrument, buildPosition } from '@/tests/utils/fakes';

describe('formatPortfolio', () => {
  const positions = [
    buildPosition({ ticker: 'VUSAl_EQ', quantity: 10, averagePrice: 75.5, currentPrice: 80.25, ppl: 47.5 }),
    buildPosition({ ticker: 'XYZ_US_EQ', quantity: 2, averagePrice: 50, currentPrice: 40, ppl: -20 }),
  ];

  const instruments = new Map<string, Instrument>([
    [
      'VUSAl_EQ',
      buildInstrument({
        ticker: 'VUSAl_EQ',
        name: 'Vanguard S&P 500',
        shortName: 'VUSA',
        type: 'ETF',
        isin: 'IE00B3XXRP09',
      }),
    ],
  ]);

  it('should report a position with its instrument metadata', () => {
    const lines = formatPortfolio(positions, instruments);

    expect(lines.slice(0, 13)).toEqual([
      '',
      '='.repeat(80),
      'PORTFOLIO - 2 Position(s)',
      '='.repeat(80),
      '',
      '  Vanguard S&P 500 (VUSA ETF)',
      '  ISIN: IE00B3XXRP09',
      '    Quantity................                10.00',
      '    Avg Price...............                75.50',
      '    Current Price...........                80.25',
      '    Position Value..........               802.50',
      '    Unrealised PnL.......... +              47.50 (+6.29%)',
      '',
    ]);
  });

  it('should fall back to the ticker when the instrument is unknown', () => {
    const lines = formatPortfolio(positions, instruments);

    expect(lines.slice(13, 20)).toEqual([
      '  XYZ_US_EQ (XYZ_US_EQ)',
      '  ISIN: N/A',
      '    Quantity................                 2.00',
      '    Avg Price...............                50.00',
      '    Current Price...........                40.00',
      '    Position Value..........                80.00',
      '    Unrealised PnL..........              -20.00 (-20.00%)',
    ]);
  });

  it('should total value and unrealised P/L', () => {
    const lines = formatPortfolio(positions);

    expect(lines.slice(-5)).toEqual([
      '-'.repeat(80),
      '  Total Portfolio Value...               882.50',
      '  Total Unrealised PnL.... +              27.50',
      '='.repeat(80),
      '',
    ]);
  });

  it('should show 0% P/L for a zero cost basis', () => {
    const lines = formatPortfolio([
      buildPosition({ ticker: 'FREE_US_EQ', quantity: 1, averagePrice: 0, currentPrice: 5, ppl: 5 }),
    ]);

    expect(lines).toContain('    Unrealised PnL.......... +               5.00 (+0.00%)');
  });

  it('should say so when there are no positions', () => {
    expect(formatPortfolio([])).toEqual([
      '',
      '='.repeat(80),
      'PORTFOLIO',
      '='.repeat(80),
      'No open positions',
      '='.repeat(80),
      '',
    ]);
  });
});
