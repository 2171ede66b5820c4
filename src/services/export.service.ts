import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { InstrumentIndex, Position } from '@/models';
import { ILogger } from '@/interfaces/ILogger';
import { ValidationError } from '@/errors';
import { STORAGE_CATEGORIES, YAHOO_CSV_HEADERS, YahooCsvColumn } from '@/constants/instruments';
import { SnapshotStore } from '@/storage/snapshot.store';
import { classifyTicker, transformTicker } from '@/transformers/yahooTicker';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const LINE_END = '\r\n';

export interface YahooCsvDocument {
  content: string;
  rowCount: number;
  exchangeMapped: number;
  shortNameUsed: number;
}

export interface ExportOptions {
  /** Write here instead of `<root>/<date>/yahoo/portfolio_<time>.csv` */
  outputPath?: string;
}

/**
 * Quote a CSV field when it contains a comma, quote or line break.
 * Embedded quotes are doubled.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render positions in the Yahoo Finance portfolio import format
 * Only Symbol, Current Price, Purchase Price, Quantity and Commission are filled.
 */
export function renderYahooCsv(
  positions: readonly Position[],
  instruments?: InstrumentIndex,
  logger?: ILogger
): YahooCsvDocument {
  const lines: string[] = [YAHOO_CSV_HEADERS.map(escapeCsvField).join(',')];
  let exchangeMapped = 0;
  let shortNameUsed = 0;

  for (const position of positions) {
    const instrument = instruments?.get(position.ticker);

    switch (classifyTicker(position.ticker, instrument)) {
      case 'exchange':
        exchangeMapped++;
        break;
      case 'shortName':
        shortNameUsed++;
        break;
      case 'prefix':
        break;
    }

    const row: Record<YahooCsvColumn, string> = {
      Symbol: transformTicker(position.ticker, instrument, logger),
      'Current Price': String(position.currentPrice),
      Date: '',
      Time: '',
      Change: '',
      Open: '',
      High: '',
      Low: '',
      Volume: '',
      'Trade Date': '',
      'Purchase Price': String(position.averagePrice),
      Quantity: String(position.quantity),
      Commission: '0.0',
      'High Limit': '',
      'Low Limit': '',
      Comment: '',
      'Transaction Type': '',
    };

    lines.push(YAHOO_CSV_HEADERS.map((column) => escapeCsvField(row[column])).join(','));
  }

  return {
    content: lines.join(LINE_END) + LINE_END,
    rowCount: positions.length,
    exchangeMapped,
    shortNameUsed,
  };
}

/**
 * Export Service
 * Writes the portfolio as a Yahoo Finance CSV
 */
export class ExportService {
  constructor(
    private store: SnapshotStore,
    private logger: ILogger = createLogger('ExportService')
  ) {}

  /**
   * @param instruments - Catalog lookup used for shortName fallbacks; tickers
   *   missing from it fall back to their prefix
   * @returns Path of the CSV written
   * @throws ValidationError when there are no positions
   */
  async exportPortfolio(
    positions: readonly Position[],
    instruments?: InstrumentIndex,
    options: ExportOptions = {}
  ): Promise<string> {
    if (positions.length === 0) {
      throw new ValidationError('Cannot export empty positions list');
    }

    const document = renderYahooCsv(positions, instruments, this.logger);

    let path: string;
    if (options.outputPath) {
      await mkdir(dirname(options.outputPath), { recursive: true });
      await writeFile(options.outputPath, document.content, 'utf-8');
      path = options.outputPath;
    } else {
      path = await this.store.write(STORAGE_CATEGORIES.YAHOO, 'portfolio', 'csv', document.content);
    }

    this.logger.info(
      {
        path,
        rows: document.rowCount,
        exchangeMapped: document.exchangeMapped,
        shortNameUsed: document.shortNameUsed,
      },
      `Exported ${document.rowCount} positions to ${path} ` +
        `(${document.exchangeMapped} with exchange suffix, ${document.shortNameUsed} using shortName)`
    );

    return path;
  }
}
