import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { SnapshotService } from '@/services/snapshot.service';
import { InstrumentService } from '@/services/instrument.service';
import { ExportService } from '@/services/export.service';
import { SnapshotStore } from '@/storage/snapshot.store';
import { InstrumentCacheStore } from '@/storage/instrumentCache.store';
import {
  IAccountRepository,
  IInstrumentRepository,
  IPortfolioRepository,
} from '@/repositories/interfaces';
import { AuthenticationError, TransportError } from '@/errors';
import {
  createMockAccountRepository,
  createMockInstrumentRepository,
  createMockLogger,
  createMockPortfolioRepository,
} from '@/tests/utils/mockRepositories';
import {
  FakeClock,
  buildInstrument,
  buildPosition,
  createTempDir,
  removeTempDir,
} from '@/tests/utils/fakes';

describe('SnapshotService', () => {
  let rootDir: string;
  let accountRepo: jest.Mocked<IAccountRepository>;
  let portfolioRepo: jest.Mocked<IPortfolioRepository>;
  let instrumentRepo: jest.Mocked<IInstrumentRepository>;
  let output: string[];
  let service: SnapshotService;

  const cash = { free: 1234.5, total: 10000, ppl: -25.75, result: 0 };
  const info = { id: 12345, currencyCode: 'GBP' };
  const positions = [
    buildPosition({ ticker: 'VUSAl_EQ', quantity: 10, averagePrice: 75.5, currentPrice: 80.25, ppl: 47.5 }),
    buildPosition({ ticker: 'NVDA_US_EQ', quantity: 2.5, averagePrice: 100, currentPrice: 120, ppl: 50 }),
  ];

  const partition = (...segments: string[]) => join(rootDir, '2026-01-15', ...segments);

  beforeEach(async () => {
    rootDir = await createTempDir();
    const clock = new FakeClock(new Date(2026, 0, 15, 9, 30, 5));
    const logger = createMockLogger();
    const snapshotStore = new SnapshotStore(rootDir, clock);

    accountRepo = createMockAccountRepository();
    accountRepo.getCash.mockResolvedValue(cash);
    accountRepo.getInfo.mockResolvedValue(info);

    portfolioRepo = createMockPortfolioRepository();
    portfolioRepo.getAllPositions.mockResolvedValue(positions);

    instrumentRepo = createMockInstrumentRepository();
    instrumentRepo.fetchInstruments.mockResolvedValue([
      buildInstrument({ ticker: 'NVDA_US_EQ', name: 'NVIDIA', shortName: 'NVDA' }),
    ]);

    output = [];
    service = new SnapshotService(
      accountRepo,
      portfolioRepo,
      new InstrumentService(instrumentRepo, new InstrumentCacheStore(rootDir), clock, logger),
      snapshotStore,
      new ExportService(snapshotStore, logger),
      (lines) => output.push(...lines),
      logger
    );
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  it('should save balance, info, positions and the Yahoo export', async () => {
    const result = await service.run();

    expect(result).toEqual({
      balancePath: partition('account', 'balance_09-30-05.json'),
      infoPath: partition('account', 'info_09-30-05.json'),
      positionsPath: partition('portfolio', 'positions_09-30-05.json'),
      exportPath: partition('yahoo', 'portfolio_09-30-05.csv'),
      positionCount: 2,
    });
    expect(JSON.parse(await readFile(result.balancePath, 'utf-8'))).toEqual(cash);
    expect(JSON.parse(await readFile(result.infoPath, 'utf-8'))).toEqual(info);
    expect(JSON.parse(await readFile(result.positionsPath, 'utf-8'))).toEqual(positions);
  });

  it('should print each step in order', async () => {
    const result = await service.run();

    const confirmations = output.filter((line) => line.startsWith('✓'));
    expect(confirmations).toEqual([
      `✓ Balance saved to: ${result.balancePath}`,
      `✓ Info saved to: ${result.infoPath}`,
      '✓ Loaded 1 instruments (cached daily)',
      `✓ Portfolio saved to: ${result.positionsPath}`,
      `✓ Yahoo Finance CSV saved to: ${partition('yahoo', 'portfolio_09-30-05.csv')}`,
    ]);
    expect(output).toContain('ACCOUNT BALANCE');
    expect(output).toContain('ACCOUNT INFO');
    expect(output).toContain('PORTFOLIO - 2 Position(s)');
    expect(output).toContain('  NVIDIA (NVDA)');
  });

  it('should use instrument shortNames in the export', async () => {
    const result = await service.run();

    const rows = (await readFile(partition('yahoo', 'portfolio_09-30-05.csv'), 'utf-8')).split('\r\n');
    expect(result.exportPath).not.toBeNull();
    expect(rows.slice(1, 3)).toEqual([
      'VUSA.L,80.25,,,,,,,,,75.5,10,0.0,,,,',
      'NVDA,120,,,,,,,,,100,2.5,0.0,,,,',
    ]);
  });

  it('should skip instruments and export when there are no positions', async () => {
    portfolioRepo.getAllPositions.mockResolvedValue([]);

    const result = await service.run();

    expect(result.exportPath).toBeNull();
    expect(result.positionCount).toBe(0);
    expect(instrumentRepo.fetchInstruments).not.toHaveBeenCalled();
    expect(await readFile(result.positionsPath, 'utf-8')).toBe('[]\n');
    expect(output).toContain('No open positions');
    expect(existsSync(partition('yahoo'))).toBe(false);
  });

  it('should continue with bare tickers when the catalog cannot be loaded', async () => {
    instrumentRepo.fetchInstruments.mockRejectedValue(
      new TransportError('Request failed: socket hang up')
    );

    const result = await service.run();

    expect(output).toContain('⚠ Could not load instrument metadata: Request failed: socket hang up');
    expect(output).toContain('Displaying basic ticker information only');
    expect(output).toContain('  NVDA_US_EQ (NVDA_US_EQ)');

    const rows = (await readFile(partition('yahoo', 'portfolio_09-30-05.csv'), 'utf-8')).split('\r\n');
    expect(result.exportPath).not.toBeNull();
    expect(rows[2]).toBe('NVDA,120,,,,,,,,,100,2.5,0.0,,,,');
  });

  it('should rethrow unexpected catalog failures', async () => {
    instrumentRepo.fetchInstruments.mockRejectedValue(new TypeError('bad state'));

    await expect(service.run()).rejects.toThrow(TypeError);
  });

  it('should stop at the first failed API call', async () => {
    accountRepo.getCash.mockRejectedValue(
      new AuthenticationError('Authentication failed. Check your API key and secret.')
    );

    await expect(service.run()).rejects.toThrow(AuthenticationError);
    expect(accountRepo.getInfo).not.toHaveBeenCalled();
    expect(existsSync(partition())).toBe(false);
  });
});
