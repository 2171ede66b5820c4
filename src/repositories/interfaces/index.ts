/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IAccountRepository';
export * from './IPortfolioRepository';
export * from './IInstrumentRepository';
