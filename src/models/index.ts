/**
 * Central export point for all models
 */

export * from './Instrument';
export * from './Position';
export * from './Account';
