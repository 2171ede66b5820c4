/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './AuthenticationError';
export * from './RateLimitError';
export * from './TransportError';
export * from './CacheIOError';
export * from './ValidationError';
