export * from './config.js';
export * from './errors.js';
export * from './circuit-breaker.js';
export * from './logger.js';
export * from './retry.js';
export * from './request-coalescer.js';
export * from './endpoint-throttle.js';
export * from './redis.js';
export * from './postgres.js';
