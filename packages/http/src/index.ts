// HTTP client with admission control, retry, tracing and streamed multipart bodies
export * from './client.js';
export * from './concurrency.js';
export * from './config.js';
export * from './debug.js';
export * from './executor.js';
export * from './hooks.js';
export * from './multipart.js';
export * from './rate-limiter.js';
export * from './request-options.js';
export * from './request.js';
export * from './response.js';
export * from './retry.js';
export * from './trace.js';
export * from './transcoder.js';
export * from './types.js';

export * from './transport/types.js';
export * from './transport/undici-transport.js';

// Pure functional core
export * from './core/backoff.js';
export * from './core/http-utils.js';
export * from './core/types.js';
export { abortableDelay, defaultEffects } from './effects.js';
