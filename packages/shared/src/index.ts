export * from './constants.js';
export * from './errors.js';
export * from './types/json.js';
export * from './types/stream.js';
export * from './types/state.js';
export * from './types/protocol.js';
export * from './utils/logger.js';
export * from './utils/retry.js';
export * from './utils/env.js';
export * from './validators/state.js';
