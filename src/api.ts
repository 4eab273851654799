export * from './plan/index.js';
export * from './graph/index.js';
export * from './config/index.js';
export * from './render/index.js';
export { PlanGraphError, ErrorCode, BUILD_ERROR_CODES } from './lib/errors.js';
