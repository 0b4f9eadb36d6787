// @service-exceptions/core — application error vocabulary shared across services

export * from './config/index.js';
export * from './errors/index.js';
export * from './logger/index.js';
export * from './payload/index.js';
export * from './result/index.js';
export * from './root-cause/index.js';
export * from './status/index.js';
export { extractFieldErrors } from './validation/extract-field-errors.js';
