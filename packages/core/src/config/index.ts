export {
  DEFAULT_UNKNOWN_ROOT_CAUSE_TEXT,
  configureExceptions,
  exceptionsSettingsSchema,
  getExceptionsConfig,
  resetExceptionsConfig,
} from './exceptions-config.js';
export type {
  ExceptionsConfig,
  ExceptionsConfigOverrides,
  ExceptionsSettings,
} from './exceptions-config.js';
