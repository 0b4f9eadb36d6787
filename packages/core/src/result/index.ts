export {
  captureApplicationError,
  captureApplicationErrorAsync,
  err,
  ok,
  tryConstruct,
} from './result.js';
export type { Result } from './result.js';
