export { backfillNativeErrorText, findRootCause, findRootCauseMessage } from './root-cause.js';
