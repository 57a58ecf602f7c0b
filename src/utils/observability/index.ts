export type * from './types.js';

export {
  createRequestId,
  createTurnId,
  withLogContext,
  getLogContext,
} from './context.js';

export { createLogger } from './logger.js';

export {
  redactEmailAddress,
  redactSecrets,
} from './redaction.js';
