export { ReceivingError, wrapError } from './receiving-error.js';
export type {
  ReceivingErrorCode,
  ReceivingErrorDetails,
  ReceivingStage,
} from './receiving-error.js';
