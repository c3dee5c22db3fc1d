/**
 * Ledger Module
 *
 * Durable, append-only record of card transfers and deposits with a
 * pending → completed | failed | cancelled state machine.
 */

export { Ledger, buildPendingRecord, generateTransactionId, PendingRecordParams } from './ledger.service';
export {
  LedgerStore,
  MongoLedgerStore,
  InsertOutcome,
  AttachReferenceOutcome,
  StatusChange,
  toTransactionRecord,
} from './ledger.repository';
export {
  INITIAL_STATUS,
  getAllowedTransitions,
  isValidTransition,
  validateTransition,
  isTerminalState,
} from './ledger.state';
export {
  InvalidAmountError,
  InvalidCardsError,
  UnknownTransactionKindError,
  NotFoundError,
  DuplicateTransactionError,
  InvalidTransitionError,
} from './ledger.errors';
