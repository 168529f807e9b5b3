/**
 * @txledger/ledger - In-memory transaction ledger
 *
 * Accounts, dispute lifecycle and the error taxonomy. No I/O.
 */

export { Ledger, createLedger, DEFAULT_LEDGER_OPTIONS, type LedgerEvents } from './ledger.js';
export { Account } from './account.js';
export { Money, ZERO, toMoney, formatMoney } from './money.js';
export {
  ContractViolationError,
  assertContract,
  describeLedgerError,
  ok,
  fail,
  type LedgerError,
  type LedgerErrorCode,
  type LedgerResult,
} from './errors.js';
export type {
  AccountSummary,
  ClientId,
  DisputeAction,
  DisputeState,
  DuplicateTxPolicy,
  LedgerOptions,
  LedgerTransaction,
  RecordedTxType,
  TransactionRecord,
  TxId,
  TxType,
} from './types.js';
