/**
 * Ledger domain types
 */

import type { Money } from './money.js';

/** Client identifier (16-bit unsigned) */
export type ClientId = number;

/** Transaction identifier (32-bit unsigned) */
export type TxId = number;

export type TxType = 'deposit' | 'withdrawal' | 'dispute' | 'resolve' | 'chargeback';

/** Transaction types kept in history */
export type RecordedTxType = Extract<TxType, 'deposit' | 'withdrawal'>;

/** Transaction types that act on a history entry */
export type DisputeAction = Extract<TxType, 'dispute' | 'resolve' | 'chargeback'>;

/**
 * Dispute lifecycle of a history entry:
 * normal -> disputed -> resolved | charged_back
 */
export type DisputeState = 'normal' | 'disputed' | 'resolved' | 'charged_back';

/**
 * History entry for a deposit or withdrawal
 */
export interface TransactionRecord {
  txid: TxId;
  type: RecordedTxType;
  /** Client that made the transaction */
  client: ClientId;
  /** Original amount, never negative */
  amount: Money;
  disputeState: DisputeState;
}

/**
 * Read-only view of an account
 */
export interface AccountSummary {
  client: ClientId;
  /** Funds free for withdrawal */
  available: Money;
  /** Funds frozen by open disputes */
  held: Money;
  /** available + held */
  total: Money;
  locked: boolean;
}

/**
 * A transaction as fed to `Ledger.apply`
 */
export type LedgerTransaction =
  | { type: RecordedTxType; txid: TxId; client: ClientId; amount: Money }
  | { type: DisputeAction; txid: TxId; client: ClientId };

export type DuplicateTxPolicy = 'overwrite' | 'reject';

export interface LedgerOptions {
  /** What a deposit or withdrawal reusing a known txid does (default: overwrite) */
  duplicateTxPolicy?: DuplicateTxPolicy;
  /** Reject dispute/resolve/chargeback from a client other than the owner (default: false) */
  enforceOwnership?: boolean;
  /** Refuse deposits, withdrawals and new disputes on locked accounts (default: false) */
  freezeLockedAccounts?: boolean;
}
