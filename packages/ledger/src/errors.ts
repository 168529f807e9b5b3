/**
 * Ledger error taxonomy
 *
 * Domain failures are values (`LedgerResult`); contract violations are thrown.
 */

import { formatMoney, type Money } from './money.js';
import type { ClientId, DisputeAction, DisputeState, TxId } from './types.js';

export type LedgerError =
  | { code: 'INSUFFICIENT_FUNDS'; available: Money; required: Money }
  | { code: 'TX_NOT_FOUND'; txid: TxId }
  | { code: 'TX_IN_WRONG_STATE'; txid: TxId; action: DisputeAction; state: DisputeState }
  | { code: 'DUPLICATE_TX'; txid: TxId }
  | { code: 'CLIENT_MISMATCH'; txid: TxId; client: ClientId; owner: ClientId }
  | { code: 'ACCOUNT_LOCKED'; client: ClientId };

export type LedgerErrorCode = LedgerError['code'];

export type LedgerResult<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value };
}

export function fail(error: LedgerError): LedgerResult<never> {
  return { ok: false, error };
}

/**
 * Raised when a caller breaks a precondition (negative amount) or an
 * internal invariant fails (held underflow). Never part of normal replay.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export function assertContract(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message);
  }
}

/**
 * One-line description of a domain failure
 */
export function describeLedgerError(error: LedgerError): string {
  switch (error.code) {
    case 'INSUFFICIENT_FUNDS':
      return `insufficient funds: available ${formatMoney(error.available)}, required ${formatMoney(error.required)}`;
    case 'TX_NOT_FOUND':
      return `transaction ${error.txid} not found`;
    case 'TX_IN_WRONG_STATE':
      return `cannot ${error.action} transaction ${error.txid} in state ${error.state}`;
    case 'DUPLICATE_TX':
      return `transaction ${error.txid} already recorded`;
    case 'CLIENT_MISMATCH':
      return `transaction ${error.txid} belongs to client ${error.owner}, not ${error.client}`;
    case 'ACCOUNT_LOCKED':
      return `account ${error.client} is locked`;
  }
}
