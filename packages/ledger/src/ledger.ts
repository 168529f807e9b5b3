/**
 * Ledger
 *
 * Replays client transactions against two in-memory maps:
 * - accounts: client id -> Account
 * - history: txid -> deposit/withdrawal record with its dispute state
 *
 * Every operation either applies completely or leaves both maps untouched,
 * and reports domain failures as `LedgerResult` values. Accounts are created
 * on first successful reference. The ledger never logs; subscribe to its
 * events instead.
 */

import { EventEmitter } from 'events';
import { Account } from './account.js';
import {
  assertContract,
  fail,
  ok,
  type LedgerError,
  type LedgerResult,
} from './errors.js';
import { formatMoney, type Money } from './money.js';
import type {
  AccountSummary,
  ClientId,
  DisputeAction,
  DisputeState,
  LedgerOptions,
  LedgerTransaction,
  RecordedTxType,
  TransactionRecord,
  TxId,
} from './types.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Ledger events
 */
export interface LedgerEvents {
  'transaction:applied': (transaction: LedgerTransaction, summary: AccountSummary) => void;
  'transaction:rejected': (transaction: LedgerTransaction, error: LedgerError) => void;
  'account:locked': (summary: AccountSummary) => void;
}

export const DEFAULT_LEDGER_OPTIONS: Required<LedgerOptions> = {
  duplicateTxPolicy: 'overwrite',
  enforceOwnership: false,
  freezeLockedAccounts: false,
};

/** State a dispute action requires the history entry to be in */
const REQUIRED_STATE: Record<DisputeAction, DisputeState> = {
  dispute: 'normal',
  resolve: 'disputed',
  chargeback: 'disputed',
};

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class Ledger extends EventEmitter {
  private accounts: Map<ClientId, Account> = new Map();
  private history: Map<TxId, TransactionRecord> = new Map();
  private readonly options: Required<LedgerOptions>;

  constructor(options: LedgerOptions = {}) {
    super();
    this.options = { ...DEFAULT_LEDGER_OPTIONS, ...options };
  }

  // ===========================================================================
  // FUNDS MOVEMENT
  // ===========================================================================

  /**
   * Credit `amount` to the client's available funds
   */
  deposit(txid: TxId, client: ClientId, amount: Money): LedgerResult<AccountSummary> {
    assertNonNegative(amount, 'deposit', txid);
    const account = this.peekAccount(client);

    const blocked = this.checkFrozen(account) ?? this.checkDuplicate(txid);
    if (blocked) {
      return fail(blocked);
    }

    account.credit(amount);
    this.commit(account, txid, 'deposit', amount);
    return ok(account.summary());
  }

  /**
   * Debit `amount` from the client's available funds
   */
  withdraw(txid: TxId, client: ClientId, amount: Money): LedgerResult<AccountSummary> {
    assertNonNegative(amount, 'withdrawal', txid);
    const account = this.peekAccount(client);

    const blocked = this.checkFrozen(account) ?? this.checkDuplicate(txid);
    if (blocked) {
      return fail(blocked);
    }

    const funds = account.requireAvailable(amount);
    if (!funds.ok) {
      return funds;
    }

    account.debit(amount);
    this.commit(account, txid, 'withdrawal', amount);
    return ok(account.summary());
  }

  // ===========================================================================
  // DISPUTES
  // ===========================================================================

  /**
   * Move a recorded transaction's amount from available to held.
   *
   * The same movement applies to disputed withdrawals, even though their
   * funds already left the account.
   */
  dispute(client: ClientId, txid: TxId): LedgerResult<AccountSummary> {
    const found = this.findDisputable(client, txid, 'dispute');
    if (!found.ok) {
      return found;
    }

    const record = found.value;
    const account = this.peekAccount(client);

    const frozen = this.checkFrozen(account);
    if (frozen) {
      return fail(frozen);
    }

    const funds = account.requireAvailable(record.amount);
    if (!funds.ok) {
      return funds;
    }

    account.hold(record.amount);
    record.disputeState = 'disputed';
    this.accounts.set(client, account);
    return ok(account.summary());
  }

  /**
   * Settle a dispute in the client's favour: held funds become available again
   */
  resolve(client: ClientId, txid: TxId): LedgerResult<AccountSummary> {
    const found = this.findDisputable(client, txid, 'resolve');
    if (!found.ok) {
      return found;
    }

    const record = found.value;
    const account = this.peekAccount(client);

    account.release(record.amount);
    record.disputeState = 'resolved';
    this.accounts.set(client, account);
    return ok(account.summary());
  }

  /**
   * Reverse a disputed transaction: held funds are removed and the account
   * is locked permanently
   */
  chargeback(client: ClientId, txid: TxId): LedgerResult<AccountSummary> {
    const found = this.findDisputable(client, txid, 'chargeback');
    if (!found.ok) {
      return found;
    }

    const record = found.value;
    const account = this.peekAccount(client);
    const wasLocked = account.isLocked;

    account.chargeBack(record.amount);
    record.disputeState = 'charged_back';
    this.accounts.set(client, account);

    const summary = account.summary();
    if (!wasLocked) {
      this.emit('account:locked', summary);
    }
    return ok(summary);
  }

  // ===========================================================================
  // DISPATCH
  // ===========================================================================

  /**
   * Apply a parsed transaction and emit `transaction:applied` or
   * `transaction:rejected`
   */
  apply(transaction: LedgerTransaction): LedgerResult<AccountSummary> {
    const result = this.dispatch(transaction);

    if (result.ok) {
      this.emit('transaction:applied', transaction, result.value);
    } else {
      this.emit('transaction:rejected', transaction, result.error);
    }
    return result;
  }

  private dispatch(transaction: LedgerTransaction): LedgerResult<AccountSummary> {
    switch (transaction.type) {
      case 'deposit':
        return this.deposit(transaction.txid, transaction.client, transaction.amount);
      case 'withdrawal':
        return this.withdraw(transaction.txid, transaction.client, transaction.amount);
      case 'dispute':
        return this.dispute(transaction.client, transaction.txid);
      case 'resolve':
        return this.resolve(transaction.client, transaction.txid);
      case 'chargeback':
        return this.chargeback(transaction.client, transaction.txid);
    }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * All accounts, ordered by client id. Each iteration reflects the current
   * state of the ledger.
   */
  listAccounts(): Iterable<AccountSummary> {
    const accounts = this.accounts;

    return {
      *[Symbol.iterator]() {
        const ids = Array.from(accounts.keys()).sort((a, b) => a - b);
        for (const id of ids) {
          const account = accounts.get(id);
          if (account) {
            yield account.summary();
          }
        }
      },
    };
  }

  getAccount(client: ClientId): AccountSummary | undefined {
    return this.accounts.get(client)?.summary();
  }

  getTransaction(txid: TxId): Readonly<TransactionRecord> | undefined {
    const record = this.history.get(txid);
    return record ? { ...record } : undefined;
  }

  get accountCount(): number {
    return this.accounts.size;
  }

  get transactionCount(): number {
    return this.history.size;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  /**
   * Existing account, or a fresh one that is only stored once an operation
   * on it succeeds
   */
  private peekAccount(client: ClientId): Account {
    return this.accounts.get(client) ?? new Account(client);
  }

  private commit(account: Account, txid: TxId, type: RecordedTxType, amount: Money): void {
    this.accounts.set(account.id, account);
    this.history.set(txid, {
      txid,
      type,
      client: account.id,
      amount,
      disputeState: 'normal',
    });
  }

  private findDisputable(
    client: ClientId,
    txid: TxId,
    action: DisputeAction
  ): LedgerResult<TransactionRecord> {
    const record = this.history.get(txid);

    if (!record) {
      return fail({ code: 'TX_NOT_FOUND', txid });
    }

    if (this.options.enforceOwnership && record.client !== client) {
      return fail({ code: 'CLIENT_MISMATCH', txid, client, owner: record.client });
    }

    if (record.disputeState !== REQUIRED_STATE[action]) {
      return fail({ code: 'TX_IN_WRONG_STATE', txid, action, state: record.disputeState });
    }

    return ok(record);
  }

  private checkFrozen(account: Account): LedgerError | null {
    if (this.options.freezeLockedAccounts && account.isLocked) {
      return { code: 'ACCOUNT_LOCKED', client: account.id };
    }
    return null;
  }

  private checkDuplicate(txid: TxId): LedgerError | null {
    if (this.options.duplicateTxPolicy === 'reject' && this.history.has(txid)) {
      return { code: 'DUPLICATE_TX', txid };
    }
    return null;
  }

  // ===========================================================================
  // EVENTS (type-safe)
  // ===========================================================================

  override on<K extends keyof LedgerEvents>(event: K, listener: LedgerEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends keyof LedgerEvents>(event: K, listener: LedgerEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends keyof LedgerEvents>(
    event: K,
    ...args: Parameters<LedgerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

function assertNonNegative(amount: Money, type: RecordedTxType, txid: TxId): void {
  assertContract(
    amount.gte(0),
    `${type} ${txid} has negative amount ${formatMoney(amount)}`
  );
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Create a new Ledger
 */
export function createLedger(options?: LedgerOptions): Ledger {
  return new Ledger(options);
}
