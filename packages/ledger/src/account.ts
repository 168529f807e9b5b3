/**
 * Account
 *
 * Per-client balances. Only the Ledger mutates an account, and only after
 * every check for the operation has passed.
 */

import { Money, ZERO } from './money.js';
import { assertContract, fail, ok, type LedgerResult } from './errors.js';
import type { AccountSummary, ClientId } from './types.js';

export class Account {
  private available: Money = ZERO;
  private held: Money = ZERO;
  private locked = false;

  constructor(readonly id: ClientId) {}

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Snapshot of the balances; total is derived here and nowhere else
   */
  summary(): AccountSummary {
    return {
      client: this.id,
      available: this.available,
      held: this.held,
      total: this.available.plus(this.held),
      locked: this.locked,
    };
  }

  /**
   * Check that `amount` can be taken from available funds
   */
  requireAvailable(amount: Money): LedgerResult<void> {
    if (this.available.gte(amount)) {
      return ok(undefined);
    }
    return fail({ code: 'INSUFFICIENT_FUNDS', available: this.available, required: amount });
  }

  /**
   * Check that `amount` is currently held
   */
  assertHeld(amount: Money): void {
    assertContract(
      this.held.gte(amount),
      `held balance underflow on client ${this.id}: held ${this.held.toFixed()}, releasing ${amount.toFixed()}`
    );
  }

  credit(amount: Money): void {
    this.available = this.available.plus(amount);
  }

  debit(amount: Money): void {
    this.available = this.available.minus(amount);
  }

  /** available -> held */
  hold(amount: Money): void {
    this.available = this.available.minus(amount);
    this.held = this.held.plus(amount);
  }

  /** held -> available */
  release(amount: Money): void {
    this.assertHeld(amount);
    this.held = this.held.minus(amount);
    this.available = this.available.plus(amount);
  }

  /** held -> gone, and the account locks for good */
  chargeBack(amount: Money): void {
    this.assertHeld(amount);
    this.held = this.held.minus(amount);
    this.locked = true;
  }
}
