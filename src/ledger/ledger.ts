// Fungible-token ledger state machine.
//
// Every mutating operation follows the same order:
// 1. Read the state it depends on
// 2. Check the precondition (failure returns a reason, state untouched)
// 3. Compute every new value, including checked additions
// 4. Write all new values, then emit exactly one event
//
// Because step 3 finishes before step 4 starts, an overflow throws before
// any write and a failed call never leaves partial state behind.

import type { FastifyBaseLogger } from 'fastify';

import { assertAmount, checkedAdd } from './amount.js';
import { LedgerFailureReason } from './types.js';
import type {
  AccountId,
  Amount,
  ApprovalEvent,
  BurnEvent,
  EventSink,
  IssueEvent,
  LedgerEvent,
  LedgerOptions,
  LedgerResult,
  LedgerSnapshot,
  TransferEvent,
  TransferFromEvent,
} from './types.js';

export class Ledger {
  readonly issuer: AccountId;

  private supply: Amount;
  private readonly balances = new Map<AccountId, Amount>();
  private readonly allowances = new Map<AccountId, Map<AccountId, Amount>>();
  private readonly sink: EventSink;
  private readonly logger?: FastifyBaseLogger;

  /**
   * Create a ledger crediting the whole initial supply to `creator`, who
   * becomes the issuer. Emits `Created`.
   */
  constructor(initialSupply: Amount, creator: AccountId, options: LedgerOptions) {
    assertAmount(initialSupply);

    this.issuer = creator;
    this.supply = initialSupply;
    this.balances.set(creator, initialSupply);
    this.sink = options.sink;
    this.logger = options.logger;

    this.record({ type: 'Created', from: creator, totalSupply: initialSupply });
  }

  // ---- Reads ----

  totalSupply(): Amount {
    return this.supply;
  }

  balanceOf(account: AccountId): Amount {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): Amount {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  snapshot(): LedgerSnapshot {
    const allowances = new Map<AccountId, Map<AccountId, Amount>>();
    for (const [owner, bySpender] of this.allowances) {
      allowances.set(owner, new Map(bySpender));
    }
    return {
      issuer: this.issuer,
      totalSupply: this.supply,
      balances: new Map(this.balances),
      allowances,
    };
  }

  // ---- Mutations ----

  /**
   * Move `value` from the caller's balance to `to`.
   */
  transfer(caller: AccountId, to: AccountId, value: Amount): LedgerResult<TransferEvent> {
    assertAmount(value);

    const fromBalance = this.balanceOf(caller);
    if (fromBalance < value) {
      return this.reject('transfer', caller, LedgerFailureReason.InsufficientBalance);
    }

    const nextFrom = fromBalance - value;
    // Self-transfer credits the already-debited balance
    const toBalance = to === caller ? nextFrom : this.balanceOf(to);
    const nextTo = checkedAdd(toBalance, value, 'transfer');

    this.balances.set(caller, nextFrom);
    this.balances.set(to, nextTo);

    return this.accept({ type: 'Transfer', from: caller, to, value });
  }

  /**
   * Reserve `value` of the caller's balance for `spender`.
   *
   * The amount leaves the owner's spendable balance and is added to any
   * allowance `spender` already holds over the owner.
   */
  approve(caller: AccountId, spender: AccountId, value: Amount): LedgerResult<ApprovalEvent> {
    assertAmount(value);

    const ownerBalance = this.balanceOf(caller);
    if (ownerBalance < value) {
      return this.reject('approve', caller, LedgerFailureReason.InsufficientBalance);
    }

    const nextBalance = ownerBalance - value;
    const nextAllowance = checkedAdd(this.allowance(caller, spender), value, 'approve');

    this.balances.set(caller, nextBalance);
    this.setAllowance(caller, spender, nextAllowance);

    return this.accept({ type: 'Approval', owner: caller, spender, value });
  }

  /**
   * Draw `value` from the allowance `owner` granted the caller and credit
   * it to `to`. The owner's balance is not touched.
   */
  transferFrom(
    caller: AccountId,
    owner: AccountId,
    to: AccountId,
    value: Amount
  ): LedgerResult<TransferFromEvent> {
    assertAmount(value);

    const current = this.allowance(owner, caller);
    if (current < value) {
      return this.reject('transferFrom', caller, LedgerFailureReason.InsufficientAllowance);
    }

    const nextAllowance = current - value;
    const nextTo = checkedAdd(this.balanceOf(to), value, 'transferFrom');

    this.setAllowance(owner, caller, nextAllowance);
    this.balances.set(to, nextTo);

    return this.accept({ type: 'TransferFrom', from: caller, owner, to, value });
  }

  /**
   * Destroy `value` of the caller's balance, shrinking total supply.
   */
  burn(caller: AccountId, value: Amount): LedgerResult<BurnEvent> {
    assertAmount(value);

    const fromBalance = this.balanceOf(caller);
    if (fromBalance < value) {
      return this.reject('burn', caller, LedgerFailureReason.InsufficientBalance);
    }

    this.balances.set(caller, fromBalance - value);
    this.supply -= value;

    return this.accept({ type: 'Burn', from: caller, value });
  }

  /**
   * Mint `value` to the issuer. Any other caller is refused.
   */
  issue(caller: AccountId, value: Amount): LedgerResult<IssueEvent> {
    assertAmount(value);

    if (caller !== this.issuer) {
      return this.reject('issue', caller, LedgerFailureReason.NotIssuer);
    }

    const nextSupply = checkedAdd(this.supply, value, 'issue');
    const nextBalance = checkedAdd(this.balanceOf(caller), value, 'issue');

    this.supply = nextSupply;
    this.balances.set(caller, nextBalance);

    return this.accept({ type: 'Issue', issuer: caller, value });
  }

  // ---- Private helpers ----

  private setAllowance(owner: AccountId, spender: AccountId, value: Amount): void {
    let bySpender = this.allowances.get(owner);
    if (!bySpender) {
      bySpender = new Map();
      this.allowances.set(owner, bySpender);
    }
    bySpender.set(spender, value);
  }

  private accept<E extends LedgerEvent>(event: E): LedgerResult<E> {
    this.record(event);
    return { success: true, event };
  }

  private reject<E extends LedgerEvent>(
    operation: string,
    caller: AccountId,
    reason: LedgerFailureReason
  ): LedgerResult<E> {
    this.logger?.info({ operation, caller, reason }, 'Ledger operation rejected');
    return { success: false, reason };
  }

  private record(event: LedgerEvent): void {
    this.sink.emit(event);
    this.logger?.debug({ event: event.type }, 'Ledger event emitted');
  }
}
