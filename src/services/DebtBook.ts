// DebtBook: synthetic value minted per account
import type { UnitOfWork } from '../engine/UnitOfWork.js';
import { EngineError } from '../errors/EngineError.js';
import type { AccountId } from '../types/index.js';
import { checkedAdd } from '../utils/bigint.js';

export class DebtBook {
  private readonly minted = new Map<AccountId, bigint>();

  debtOf(account: AccountId, uow?: UnitOfWork): bigint {
    return uow?.read(this.minted, account) ?? this.minted.get(account) ?? 0n;
  }

  increase(account: AccountId, amount: bigint, uow?: UnitOfWork): void {
    const before = this.debtOf(account, uow);
    this.set(account, checkedAdd(before, amount), uow);
  }

  decrease(account: AccountId, amount: bigint, uow?: UnitOfWork): void {
    const before = this.debtOf(account, uow);
    if (amount > before) {
      throw new EngineError(
        'InsufficientDebt',
        `${account} owes ${before}, cannot reduce debt by ${amount}`
      );
    }
    this.set(account, before - amount, uow);
  }

  private set(account: AccountId, value: bigint, uow?: UnitOfWork): void {
    if (uow) {
      uow.write(this.minted, account, value);
    } else {
      this.minted.set(account, value);
    }
  }
}
