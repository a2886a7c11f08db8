import { Injectable } from '@nestjs/common';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';

export const FUNDS_PORT = 'FUNDS_PORT';
export const POL_FUNDS_PORT = 'POL_FUNDS_PORT';
export const FEE_AUCTION_FUNDS_PORT = 'FEE_AUCTION_FUNDS_PORT';

/**
 * Moves tokens between a wallet and the custody account the port is bound to.
 */
export interface FundsPort {
  readonly account: string;
  transferIn(token: string, from: string, amount: bigint): void;
  transferOut(token: string, to: string, amount: bigint): void;
  balanceOf(token: string, account: string): bigint;
}

const key = (value: string) => value.toLowerCase();

/**
 * Token balances of every account known to the process.
 */
@Injectable()
export class TokenLedger {
  private balances = new Map<string, Map<string, bigint>>();

  balanceOf(token: string, account: string): bigint {
    return this.balances.get(key(token))?.get(key(account)) ?? 0n;
  }

  credit(token: string, account: string, amount: bigint) {
    const balances = this.balances.get(key(token)) ?? new Map<string, bigint>();
    balances.set(key(account), (balances.get(key(account)) ?? 0n) + amount);
    this.balances.set(key(token), balances);
  }

  move(token: string, from: string, to: string, amount: bigint) {
    if (amount < 0n) {
      throw new ExchangeException(ExchangeErrorCode.Underflow);
    }
    const available = this.balanceOf(token, from);
    if (available < amount) {
      throw new ExchangeException(
        ExchangeErrorCode.InsufficientBalance,
        `${from} holds ${available} of ${token}, ${amount} required`,
      );
    }
    this.credit(token, from, -amount);
    this.credit(token, to, amount);
  }
}

export class InMemoryTokenVault implements FundsPort {
  constructor(private ledger: TokenLedger, readonly account: string) {}

  transferIn(token: string, from: string, amount: bigint) {
    this.ledger.move(token, from, this.account, amount);
  }

  transferOut(token: string, to: string, amount: bigint) {
    this.ledger.move(token, this.account, to, amount);
  }

  balanceOf(token: string, account: string): bigint {
    return this.ledger.balanceOf(token, account);
  }
}
