import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { InMemoryTokenVault, TokenLedger } from './funds.port';
import { atomically } from './journal';
import { ReentrancyGuard } from './reentrancy.guard';

describe('journal', () => {
  const token = '0x1000000000000000000000000000000000000001';
  const vault = '0x5000000000000000000000000000000000000005';
  const user = '0x3000000000000000000000000000000000000003';

  let ledger: TokenLedger;
  let funds: InMemoryTokenVault;

  beforeEach(() => {
    ledger = new TokenLedger();
    funds = new InMemoryTokenVault(ledger, vault);
    ledger.credit(token, user, 100n);
  });

  it('should keep the changes of a call that succeeds', () => {
    const result = atomically((journal) => {
      journal.transferIn(funds, token, user, 40n);
      return 'done';
    });

    expect(result).toBe('done');
    expect(ledger.balanceOf(token, user)).toBe(60n);
    expect(ledger.balanceOf(token, vault)).toBe(40n);
  });

  it('should undo every change of a call that fails, newest first', () => {
    const order: string[] = [];

    expect(() =>
      atomically((journal) => {
        journal.record(() => order.push('first'));
        journal.transferIn(funds, token, user, 40n);
        journal.transferOut(funds, token, user, 10n);
        journal.record(() => order.push('last'));
        throw new ExchangeException(ExchangeErrorCode.Outdated);
      }),
    ).toThrow(new ExchangeException(ExchangeErrorCode.Outdated));

    expect(order).toEqual(['last', 'first']);
    expect(ledger.balanceOf(token, user)).toBe(100n);
    expect(ledger.balanceOf(token, vault)).toBe(0n);
  });

  it('should skip zero transfers', () => {
    const spy = jest.spyOn(funds, 'transferIn');
    atomically((journal) => journal.transferIn(funds, token, user, 0n));
    expect(spy).not.toHaveBeenCalled();
  });
});

describe('TokenLedger', () => {
  const token = '0xAbC0000000000000000000000000000000000001';
  const from = '0x3000000000000000000000000000000000000003';
  const to = '0x4000000000000000000000000000000000000004';

  it('should ignore address casing', () => {
    const ledger = new TokenLedger();
    ledger.credit(token, from, 5n);
    expect(ledger.balanceOf(token.toLowerCase(), from)).toBe(5n);
  });

  it('should reject moving more than the balance', () => {
    const ledger = new TokenLedger();
    ledger.credit(token, from, 5n);
    expect(() => ledger.move(token, from, to, 6n)).toThrow(
      new ExchangeException(ExchangeErrorCode.InsufficientBalance),
    );
    expect(() => ledger.move(token, from, to, -1n)).toThrow(new ExchangeException(ExchangeErrorCode.Underflow));
    expect(ledger.balanceOf(token, from)).toBe(5n);
  });
});

describe('ReentrancyGuard', () => {
  it('should reject a nested call', () => {
    const guard = new ReentrancyGuard();
    expect(() => guard.run(() => guard.run(() => 1))).toThrow(
      new ExchangeException(ExchangeErrorCode.ReentrantCall),
    );
  });

  it('should release after a failure', () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.run(() => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(guard.run(() => 2)).toBe(2);
  });
});
