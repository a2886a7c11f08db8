import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { exp2, MAX_UINT256 } from '../math/math-ex.utils';

// beyond this many half-lives the decayed value is treated as fully decayed
export const MAX_HALF_LIVES = 128n;

/**
 * A price expressed as an amount pair: `sourceAmount` of the paying token buys
 * `targetAmount` of the sold token.
 */
export interface Price {
  sourceAmount: bigint;
  targetAmount: bigint;
}

/**
 * `initial +/- stepAmount * floor(elapsed / stepInterval)`, saturating at 0 and at the
 * uint256 ceiling.
 */
export function linearDecay(
  initial: bigint,
  elapsed: bigint,
  stepAmount: bigint,
  stepInterval: bigint,
  increasing: boolean,
): bigint {
  if (stepInterval === 0n) {
    throw new ExchangeException(ExchangeErrorCode.DivisionByZero);
  }
  const delta = stepAmount * (elapsed / stepInterval);
  if (increasing) {
    const value = initial + delta;
    return value > MAX_UINT256 ? MAX_UINT256 : value;
  }
  return initial > delta ? initial - delta : 0n;
}

/**
 * `initial * 2 ^ (-elapsed / halfLife)`, rounded down. The result is never above the
 * true value and at most one below it.
 */
export function expDecay(initial: bigint, elapsed: bigint, halfLife: bigint): bigint {
  if (halfLife === 0n) {
    throw new ExchangeException(ExchangeErrorCode.DivisionByZero);
  }
  if (elapsed / halfLife >= MAX_HALF_LIVES) {
    return 0n;
  }
  const { n, d } = exp2({ n: elapsed, d: halfLife });
  return (initial * d) / n;
}

/**
 * Orders two prices by value (source per target) without dividing.
 */
export function comparePrices(a: Price, b: Price): -1 | 0 | 1 {
  const left = a.sourceAmount * b.targetAmount;
  const right = b.sourceAmount * a.targetAmount;
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function isValidPrice(price: Price): boolean {
  return price.sourceAmount > 0n && price.targetAmount > 0n;
}
