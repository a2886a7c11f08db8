import Decimal from 'decimal.js';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { MAX_UINT128, MAX_UINT64 } from '../math/math-ex.utils';
import { Order } from '../order/order.types';

Decimal.set({
  precision: 100,
  toExpNeg: -100,
  toExpPos: 100,
});

export const RATE_SHIFT = 48n;
export const ONE = 1n << RATE_SHIFT;
const MANTISSA_MASK = ONE - 1n;

/**
 * A compressed rate is a 48-bit mantissa plus an exponent stored above it:
 * `(c mod 2^48) << (c div 2^48)`.
 */
export function expandRate(compressed: bigint): bigint {
  return (compressed & MANTISSA_MASK) << (compressed >> RATE_SHIFT);
}

export function isValidRate(compressed: bigint): boolean {
  if (compressed < 0n || compressed > MAX_UINT64) {
    return false;
  }
  return ONE >> (compressed >> RATE_SHIFT) > 0n;
}

function bitLength(value: bigint): bigint {
  let length = 0n;
  while (value > 0n) {
    value >>= 1n;
    length++;
  }
  return length;
}

/**
 * Inverse of `expandRate` that keeps the top 48 significant bits (rounding down).
 */
export function compressRate(expanded: bigint): bigint {
  if (expanded < 0n || expanded >= 1n << (RATE_SHIFT * 2n)) {
    throw new ExchangeException(ExchangeErrorCode.InvalidRate);
  }
  const exponent = bitLength(expanded >> RATE_SHIFT);
  return (exponent << RATE_SHIFT) | (expanded >> exponent);
}

const TWO48 = new Decimal(2).pow(48);

// the curve works on square roots of rates scaled by 2^48
export function encodeRate(rate: Decimal): bigint {
  return compressRate(BigInt(rate.sqrt().mul(TWO48).floor().toFixed()));
}

export function decodeRate(compressed: bigint): Decimal {
  return new Decimal(expandRate(compressed).toString()).div(TWO48).pow(2);
}

export interface DecodedOrder {
  liquidity: Decimal;
  lowestRate: Decimal;
  highestRate: Decimal;
  marginalRate: Decimal;
}

export function encodeOrder(order: DecodedOrder): Order {
  const y = BigInt(order.liquidity.floor().toFixed());
  const lowest = BigInt(order.lowestRate.sqrt().mul(TWO48).floor().toFixed());
  const highest = BigInt(order.highestRate.sqrt().mul(TWO48).floor().toFixed());
  const marginal = BigInt(order.marginalRate.sqrt().mul(TWO48).floor().toFixed());
  if (y > MAX_UINT128 || lowest > highest || marginal < lowest || marginal > highest) {
    throw new ExchangeException(ExchangeErrorCode.InvalidRate);
  }

  let z = y;
  if (highest !== lowest && marginal !== highest) {
    if (marginal === lowest) {
      throw new ExchangeException(ExchangeErrorCode.InvalidRate);
    }
    z = (y * (highest - lowest)) / (marginal - lowest);
  }
  if (z > MAX_UINT128) {
    throw new ExchangeException(ExchangeErrorCode.InvalidOrderValue);
  }

  return { y, z, A: compressRate(highest - lowest), B: compressRate(lowest) };
}

export function decodeOrder(order: Order): DecodedOrder {
  const y = new Decimal(order.y.toString());
  const z = new Decimal(order.z.toString());
  const A = new Decimal(expandRate(order.A).toString());
  const B = new Decimal(expandRate(order.B).toString());
  const yOverZ = y.eq(z) || z.isZero() ? new Decimal(1) : y.div(z);

  return {
    liquidity: y,
    lowestRate: B.div(TWO48).pow(2),
    highestRate: B.add(A).div(TWO48).pow(2),
    marginalRate: B.add(A.mul(yOverZ)).div(TWO48).pow(2),
  };
}
