import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';

export const MAX_UINT256 = (1n << 256n) - 1n;
export const MAX_UINT128 = (1n << 128n) - 1n;
export const MAX_UINT64 = (1n << 64n) - 1n;
export const MAX_UINT32 = 2 ** 32 - 1;

export interface Fraction {
  n: bigint;
  d: bigint;
}

export function toUint256(value: bigint): bigint {
  if (value < 0n) {
    throw new ExchangeException(ExchangeErrorCode.Underflow);
  }
  if (value > MAX_UINT256) {
    throw new ExchangeException(ExchangeErrorCode.Overflow);
  }
  return value;
}

export function toUint128(value: bigint): bigint {
  if (value < 0n) {
    throw new ExchangeException(ExchangeErrorCode.Underflow);
  }
  if (value > MAX_UINT128) {
    throw new ExchangeException(ExchangeErrorCode.Overflow);
  }
  return value;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new ExchangeException(ExchangeErrorCode.Underflow);
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return toUint256(a * b);
}

export function gcd(a: bigint, b: bigint): bigint {
  let x = a;
  let y = b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

// splits the 512-bit product of two uint256 values into its high and low words
function mul512(x: bigint, y: bigint): { hi: bigint; lo: bigint } {
  const p = toUint256(x) * toUint256(y);
  return { hi: p >> 256n, lo: p & MAX_UINT256 };
}

/**
 * `floor(x * y / z)` for uint256 operands. The product is held at 512-bit width, so only
 * a result that does not fit 256 bits fails.
 */
export function mulDivF(x: bigint, y: bigint, z: bigint): bigint {
  if (z === 0n) {
    throw new ExchangeException(ExchangeErrorCode.DivisionByZero);
  }
  const { hi, lo } = mul512(x, y);
  if (hi === 0n) {
    return lo / z;
  }
  if (hi >= z) {
    throw new ExchangeException(ExchangeErrorCode.Overflow);
  }
  return ((hi << 256n) | lo) / z;
}

/**
 * `ceil(x * y / z)` for uint256 operands.
 */
export function mulDivC(x: bigint, y: bigint, z: bigint): bigint {
  const w = mulDivF(x, y, z);
  if ((x * y) % z > 0n) {
    if (w >= MAX_UINT256) {
      throw new ExchangeException(ExchangeErrorCode.Overflow);
    }
    return w + 1n;
  }
  return w;
}

/**
 * The smallest `z` for which `mulDivC(x, y, z)` still fits 256 bits.
 */
export function minFactor(x: bigint, y: bigint): bigint {
  const { hi, lo } = mul512(x, y);
  return hi > MAX_UINT256 - lo ? hi + 2n : hi + 1n;
}

export const EXP2_PRECISION = 320n;
export const EXP2_ONE = 1n << EXP2_PRECISION;

function ceilDiv(x: bigint, y: bigint): bigint {
  return (x + y - 1n) / y;
}

// ln(2) rounded up, from ln(2) = sum_{k >= 1} 1 / (k * 2^k); the tail past the last
// term is below one unit
const LN2_UP = ((): bigint => {
  let sum = 1n;
  for (let k = 1n; k <= EXP2_PRECISION + 8n; k++) {
    sum += ceilDiv(EXP2_ONE, k << k);
  }
  return sum;
})();

// e^x for 0 < x < 1 in fixed point, never below the true value: every term is rounded
// up and one unit covers the tail once the terms reach a single unit
function expFixedUp(x: bigint): bigint {
  let sum = EXP2_ONE;
  let term = EXP2_ONE;
  for (let i = 1n; term > 1n; i++) {
    term = ceilDiv(term * x, EXP2_ONE * i);
    sum += term;
  }
  return sum + 1n;
}

/**
 * `2 ^ (f.n / f.d)` as a fraction with denominator `2^320`, rounded up. Whole powers of
 * two are exact; the fractional exponent goes through a Taylor series of `e^(r * ln 2)`.
 */
export function exp2(f: Fraction): Fraction {
  if (f.d === 0n) {
    throw new ExchangeException(ExchangeErrorCode.DivisionByZero);
  }
  const whole = f.n / f.d;
  const remainder = f.n % f.d;
  const fraction = remainder === 0n ? EXP2_ONE : expFixedUp(ceilDiv(LN2_UP * remainder, f.d));
  return { n: fraction << whole, d: EXP2_ONE };
}
