import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { checkedMul, checkedSub, minFactor, mulDivC, mulDivF, toUint128, toUint256 } from '../math/math-ex.utils';
import { expandRate, ONE } from '../rate/rate-codec.utils';
import { Order, SourceAndTargetAmounts } from './order.types';

/*
 * Trade amounts on an order's capacity curve. With the rates expanded and scaled by
 * ONE = 2^48, an order sells its token at a marginal rate moving from (A + B)^2 down to
 * B^2 as y falls from z to 0.
 *
 * Rounding always favours the order: target amounts (paid out) round down, source
 * amounts (charged) round up.
 */

/**
 * Amount of the order's token released for `x` units of the other token.
 */
export function calculateTradeTargetAmount(x: bigint, order: Order): bigint {
  const y = order.y;
  const z = order.z;
  const A = expandRate(order.A);
  const B = expandRate(order.B);

  if (A === 0n) {
    if (B === 0n) {
      throw new ExchangeException(ExchangeErrorCode.OrderDisabled);
    }
    return toUint128(mulDivF(x, B * B, ONE * ONE));
  }

  const temp1 = z * ONE;
  const temp2 = y * A + z * B;
  const temp3 = checkedMul(temp2, x);

  const factor1 = minFactor(temp1, temp1);
  const factor2 = minFactor(temp3, A);
  const factor = factor1 > factor2 ? factor1 : factor2;

  const temp4 = mulDivC(temp1, temp1, factor);
  const temp5 = mulDivC(temp3, A, factor);
  return toUint128(mulDivF(temp2, temp3 / factor, toUint256(temp4 + temp5)));
}

/**
 * Amount of the other token required to receive `x` units of the order's token.
 */
export function calculateTradeSourceAmount(x: bigint, order: Order): bigint {
  const y = order.y;
  const z = order.z;
  const A = expandRate(order.A);
  const B = expandRate(order.B);

  if (A === 0n) {
    if (B === 0n) {
      throw new ExchangeException(ExchangeErrorCode.OrderDisabled);
    }
    return toUint128(mulDivC(x, ONE * ONE, B * B));
  }

  const temp1 = z * ONE;
  const temp2 = y * A + z * B;
  const xA = x * A;
  if (xA >= temp2) {
    // the requested amount is at or beyond the end of the curve
    throw new ExchangeException(ExchangeErrorCode.InsufficientLiquidity);
  }
  const temp3 = temp2 - xA;

  const factor1 = minFactor(temp1, temp1);
  const factor2 = minFactor(temp2, temp3);
  const factor = factor1 > factor2 ? factor1 : factor2;

  const temp4 = mulDivC(temp1, temp1, factor);
  const temp5 = mulDivF(temp2, temp3, factor);
  return toUint128(mulDivC(x, temp4, temp5));
}

export function singleTradeActionSourceAndTargetAmounts(
  order: Order,
  amount: bigint,
  byTargetAmount: boolean,
): SourceAndTargetAmounts {
  if (byTargetAmount) {
    return { sourceAmount: calculateTradeSourceAmount(amount, order), targetAmount: amount };
  }
  return { sourceAmount: amount, targetAmount: calculateTradeTargetAmount(amount, order) };
}

/**
 * Moves `targetAmount` out of the target order and `sourceAmount` into the source order.
 * The source order's capacity grows with its liquidity and never shrinks.
 */
export function applyTrade(
  targetOrder: Order,
  sourceOrder: Order,
  { sourceAmount, targetAmount }: SourceAndTargetAmounts,
): [Order, Order] {
  if (targetOrder.y < targetAmount) {
    throw new ExchangeException(ExchangeErrorCode.InsufficientLiquidity);
  }

  const newTarget: Order = { ...targetOrder, y: checkedSub(targetOrder.y, targetAmount) };
  const sourceY = toUint128(sourceOrder.y + sourceAmount);
  const newSource: Order = { ...sourceOrder, y: sourceY, z: sourceOrder.z < sourceY ? sourceY : sourceOrder.z };

  return [newTarget, newSource];
}
