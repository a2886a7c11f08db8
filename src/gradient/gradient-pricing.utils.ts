import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { comparePrices, expDecay, isValidPrice, linearDecay, Price } from '../decay/decay-pricing.utils';
import { MAX_UINT128, MAX_UINT32, mulDivC, mulDivF, toUint128 } from '../math/math-ex.utils';
import { SourceAndTargetAmounts } from '../order/order.types';
import { GradientOrder } from './gradient.types';

function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_UINT32;
}

export function validateGradientOrder(order: GradientOrder) {
  if (!isValidPrice(order.initialPrice) || !isValidPrice(order.endPrice)) {
    throw new ExchangeException(ExchangeErrorCode.InvalidPrice);
  }

  const { curve } = order;
  if (curve.type === 'linear' && !(isUint32(curve.increaseInterval) && curve.increaseInterval > 0)) {
    throw new ExchangeException(ExchangeErrorCode.InvalidCurve, 'increaseInterval must be whole positive seconds');
  }
  if (curve.type === 'exponential' && !(isUint32(curve.halflife) && curve.halflife > 0)) {
    throw new ExchangeException(ExchangeErrorCode.InvalidCurve, 'halflife must be whole positive seconds');
  }
  if (curve.type === 'linear' && curve.increaseAmount < 0n) {
    throw new ExchangeException(ExchangeErrorCode.InvalidCurve, 'increaseAmount must not be negative');
  }

  // the end price has to lie on the side the curve moves towards
  const direction = comparePrices(order.endPrice, order.initialPrice);
  if ((curve.isDutchAuction && direction > 0) || (!curve.isDutchAuction && direction < 0)) {
    throw new ExchangeException(ExchangeErrorCode.InvalidPrice, 'end price is outside the curve');
  }

  if (
    order.sourceAmount < 0n ||
    order.sourceAmount > MAX_UINT128 ||
    order.targetAmount < 0n ||
    order.targetAmount > MAX_UINT128 ||
    !isUint32(order.tradingStartTime) ||
    !isUint32(order.expiry) ||
    order.expiry <= order.tradingStartTime
  ) {
    throw new ExchangeException(ExchangeErrorCode.InvalidOrderValue);
  }
}

/**
 * The price of a gradient order at `now`. Dutch auctions decay the source leg; a rising
 * exponential curve decays the target leg instead, a rising linear one grows the source
 * leg. The result never passes `endPrice`.
 */
export function currentGradientPrice(order: GradientOrder, now: number): Price {
  const { initialPrice, endPrice, curve } = order;
  const elapsed = BigInt(Math.max(0, Math.floor(now - order.tradingStartTime)));

  let price: Price;
  if (curve.type === 'linear') {
    price = {
      sourceAmount: linearDecay(
        initialPrice.sourceAmount,
        elapsed,
        curve.increaseAmount,
        BigInt(curve.increaseInterval),
        !curve.isDutchAuction,
      ),
      targetAmount: initialPrice.targetAmount,
    };
  } else if (curve.isDutchAuction) {
    price = {
      sourceAmount: expDecay(initialPrice.sourceAmount, elapsed, BigInt(curve.halflife)),
      targetAmount: initialPrice.targetAmount,
    };
  } else {
    price = {
      sourceAmount: initialPrice.sourceAmount,
      targetAmount: expDecay(initialPrice.targetAmount, elapsed, BigInt(curve.halflife)),
    };
  }

  const position = comparePrices(price, endPrice);
  if ((curve.isDutchAuction && position < 0) || (!curve.isDutchAuction && position > 0) || !isValidPrice(price)) {
    return { ...endPrice };
  }
  return price;
}

export function gradientTradeAmounts(
  order: GradientOrder,
  amount: bigint,
  byTargetAmount: boolean,
  now: number,
): SourceAndTargetAmounts {
  if (now < order.tradingStartTime) {
    throw new ExchangeException(ExchangeErrorCode.TradingNotStarted);
  }
  if (now >= order.expiry) {
    throw new ExchangeException(ExchangeErrorCode.OrderExpired);
  }

  const current = currentGradientPrice(order, now);
  const price = order.tokensInverted
    ? { sourceAmount: current.targetAmount, targetAmount: current.sourceAmount }
    : current;
  if (byTargetAmount) {
    return {
      sourceAmount: toUint128(mulDivC(amount, price.sourceAmount, price.targetAmount)),
      targetAmount: amount,
    };
  }
  return {
    sourceAmount: amount,
    targetAmount: toUint128(mulDivF(amount, price.targetAmount, price.sourceAmount)),
  };
}

export function applyGradientTrade(order: GradientOrder, amounts: SourceAndTargetAmounts): GradientOrder {
  if (order.targetAmount < amounts.targetAmount) {
    throw new ExchangeException(ExchangeErrorCode.InsufficientLiquidity);
  }
  return {
    ...order,
    targetAmount: order.targetAmount - amounts.targetAmount,
    sourceAmount: toUint128(order.sourceAmount + amounts.sourceAmount),
  };
}

export function gradientOrdersEqual(a: GradientOrder, b: GradientOrder): boolean {
  const curvesEqual =
    a.curve.type === 'linear' && b.curve.type === 'linear'
      ? a.curve.increaseAmount === b.curve.increaseAmount &&
        a.curve.increaseInterval === b.curve.increaseInterval &&
        a.curve.isDutchAuction === b.curve.isDutchAuction
      : a.curve.type === 'exponential' && b.curve.type === 'exponential'
        ? a.curve.halflife === b.curve.halflife && a.curve.isDutchAuction === b.curve.isDutchAuction
        : false;

  return (
    curvesEqual &&
    a.initialPrice.sourceAmount === b.initialPrice.sourceAmount &&
    a.initialPrice.targetAmount === b.initialPrice.targetAmount &&
    a.endPrice.sourceAmount === b.endPrice.sourceAmount &&
    a.endPrice.targetAmount === b.endPrice.targetAmount &&
    a.sourceAmount === b.sourceAmount &&
    a.targetAmount === b.targetAmount &&
    a.tradingStartTime === b.tradingStartTime &&
    a.expiry === b.expiry &&
    a.tokensInverted === b.tokensInverted
  );
}
