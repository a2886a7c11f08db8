import { Price } from '../decay/decay-pricing.utils';

export interface LinearCurve {
  type: 'linear';
  increaseAmount: bigint;
  increaseInterval: number;
  isDutchAuction: boolean;
}

export interface ExponentialCurve {
  type: 'exponential';
  halflife: number;
  isDutchAuction: boolean;
}

export type GradientCurve = LinearCurve | ExponentialCurve;

/**
 * A one-sided order selling its token along a time curve. `targetAmount` is the
 * inventory left for sale, `sourceAmount` what it has received so far. With
 * `tokensInverted` set, both prices are quoted the other way round (sold token per
 * paying token) and are flipped before a trade is priced.
 */
export interface GradientOrder {
  initialPrice: Price;
  endPrice: Price;
  sourceAmount: bigint;
  targetAmount: bigint;
  tradingStartTime: number;
  expiry: number;
  tokensInverted: boolean;
  curve: GradientCurve;
}
