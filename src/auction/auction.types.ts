import { Price } from '../decay/decay-pricing.utils';

export interface TokenAuction {
  // unix seconds; 0 while trading is disabled
  tradingStartTime: number;
  initialPrice: Price;
  halfLife: number;
}

/**
 * Outflow budget of the throttled token for the current auction period.
 */
export interface SaleAmount {
  initial: bigint;
  current: bigint;
}

export enum Seller {
  Pol = 'pol',
  Fee = 'fee',
}
