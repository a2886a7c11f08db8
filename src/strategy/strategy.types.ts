import { GradientOrder } from '../gradient/gradient.types';
import { OrderPair, PackedOrders } from '../order/order.types';

// set on every gradient strategy id, on top of the pair and index bits
export const GRADIENT_FLAG = 1n << 255n;

export function strategyIdOf(pairId: bigint, index: bigint, gradient = false): bigint {
  return (gradient ? GRADIENT_FLAG : 0n) | (pairId << 128n) | index;
}

export function pairIdOf(strategyId: bigint): bigint {
  return (strategyId & ~GRADIENT_FLAG) >> 128n;
}

interface RecordBase {
  id: bigint;
  pairId: bigint;
  // in the order the creator passed them
  tokens: [string, string];
}

export interface StandardStrategyRecord extends RecordBase {
  kind: 'standard';
  packed: PackedOrders;
}

export interface GradientStrategyRecord extends RecordBase {
  kind: 'gradient';
  inverted: boolean;
  orders: [GradientOrder, GradientOrder];
}

export type StrategyRecord = StandardStrategyRecord | GradientStrategyRecord;

export interface StandardStrategy {
  kind: 'standard';
  id: bigint;
  owner: string;
  tokens: [string, string];
  orders: OrderPair;
}

export interface GradientStrategy {
  kind: 'gradient';
  id: bigint;
  owner: string;
  tokens: [string, string];
  orders: [GradientOrder, GradientOrder];
}

export type Strategy = StandardStrategy | GradientStrategy;

export interface TradeAction {
  strategyId: bigint;
  amount: bigint;
}

export interface TradeParams {
  caller: string;
  sourceToken: string;
  targetToken: string;
  tradeActions: TradeAction[];
  byTargetAmount: boolean;
  // unix seconds
  deadline: number;
  // maximum input when trading by target amount, minimum return otherwise
  constraint: bigint;
}

export interface TradeResult {
  sourceAmount: bigint;
  targetAmount: bigint;
  tradingFeeAmount: bigint;
}
