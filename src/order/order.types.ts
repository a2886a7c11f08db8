export interface Order {
  y: bigint;
  z: bigint;
  A: bigint;
  B: bigint;
}

export type OrderPair = [Order, Order];

export type PackedOrders = [bigint, bigint, bigint];

export interface SourceAndTargetAmounts {
  sourceAmount: bigint;
  targetAmount: bigint;
}
