import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { MAX_UINT128, MAX_UINT64 } from '../math/math-ex.utils';
import { Order, OrderPair, PackedOrders } from './order.types';

const INVERTED_BIT = 255n;
const MAX_PACKED_B1 = (1n << 63n) - 1n;

function assertOrderFits(order: Order, maxB: bigint) {
  if (order.y < 0n || order.y > MAX_UINT128 || order.z < 0n || order.z > MAX_UINT128) {
    throw new ExchangeException(ExchangeErrorCode.InvalidOrderValue);
  }
  if (order.A < 0n || order.A > MAX_UINT64 || order.B < 0n || order.B > maxB) {
    throw new ExchangeException(ExchangeErrorCode.InvalidRate);
  }
}

/**
 * Three-word storage layout of a strategy:
 *
 *   word0 = y0 | y1 << 128
 *   word1 = z0 | A0 << 128 | B0 << 192
 *   word2 = z1 | A1 << 128 | B1 << 192 | inverted << 255
 */
export function packOrders(orders: OrderPair, inverted: boolean): PackedOrders {
  assertOrderFits(orders[0], MAX_UINT64);
  assertOrderFits(orders[1], MAX_PACKED_B1);

  return [
    orders[0].y | (orders[1].y << 128n),
    orders[0].z | (orders[0].A << 128n) | (orders[0].B << 192n),
    orders[1].z | (orders[1].A << 128n) | (orders[1].B << 192n) | ((inverted ? 1n : 0n) << INVERTED_BIT),
  ];
}

export function unpackOrders(packed: PackedOrders): OrderPair {
  const [word0, word1, word2] = packed;
  return [
    {
      y: word0 & MAX_UINT128,
      z: word1 & MAX_UINT128,
      A: (word1 >> 128n) & MAX_UINT64,
      B: (word1 >> 192n) & MAX_UINT64,
    },
    {
      y: word0 >> 128n,
      z: word2 & MAX_UINT128,
      A: (word2 >> 128n) & MAX_UINT64,
      B: (word2 >> 192n) & MAX_PACKED_B1,
    },
  ];
}

export function isInverted(packed: PackedOrders): boolean {
  return packed[2] >> INVERTED_BIT === 1n;
}

/**
 * Indices of the words that differ between two layouts; only those are rewritten.
 */
export function changedWords(current: PackedOrders, next: PackedOrders): number[] {
  return [0, 1, 2].filter((i) => current[i] !== next[i]);
}

export function ordersEqual(a: Order, b: Order): boolean {
  return a.y === b.y && a.z === b.z && a.A === b.A && a.B === b.B;
}
