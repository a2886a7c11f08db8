import { Injectable, Logger } from '@nestjs/common';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';

export interface Pair {
  id: bigint;
  // sorted by address
  tokens: [string, string];
}

export function sortTokens(token0: string, token1: string): [string, string] {
  return token0.toLowerCase() < token1.toLowerCase() ? [token0, token1] : [token1, token0];
}

const pairKey = (token0: string, token1: string) =>
  sortTokens(token0, token1)
    .map((token) => token.toLowerCase())
    .join('_');

@Injectable()
export class PairService {
  private readonly logger = new Logger(PairService.name);
  private pairs = new Map<string, Pair>();
  private pairsById = new Map<bigint, Pair>();
  private lastPairId = 0n;

  createPair(token0: string, token1: string): Pair {
    const key = pairKey(token0, token1);
    if (this.pairs.has(key)) {
      throw new ExchangeException(ExchangeErrorCode.PairAlreadyExists);
    }

    this.lastPairId++;
    const pair: Pair = { id: this.lastPairId, tokens: sortTokens(token0, token1) };
    this.pairs.set(key, pair);
    this.pairsById.set(pair.id, pair);
    this.logger.log(`Pair ${pair.id} created for ${pair.tokens[0]} and ${pair.tokens[1]}`);
    return pair;
  }

  // undefined when the pair was never created
  findPair(token0: string, token1: string): Pair | undefined {
    return this.pairs.get(pairKey(token0, token1));
  }

  pair(token0: string, token1: string): Pair {
    const pair = this.findPair(token0, token1);
    if (!pair) {
      throw new ExchangeException(ExchangeErrorCode.PairDoesNotExist);
    }
    return pair;
  }

  pairById(id: bigint): Pair {
    const pair = this.pairsById.get(id);
    if (!pair) {
      throw new ExchangeException(ExchangeErrorCode.PairDoesNotExist);
    }
    return pair;
  }

  // removes a pair created by a call that failed afterwards
  dropPair(pair: Pair) {
    this.pairs.delete(pairKey(pair.tokens[0], pair.tokens[1]));
    this.pairsById.delete(pair.id);
    if (pair.id === this.lastPairId) {
      this.lastPairId--;
    }
  }

  all(): Pair[] {
    return [...this.pairsById.values()];
  }
}
