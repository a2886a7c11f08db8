import { Inject, Injectable, Logger } from '@nestjs/common';
import * as _ from 'lodash';
import { PPM_RESOLUTION, ProtocolConfigService } from '../config/protocol-config.service';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { applyGradientTrade, gradientTradeAmounts, validateGradientOrder } from '../gradient/gradient-pricing.utils';
import { GradientOrder } from '../gradient/gradient.types';
import { checksumAddress, sameAddress } from '../isAddress.validator';
import { MAX_UINT128, mulDivC, mulDivF, toUint128 } from '../math/math-ex.utils';
import { applyTrade, singleTradeActionSourceAndTargetAmounts } from '../order/order-curve.utils';
import { changedWords, isInverted, ordersEqual, packOrders, unpackOrders } from '../order/order-packing.utils';
import { OrderPair, PackedOrders, SourceAndTargetAmounts } from '../order/order.types';
import { Pair, PairService, sortTokens } from '../pair/pair.service';
import { CLOCK_PORT, ClockPort } from '../ports/clock.port';
import { FUNDS_PORT, FundsPort } from '../ports/funds.port';
import { atomically, Journal } from '../ports/journal';
import { OWNERSHIP_PORT, OwnershipPort } from '../ports/ownership.port';
import { ReentrancyGuard } from '../ports/reentrancy.guard';
import { isValidRate } from '../rate/rate-codec.utils';
import {
  GradientStrategyRecord,
  pairIdOf,
  StandardStrategyRecord,
  Strategy,
  strategyIdOf,
  StrategyRecord,
  TradeAction,
  TradeParams,
  TradeResult,
} from './strategy.types';

const PPM = BigInt(PPM_RESOLUTION);

interface TradeSimulation extends TradeResult {
  sourceToken: string;
  targetToken: string;
  feeToken: string;
  staged: Map<bigint, StrategyRecord>;
}

@Injectable()
export class StrategyService {
  private readonly logger = new Logger(StrategyService.name);
  private readonly guard = new ReentrancyGuard();

  private strategies = new Map<bigint, StrategyRecord>();
  // creation order; ids of deleted strategies stay and are skipped when listing
  private strategyIdsByPair = new Map<bigint, bigint[]>();
  private lastIndexByPair = new Map<bigint, bigint>();
  private fees = new Map<string, bigint>();

  constructor(
    private pairService: PairService,
    private protocolConfig: ProtocolConfigService,
    @Inject(FUNDS_PORT) private funds: FundsPort,
    @Inject(OWNERSHIP_PORT) private ownership: OwnershipPort,
    @Inject(CLOCK_PORT) private clock: ClockPort,
  ) {}

  createStrategy(caller: string, token0: string, token1: string, orders: OrderPair): bigint {
    return this.guard.run(() =>
      atomically((journal) => {
        const tokens = this.validateTokens(token0, token1);
        this.validateOrders(orders);
        const inverted = !sameAddress(sortTokens(tokens[0], tokens[1])[0], tokens[0]);
        const packed = packOrders(orders, inverted);

        const pair = this.pairFor(tokens, journal);
        const id = this.nextStrategyId(pair, false, journal);
        this.writeRecord({ kind: 'standard', id, pairId: pair.id, tokens, packed }, journal);
        this.mint(caller, id, journal);
        this.logger.log(`Strategy ${id} created by ${caller} on pair ${pair.id}`);

        orders.forEach((order, i) => journal.transferIn(this.funds, tokens[i], caller, order.y));
        return id;
      }),
    );
  }

  createGradientStrategy(
    caller: string,
    token0: string,
    token1: string,
    orders: [GradientOrder, GradientOrder],
  ): bigint {
    return this.guard.run(() =>
      atomically((journal) => {
        const tokens = this.validateTokens(token0, token1);
        orders.forEach((order) => validateGradientOrder(order));
        const inverted = !sameAddress(sortTokens(tokens[0], tokens[1])[0], tokens[0]);

        const pair = this.pairFor(tokens, journal);
        const id = this.nextStrategyId(pair, true, journal);
        const record: GradientStrategyRecord = {
          kind: 'gradient',
          id,
          pairId: pair.id,
          tokens,
          inverted,
          orders: _.cloneDeep(orders),
        };
        this.writeRecord(record, journal);
        this.mint(caller, id, journal);
        this.logger.log(`Gradient strategy ${id} created by ${caller} on pair ${pair.id}`);

        const deposits = this.custody(record);
        tokens.forEach((token, i) => journal.transferIn(this.funds, token, caller, deposits[i]));
        return id;
      }),
    );
  }

  updateStrategy(caller: string, id: bigint, currentOrders: OrderPair, newOrders: OrderPair) {
    this.guard.run(() =>
      atomically((journal) => {
        const record = this.standardRecord(id);
        this.assertOwner(caller, id);

        const stored = unpackOrders(record.packed);
        if (!stored.every((order, i) => ordersEqual(order, currentOrders[i]))) {
          throw new ExchangeException(ExchangeErrorCode.Outdated);
        }

        this.validateOrders(newOrders);
        const packed = packOrders(newOrders, isInverted(record.packed));
        this.writeRecord({ ...record, packed }, journal);
        this.logger.log(`Strategy ${id} updated by ${caller}`);

        newOrders.forEach((order, i) => {
          const delta = order.y - stored[i].y;
          if (delta > 0n) {
            journal.transferIn(this.funds, record.tokens[i], caller, delta);
          } else if (delta < 0n) {
            journal.transferOut(this.funds, record.tokens[i], caller, -delta);
          }
        });
      }),
    );
  }

  deleteStrategy(caller: string, id: bigint): [bigint, bigint] {
    return this.guard.run(() =>
      atomically((journal) => {
        const record = this.record(id);
        const owner = this.assertOwner(caller, id);
        const amounts = this.custody(record);

        this.strategies.delete(id);
        journal.record(() => this.strategies.set(id, record));
        this.ownership.burn(id);
        journal.record(() => this.ownership.mint(owner, id));
        this.logger.log(`Strategy ${id} deleted by ${caller}`);

        record.tokens.forEach((token, i) => journal.transferOut(this.funds, token, owner, amounts[i]));
        return amounts;
      }),
    );
  }

  trade(params: TradeParams): TradeResult {
    return this.guard.run(() =>
      atomically((journal) => {
        if (params.deadline < this.clock.now()) {
          throw new ExchangeException(ExchangeErrorCode.DeadlineExpired);
        }
        if (params.constraint <= 0n) {
          throw new ExchangeException(ExchangeErrorCode.InvalidConstraint);
        }

        const simulation = this.simulate(
          params.sourceToken,
          params.targetToken,
          params.tradeActions,
          params.byTargetAmount,
        );
        if (params.byTargetAmount && simulation.sourceAmount > params.constraint) {
          throw new ExchangeException(ExchangeErrorCode.GreaterThanMaxInput);
        }
        if (!params.byTargetAmount && simulation.targetAmount < params.constraint) {
          throw new ExchangeException(ExchangeErrorCode.LowerThanMinReturn);
        }

        simulation.staged.forEach((record) => this.writeRecord(record, journal));
        this.addFee(simulation.feeToken, simulation.tradingFeeAmount, journal);
        this.logger.debug(
          `Trade by ${params.caller}: ${simulation.sourceAmount} ${simulation.sourceToken} for ` +
            `${simulation.targetAmount} ${simulation.targetToken} over ${params.tradeActions.length} actions`,
        );

        journal.transferIn(this.funds, simulation.sourceToken, params.caller, simulation.sourceAmount);
        journal.transferOut(this.funds, simulation.targetToken, params.caller, simulation.targetAmount);

        const { sourceAmount, targetAmount, tradingFeeAmount } = simulation;
        return { sourceAmount, targetAmount, tradingFeeAmount };
      }),
    );
  }

  quote(sourceToken: string, targetToken: string, tradeActions: TradeAction[], byTargetAmount: boolean): TradeResult {
    const { sourceAmount, targetAmount, tradingFeeAmount } = this.simulate(
      sourceToken,
      targetToken,
      tradeActions,
      byTargetAmount,
    );
    return { sourceAmount, targetAmount, tradingFeeAmount };
  }

  // source amount a trade by target amount would charge, fee included
  calculateTradeSourceAmount(sourceToken: string, targetToken: string, tradeActions: TradeAction[]): bigint {
    return this.simulate(sourceToken, targetToken, tradeActions, true).sourceAmount;
  }

  // target amount a trade by source amount would return, fee deducted
  calculateTradeTargetAmount(sourceToken: string, targetToken: string, tradeActions: TradeAction[]): bigint {
    return this.simulate(sourceToken, targetToken, tradeActions, false).targetAmount;
  }

  strategy(id: bigint): Strategy {
    return this.toStrategy(this.record(id));
  }

  strategiesByPair(token0: string, token1: string, start = 0, end = 0): Strategy[] {
    const ids = this.activeIds(token0, token1);
    const last = end === 0 || end > ids.length ? ids.length : end;
    if (start > last) {
      throw new ExchangeException(ExchangeErrorCode.InvalidIndices);
    }
    return ids.slice(start, last).map((id) => this.strategy(id));
  }

  strategiesByPairCount(token0: string, token1: string): number {
    return this.activeIds(token0, token1).length;
  }

  accumulatedFees(token: string): bigint {
    return this.fees.get(checksumAddress(token).toLowerCase()) ?? 0n;
  }

  pairTradingFeePPM(token0: string, token1: string): number {
    const [a, b] = this.validateTokens(token0, token1);
    return this.protocolConfig.getPairTradingFeePPM(this.pairService.pair(a, b).id);
  }

  setPairTradingFeePPM(token0: string, token1: string, fee: number) {
    const [a, b] = this.validateTokens(token0, token1);
    this.protocolConfig.setPairTradingFeePPM(this.pairService.pair(a, b).id, fee);
  }

  private simulate(
    sourceToken: string,
    targetToken: string,
    tradeActions: TradeAction[],
    byTargetAmount: boolean,
  ): TradeSimulation {
    const [source, target] = this.validateTokens(sourceToken, targetToken);
    if (tradeActions.length === 0) {
      throw new ExchangeException(ExchangeErrorCode.InvalidTradeActionAmount);
    }

    const pair = this.pairService.pair(source, target);
    const isTargetToken0 = sameAddress(pair.tokens[0], target);
    const now = this.clock.now();
    const staged = new Map<bigint, StrategyRecord>();
    let sourceAmount = 0n;
    let targetAmount = 0n;

    for (const { strategyId, amount } of tradeActions) {
      if (pairIdOf(strategyId) !== pair.id) {
        throw new ExchangeException(ExchangeErrorCode.InvalidTradeActionStrategyId);
      }
      if (amount <= 0n || amount > MAX_UINT128) {
        throw new ExchangeException(ExchangeErrorCode.InvalidTradeActionAmount);
      }

      const record = staged.get(strategyId) ?? this.record(strategyId);
      const traded = this.tradeRecord(record, isTargetToken0, amount, byTargetAmount, now);
      staged.set(strategyId, traded.record);
      sourceAmount = toUint128(sourceAmount + traded.amounts.sourceAmount);
      targetAmount = toUint128(targetAmount + traded.amounts.targetAmount);
    }

    const fee = BigInt(this.protocolConfig.getPairTradingFeePPM(pair.id));
    if (byTargetAmount) {
      const sourceWithFee = toUint128(mulDivC(sourceAmount, PPM, PPM - fee));
      return {
        sourceToken: source,
        targetToken: target,
        feeToken: source,
        staged,
        sourceAmount: sourceWithFee,
        targetAmount,
        tradingFeeAmount: sourceWithFee - sourceAmount,
      };
    }

    const targetAfterFee = mulDivF(targetAmount, PPM - fee, PPM);
    return {
      sourceToken: source,
      targetToken: target,
      feeToken: target,
      staged,
      sourceAmount,
      targetAmount: targetAfterFee,
      tradingFeeAmount: targetAmount - targetAfterFee,
    };
  }

  private tradeRecord(
    record: StrategyRecord,
    isTargetToken0: boolean,
    amount: bigint,
    byTargetAmount: boolean,
    now: number,
  ): { record: StrategyRecord; amounts: SourceAndTargetAmounts } {
    if (record.kind === 'gradient') {
      const targetIndex = isTargetToken0 !== record.inverted ? 0 : 1;
      const order = record.orders[targetIndex];
      const amounts = gradientTradeAmounts(order, amount, byTargetAmount, now);
      const updated = applyGradientTrade(order, amounts);
      const orders: [GradientOrder, GradientOrder] =
        targetIndex === 0 ? [updated, record.orders[1]] : [record.orders[0], updated];
      return { record: { ...record, orders }, amounts };
    }

    const inverted = isInverted(record.packed);
    const orders = unpackOrders(record.packed);
    const targetIndex = isTargetToken0 !== inverted ? 0 : 1;
    const targetOrder = orders[targetIndex];
    const sourceOrder = orders[1 - targetIndex];

    const amounts = singleTradeActionSourceAndTargetAmounts(targetOrder, amount, byTargetAmount);
    const [newTarget, newSource] = applyTrade(targetOrder, sourceOrder, amounts);
    const next: OrderPair = targetIndex === 0 ? [newTarget, newSource] : [newSource, newTarget];
    return { record: { ...record, packed: packOrders(next, inverted) }, amounts };
  }

  private validateTokens(token0: string, token1: string): [string, string] {
    const tokens: [string, string] = [checksumAddress(token0), checksumAddress(token1)];
    if (sameAddress(tokens[0], tokens[1])) {
      throw new ExchangeException(ExchangeErrorCode.IdenticalAddresses);
    }
    return tokens;
  }

  private validateOrders(orders: OrderPair) {
    for (const order of orders) {
      if (order.y < 0n || order.y > MAX_UINT128 || order.z < 0n || order.z > MAX_UINT128) {
        throw new ExchangeException(ExchangeErrorCode.InvalidOrderValue);
      }
      if (order.z < order.y) {
        throw new ExchangeException(ExchangeErrorCode.InsufficientCapacity);
      }
      if (!isValidRate(order.A) || !isValidRate(order.B)) {
        throw new ExchangeException(ExchangeErrorCode.InvalidRate);
      }
    }
  }

  private pairFor(tokens: [string, string], journal: Journal): Pair {
    const existing = this.pairService.findPair(tokens[0], tokens[1]);
    if (existing) {
      return existing;
    }
    const pair = this.pairService.createPair(tokens[0], tokens[1]);
    journal.record(() => this.pairService.dropPair(pair));
    return pair;
  }

  private nextStrategyId(pair: Pair, gradient: boolean, journal: Journal): bigint {
    const last = this.lastIndexByPair.get(pair.id) ?? 0n;
    const id = strategyIdOf(pair.id, last + 1n, gradient);
    const ids = this.strategyIdsByPair.get(pair.id) ?? [];

    this.lastIndexByPair.set(pair.id, last + 1n);
    this.strategyIdsByPair.set(pair.id, [...ids, id]);
    journal.record(() => {
      this.lastIndexByPair.set(pair.id, last);
      this.strategyIdsByPair.set(pair.id, ids);
    });
    return id;
  }

  // standard records keep their three words; only the words that changed are replaced
  private writeRecord(next: StrategyRecord, journal: Journal) {
    const previous = this.strategies.get(next.id);
    let stored = next;
    if (previous?.kind === 'standard' && next.kind === 'standard') {
      const words: PackedOrders = [...previous.packed];
      for (const i of changedWords(previous.packed, next.packed)) {
        words[i] = next.packed[i];
        this.logger.debug(`Strategy ${next.id}: word ${i} rewritten`);
      }
      stored = { ...next, packed: words };
    }

    this.strategies.set(next.id, stored);
    journal.record(() => {
      if (previous) {
        this.strategies.set(next.id, previous);
      } else {
        this.strategies.delete(next.id);
      }
    });
  }

  private mint(owner: string, id: bigint, journal: Journal) {
    this.ownership.mint(owner, id);
    journal.record(() => this.ownership.burn(id));
  }

  private addFee(token: string, amount: bigint, journal: Journal) {
    if (amount === 0n) {
      return;
    }
    const key = token.toLowerCase();
    const previous = this.fees.get(key) ?? 0n;
    this.fees.set(key, previous + amount);
    journal.record(() => this.fees.set(key, previous));
  }

  private record(id: bigint): StrategyRecord {
    const record = this.strategies.get(id);
    if (!record) {
      throw new ExchangeException(ExchangeErrorCode.StrategyDoesNotExist);
    }
    return record;
  }

  private standardRecord(id: bigint): StandardStrategyRecord {
    const record = this.record(id);
    if (record.kind !== 'standard') {
      throw new ExchangeException(ExchangeErrorCode.StrategyDoesNotExist, `${id} is a gradient strategy`);
    }
    return record;
  }

  private assertOwner(caller: string, id: bigint): string {
    const owner = this.ownership.ownerOf(id);
    if (!sameAddress(owner, caller)) {
      throw new ExchangeException(ExchangeErrorCode.AccessDenied);
    }
    return owner;
  }

  // what the engine holds for a strategy, per token in creation order
  private custody(record: StrategyRecord): [bigint, bigint] {
    if (record.kind === 'standard') {
      const [order0, order1] = unpackOrders(record.packed);
      return [order0.y, order1.y];
    }
    const [order0, order1] = record.orders;
    return [order0.targetAmount + order1.sourceAmount, order1.targetAmount + order0.sourceAmount];
  }

  private activeIds(token0: string, token1: string): bigint[] {
    const [a, b] = this.validateTokens(token0, token1);
    const pair = this.pairService.pair(a, b);
    return (this.strategyIdsByPair.get(pair.id) ?? []).filter((id) => this.strategies.has(id));
  }

  private toStrategy(record: StrategyRecord): Strategy {
    const owner = this.ownership.ownerOf(record.id);
    if (record.kind === 'gradient') {
      return { kind: 'gradient', id: record.id, owner, tokens: [...record.tokens], orders: _.cloneDeep(record.orders) };
    }
    return { kind: 'standard', id: record.id, owner, tokens: [...record.tokens], orders: unpackOrders(record.packed) };
  }
}
