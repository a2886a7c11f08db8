import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Logger,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { GradientOrder as EngineGradientOrder } from '../../gradient/gradient.types';
import { parseUint } from '../../isUintString.validator';
import { Order as EngineOrder, OrderPair } from '../../order/order.types';
import { decodeOrder } from '../../rate/rate-codec.utils';
import { StrategyService } from '../../strategy/strategy.service';
import { Strategy as EngineStrategy, TradeAction, TradeResult } from '../../strategy/strategy.types';
import {
  CallerDto,
  CreateGradientStrategyDto,
  CreateStrategyDto,
  CreateStrategyResponse,
  DeleteStrategyResponse,
  GradientOrder,
  GradientOrderDto,
  Order,
  OrderDto,
  OrderRates,
  QuoteDto,
  StrategiesByPairQueryDto,
  StrategiesResponse,
  Strategy,
  TradeActionDto,
  TradeDto,
  TradeResponse,
  UpdateStrategyDto,
} from './strategies.dto';

function badRequest(message: string): BadRequestException {
  return new BadRequestException({ message: [message], error: 'Bad Request', statusCode: 400 });
}

function pairOf<T>(items: T[], key: string): [T, T] {
  if (items.length !== 2) {
    throw badRequest(`${key} must hold exactly two orders`);
  }
  return [items[0], items[1]];
}

export function fromOrder(order: OrderDto): EngineOrder {
  return {
    y: parseUint({ value: order.y, key: 'y' }),
    z: parseUint({ value: order.z, key: 'z' }),
    A: parseUint({ value: order.A, key: 'A' }),
    B: parseUint({ value: order.B, key: 'B' }),
  };
}

function fromOrders(orders: OrderDto[], key: string): OrderPair {
  const [first, second] = pairOf(orders, key);
  return [fromOrder(first), fromOrder(second)];
}

export function fromGradientOrder(order: GradientOrderDto): EngineGradientOrder {
  const { curve } = order;
  let engineCurve: EngineGradientOrder['curve'];
  if (curve.type === 'linear') {
    if (curve.increaseAmount === undefined || curve.increaseInterval === undefined) {
      throw badRequest('a linear curve needs increaseAmount and increaseInterval');
    }
    engineCurve = {
      type: 'linear',
      increaseAmount: parseUint({ value: curve.increaseAmount, key: 'increaseAmount' }),
      increaseInterval: curve.increaseInterval,
      isDutchAuction: curve.isDutchAuction,
    };
  } else {
    if (curve.halflife === undefined) {
      throw badRequest('an exponential curve needs halflife');
    }
    engineCurve = { type: 'exponential', halflife: curve.halflife, isDutchAuction: curve.isDutchAuction };
  }

  return {
    initialPrice: {
      sourceAmount: parseUint({ value: order.initialPrice.sourceAmount, key: 'initialPrice.sourceAmount' }),
      targetAmount: parseUint({ value: order.initialPrice.targetAmount, key: 'initialPrice.targetAmount' }),
    },
    endPrice: {
      sourceAmount: parseUint({ value: order.endPrice.sourceAmount, key: 'endPrice.sourceAmount' }),
      targetAmount: parseUint({ value: order.endPrice.targetAmount, key: 'endPrice.targetAmount' }),
    },
    sourceAmount: parseUint({ value: order.sourceAmount, key: 'sourceAmount' }),
    targetAmount: parseUint({ value: order.targetAmount, key: 'targetAmount' }),
    tradingStartTime: order.tradingStartTime,
    expiry: order.expiry,
    tokensInverted: order.tokensInverted,
    curve: engineCurve,
  };
}

export function toOrder(order: EngineOrder): Order {
  return { y: order.y.toString(), z: order.z.toString(), A: order.A.toString(), B: order.B.toString() };
}

export function toOrderRates(order: EngineOrder): OrderRates {
  const decoded = decodeOrder(order);
  return {
    budget: decoded.liquidity.toString(),
    min: decoded.lowestRate.toString(),
    max: decoded.highestRate.toString(),
    marginal: decoded.marginalRate.toString(),
  };
}

export function toGradientOrder(order: EngineGradientOrder): GradientOrder {
  const { curve } = order;
  return {
    initialPrice: {
      sourceAmount: order.initialPrice.sourceAmount.toString(),
      targetAmount: order.initialPrice.targetAmount.toString(),
    },
    endPrice: {
      sourceAmount: order.endPrice.sourceAmount.toString(),
      targetAmount: order.endPrice.targetAmount.toString(),
    },
    sourceAmount: order.sourceAmount.toString(),
    targetAmount: order.targetAmount.toString(),
    tradingStartTime: order.tradingStartTime,
    expiry: order.expiry,
    tokensInverted: order.tokensInverted,
    curve:
      curve.type === 'linear'
        ? {
            type: 'linear',
            increaseAmount: curve.increaseAmount.toString(),
            increaseInterval: curve.increaseInterval,
            isDutchAuction: curve.isDutchAuction,
          }
        : { type: 'exponential', halflife: curve.halflife, isDutchAuction: curve.isDutchAuction },
  };
}

export function toStrategy(strategy: EngineStrategy): Strategy {
  const base = { id: strategy.id.toString(), owner: strategy.owner, tokens: strategy.tokens };
  if (strategy.kind === 'gradient') {
    return {
      ...base,
      kind: 'gradient',
      orders: [toGradientOrder(strategy.orders[0]), toGradientOrder(strategy.orders[1])],
    };
  }
  return {
    ...base,
    kind: 'standard',
    orders: [toOrder(strategy.orders[0]), toOrder(strategy.orders[1])],
    rates: [toOrderRates(strategy.orders[0]), toOrderRates(strategy.orders[1])],
  };
}

function toTradeResponse(result: TradeResult): TradeResponse {
  return {
    sourceAmount: result.sourceAmount.toString(),
    targetAmount: result.targetAmount.toString(),
    tradingFeeAmount: result.tradingFeeAmount.toString(),
  };
}

function toTradeActions(actions: TradeActionDto[]): TradeAction[] {
  return actions.map((action) => ({
    strategyId: parseUint({ value: action.strategyId, key: 'strategyId' }),
    amount: parseUint({ value: action.amount, key: 'amount' }),
  }));
}

@Controller({ version: '1', path: 'strategies' })
export class StrategiesController {
  private readonly logger = new Logger(StrategiesController.name);

  constructor(private strategyService: StrategyService) {}

  @Post()
  createStrategy(@Body() body: CreateStrategyDto): CreateStrategyResponse {
    const orders = fromOrders(body.orders, 'orders');
    const id = this.logFailure(`Strategy creation by ${body.caller}`, () =>
      this.strategyService.createStrategy(body.caller, body.token0, body.token1, orders),
    );
    return { id: id.toString() };
  }

  @Post('gradient')
  createGradientStrategy(@Body() body: CreateGradientStrategyDto): CreateStrategyResponse {
    const [first, second] = pairOf(body.orders, 'orders');
    const orders: [EngineGradientOrder, EngineGradientOrder] = [fromGradientOrder(first), fromGradientOrder(second)];
    const id = this.logFailure(`Gradient strategy creation by ${body.caller}`, () =>
      this.strategyService.createGradientStrategy(body.caller, body.token0, body.token1, orders),
    );
    return { id: id.toString() };
  }

  @Get('pair')
  getStrategiesByPair(@Query() query: StrategiesByPairQueryDto): StrategiesResponse {
    const strategies = this.strategyService.strategiesByPair(query.token0, query.token1, query.start, query.end);
    return {
      strategies: strategies.map(toStrategy),
      count: this.strategyService.strategiesByPairCount(query.token0, query.token1),
    };
  }

  @Get(':id')
  getStrategy(@Param('id') id: string): Strategy {
    return toStrategy(this.strategyService.strategy(parseUint({ value: id, key: 'id' })));
  }

  @Put(':id')
  updateStrategy(@Param('id') id: string, @Body() body: UpdateStrategyDto): Strategy {
    const strategyId = parseUint({ value: id, key: 'id' });
    const currentOrders = fromOrders(body.currentOrders, 'currentOrders');
    const newOrders = fromOrders(body.newOrders, 'newOrders');
    this.logFailure(`Update of strategy ${id} by ${body.caller}`, () =>
      this.strategyService.updateStrategy(body.caller, strategyId, currentOrders, newOrders),
    );
    return toStrategy(this.strategyService.strategy(strategyId));
  }

  @Delete(':id')
  deleteStrategy(@Param('id') id: string, @Body() body: CallerDto): DeleteStrategyResponse {
    const strategyId = parseUint({ value: id, key: 'id' });
    const [amount0, amount1] = this.logFailure(`Deletion of strategy ${id} by ${body.caller}`, () =>
      this.strategyService.deleteStrategy(body.caller, strategyId),
    );
    return { amounts: [amount0.toString(), amount1.toString()] };
  }

  @Post('quote')
  @HttpCode(200)
  quote(@Body() body: QuoteDto): TradeResponse {
    const result = this.strategyService.quote(
      body.sourceToken,
      body.targetToken,
      toTradeActions(body.tradeActions),
      body.byTargetAmount,
    );
    return toTradeResponse(result);
  }

  @Post('trade')
  @HttpCode(200)
  trade(@Body() body: TradeDto): TradeResponse {
    const result = this.logFailure(`Trade by ${body.caller}`, () =>
      this.strategyService.trade({
        caller: body.caller,
        sourceToken: body.sourceToken,
        targetToken: body.targetToken,
        tradeActions: toTradeActions(body.tradeActions),
        byTargetAmount: body.byTargetAmount,
        deadline: body.deadline,
        constraint: parseUint({ value: body.constraint, key: 'constraint' }),
      }),
    );
    return toTradeResponse(result);
  }

  private logFailure<T>(action: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      this.logger.error(`${action} failed: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }
}
