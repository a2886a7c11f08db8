import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ExchangeErrorCode, ExchangeException } from '../../errors/exchange.errors';
import { StrategyService } from '../../strategy/strategy.service';
import { Strategy } from '../../strategy/strategy.types';
import { StrategiesController } from './strategies.controller';
import { GradientOrderDto, OrderDto, TradeDto } from './strategies.dto';

describe('StrategiesController', () => {
  let controller: StrategiesController;
  let strategyService: jest.Mocked<StrategyService>;

  const TOKEN_A = '0x1000000000000000000000000000000000000001';
  const TOKEN_B = '0x2000000000000000000000000000000000000002';
  const OWNER = '0x3000000000000000000000000000000000000003';
  const TRADER = '0x4000000000000000000000000000000000000004';
  const STRATEGY_ID = (1n << 128n) | 1n;

  const mockStrategy: Strategy = {
    kind: 'standard',
    id: STRATEGY_ID,
    owner: OWNER,
    tokens: [TOKEN_A, TOKEN_B],
    orders: [
      { y: 100n, z: 100n, A: 422212465065984n, B: 422212465065984n },
      { y: 0n, z: 0n, A: 0n, B: 0n },
    ],
  };

  const tradeDto: TradeDto = {
    caller: TRADER,
    sourceToken: TOKEN_B,
    targetToken: TOKEN_A,
    tradeActions: [{ strategyId: STRATEGY_ID.toString(), amount: '100' }],
    byTargetAmount: true,
    deadline: 1_700_000_060,
    constraint: '1000',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [StrategiesController],
      providers: [
        {
          provide: StrategyService,
          useValue: {
            createStrategy: jest.fn(),
            createGradientStrategy: jest.fn(),
            updateStrategy: jest.fn(),
            deleteStrategy: jest.fn(),
            strategy: jest.fn(),
            strategiesByPair: jest.fn(),
            strategiesByPairCount: jest.fn(),
            quote: jest.fn(),
            trade: jest.fn(),
          },
        },
      ],
    }).compile();

    controller = module.get<StrategiesController>(StrategiesController);
    strategyService = module.get(StrategyService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  describe('strategy writes', () => {
    const orderDtos: OrderDto[] = [
      { y: '100', z: '100', A: '422212465065984', B: '422212465065984' },
      { y: '0', z: '0', A: '0', B: '0' },
    ];

    it('should create the strategy on behalf of the caller', () => {
      strategyService.createStrategy.mockReturnValue(STRATEGY_ID);

      const result = controller.createStrategy({ caller: OWNER, token0: TOKEN_A, token1: TOKEN_B, orders: orderDtos });

      expect(result).toEqual({ id: '340282366920938463463374607431768211457' });
      expect(strategyService.createStrategy).toHaveBeenCalledWith(OWNER, TOKEN_A, TOKEN_B, mockStrategy.orders);
    });

    it('should require exactly two orders', () => {
      expect(() =>
        controller.createStrategy({ caller: OWNER, token0: TOKEN_A, token1: TOKEN_B, orders: [orderDtos[0]] }),
      ).toThrow(BadRequestException);
      expect(strategyService.createStrategy).not.toHaveBeenCalled();
    });

    it('should update against the orders last read', () => {
      strategyService.strategy.mockReturnValue(mockStrategy);

      const result = controller.updateStrategy(STRATEGY_ID.toString(), {
        caller: OWNER,
        currentOrders: orderDtos,
        newOrders: orderDtos,
      });

      expect(result.id).toBe(STRATEGY_ID.toString());
      expect(strategyService.updateStrategy).toHaveBeenCalledWith(
        OWNER,
        STRATEGY_ID,
        mockStrategy.orders,
        mockStrategy.orders,
      );
    });

    it('should return what a deletion paid out', () => {
      strategyService.deleteStrategy.mockReturnValue([100n, 0n]);

      expect(controller.deleteStrategy(STRATEGY_ID.toString(), { caller: OWNER })).toEqual({ amounts: ['100', '0'] });
      expect(strategyService.deleteStrategy).toHaveBeenCalledWith(OWNER, STRATEGY_ID);
    });

    it('should log and rethrow a rejected deletion', () => {
      const loggerErrorSpy = jest.spyOn(controller['logger'], 'error').mockImplementation();
      strategyService.deleteStrategy.mockImplementation(() => {
        throw new ExchangeException(ExchangeErrorCode.AccessDenied);
      });

      expect(() => controller.deleteStrategy(STRATEGY_ID.toString(), { caller: TRADER })).toThrow(
        new ExchangeException(ExchangeErrorCode.AccessDenied),
      );
      expect(loggerErrorSpy).toHaveBeenCalledWith(
        `Deletion of strategy ${STRATEGY_ID} by ${TRADER} failed: AccessDenied`,
      );

      loggerErrorSpy.mockRestore();
    });
  });

  describe('createGradientStrategy', () => {
    const gradientDto: GradientOrderDto = {
      initialPrice: { sourceAmount: '2000', targetAmount: '1000' },
      endPrice: { sourceAmount: '1000', targetAmount: '1000' },
      sourceAmount: '0',
      targetAmount: '1000',
      tradingStartTime: 1_700_000_000,
      expiry: 1_700_086_400,
      tokensInverted: false,
      curve: { type: 'exponential', halflife: 3600, isDutchAuction: true },
    };

    it('should parse the curves', () => {
      strategyService.createGradientStrategy.mockReturnValue(STRATEGY_ID);
      const linear: GradientOrderDto = {
        ...gradientDto,
        curve: { type: 'linear', increaseAmount: '50', increaseInterval: 60, isDutchAuction: false },
      };

      controller.createGradientStrategy({
        caller: OWNER,
        token0: TOKEN_A,
        token1: TOKEN_B,
        orders: [gradientDto, linear],
      });

      const [, , , orders] = strategyService.createGradientStrategy.mock.calls[0];
      expect(orders[0]).toEqual({
        initialPrice: { sourceAmount: 2000n, targetAmount: 1000n },
        endPrice: { sourceAmount: 1000n, targetAmount: 1000n },
        sourceAmount: 0n,
        targetAmount: 1000n,
        tradingStartTime: 1_700_000_000,
        expiry: 1_700_086_400,
        tokensInverted: false,
        curve: { type: 'exponential', halflife: 3600, isDutchAuction: true },
      });
      expect(orders[1].curve).toEqual({
        type: 'linear',
        increaseAmount: 50n,
        increaseInterval: 60,
        isDutchAuction: false,
      });
    });

    it('should reject a curve without its period', () => {
      const incomplete: GradientOrderDto = { ...gradientDto, curve: { type: 'exponential', isDutchAuction: true } };

      expect(() =>
        controller.createGradientStrategy({
          caller: OWNER,
          token0: TOKEN_A,
          token1: TOKEN_B,
          orders: [incomplete, gradientDto],
        }),
      ).toThrow(BadRequestException);
      expect(strategyService.createGradientStrategy).not.toHaveBeenCalled();
    });
  });

  describe('getStrategy', () => {
    it('should return the orders with their decoded rates', () => {
      strategyService.strategy.mockReturnValue(mockStrategy);

      expect(controller.getStrategy(STRATEGY_ID.toString())).toEqual({
        kind: 'standard',
        id: '340282366920938463463374607431768211457',
        owner: OWNER,
        tokens: [TOKEN_A, TOKEN_B],
        orders: [
          { y: '100', z: '100', A: '422212465065984', B: '422212465065984' },
          { y: '0', z: '0', A: '0', B: '0' },
        ],
        rates: [
          { budget: '100', min: '1', max: '4', marginal: '4' },
          { budget: '0', min: '0', max: '0', marginal: '0' },
        ],
      });
      expect(strategyService.strategy).toHaveBeenCalledWith(STRATEGY_ID);
    });

    it('should reject an id that is not a number', () => {
      expect(() => controller.getStrategy('0x01')).toThrow(BadRequestException);
      expect(strategyService.strategy).not.toHaveBeenCalled();
    });
  });

  describe('getStrategiesByPair', () => {
    it('should return the page and the total count', () => {
      strategyService.strategiesByPair.mockReturnValue([mockStrategy]);
      strategyService.strategiesByPairCount.mockReturnValue(3);

      const result = controller.getStrategiesByPair({ token0: TOKEN_A, token1: TOKEN_B, start: 1, end: 2 });

      expect(result.count).toBe(3);
      expect(result.strategies.map((strategy) => strategy.id)).toEqual([STRATEGY_ID.toString()]);
      expect(strategyService.strategiesByPair).toHaveBeenCalledWith(TOKEN_A, TOKEN_B, 1, 2);
    });
  });

  describe('quote', () => {
    it('should pass the parsed actions and stringify the amounts', () => {
      strategyService.quote.mockReturnValue({ sourceAmount: 201n, targetAmount: 100n, tradingFeeAmount: 1n });

      expect(controller.quote(tradeDto)).toEqual({ sourceAmount: '201', targetAmount: '100', tradingFeeAmount: '1' });
      expect(strategyService.quote).toHaveBeenCalledWith(
        TOKEN_B,
        TOKEN_A,
        [{ strategyId: STRATEGY_ID, amount: 100n }],
        true,
      );
    });
  });

  describe('trade', () => {
    it('should trade on behalf of the caller', () => {
      strategyService.trade.mockReturnValue({ sourceAmount: 201n, targetAmount: 100n, tradingFeeAmount: 1n });

      expect(controller.trade(tradeDto)).toEqual({ sourceAmount: '201', targetAmount: '100', tradingFeeAmount: '1' });
      expect(strategyService.trade).toHaveBeenCalledWith({
        caller: TRADER,
        sourceToken: TOKEN_B,
        targetToken: TOKEN_A,
        tradeActions: [{ strategyId: STRATEGY_ID, amount: 100n }],
        byTargetAmount: true,
        deadline: 1_700_000_060,
        constraint: 1000n,
      });
    });

    it('should log and rethrow a rejected trade', () => {
      const loggerErrorSpy = jest.spyOn(controller['logger'], 'error').mockImplementation();
      strategyService.trade.mockImplementation(() => {
        throw new ExchangeException(ExchangeErrorCode.GreaterThanMaxInput);
      });

      expect(() => controller.trade(tradeDto)).toThrow(new ExchangeException(ExchangeErrorCode.GreaterThanMaxInput));
      expect(loggerErrorSpy).toHaveBeenCalledWith(`Trade by ${TRADER} failed: GreaterThanMaxInput`);

      loggerErrorSpy.mockRestore();
    });
  });
});
