import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { NATIVE_TOKEN, ProtocolConfigService } from '../config/protocol-config.service';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { CLOCK_PORT } from '../ports/clock.port';
import { InMemoryTokenVault, POL_FUNDS_PORT, TokenLedger } from '../ports/funds.port';
import { PolSellerService } from './pol-seller.service';

describe('PolSellerService', () => {
  let service: PolSellerService;
  let ledger: TokenLedger;

  const NOW = 1_700_000_000;
  const HALF_LIFE = 864000;
  const POL = '0x0000000000000000000000000000000000000a02';
  const FINAL_TARGET = '0x0000000000000000000000000000000000000b01';
  const TOKEN = '0x1000000000000000000000000000000000000001';
  const TRADER = '0x4000000000000000000000000000000000000004';

  const env: Record<string, string> = {
    POL_SALE_AMOUNT: '1000',
    POL_MIN_SALE_AMOUNT: '100',
  };
  const mockClock = { now: jest.fn().mockReturnValue(NOW) };

  beforeEach(async () => {
    mockClock.now.mockReturnValue(NOW);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PolSellerService,
        ProtocolConfigService,
        TokenLedger,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((name: string) => env[name]) },
        },
        {
          provide: POL_FUNDS_PORT,
          useFactory: (tokenLedger: TokenLedger, config: ProtocolConfigService) =>
            new InMemoryTokenVault(tokenLedger, config.pol.account),
          inject: [TokenLedger, ProtocolConfigService],
        },
        {
          provide: CLOCK_PORT,
          useValue: mockClock,
        },
      ],
    }).compile();

    service = module.get<PolSellerService>(PolSellerService);
    ledger = module.get<TokenLedger>(TokenLedger);

    ledger.credit(TOKEN, POL, 10000n);
    ledger.credit(NATIVE_TOKEN, POL, 2000n);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('pricing', () => {
    beforeEach(() => {
      service.enableTrading(TOKEN, { sourceAmount: 3n, targetAmount: 1n });
    });

    it('should start at the market price times the multiplier', () => {
      expect(service.tokenPrice(TOKEN)).toEqual({ sourceAmount: 6n, targetAmount: 1n });
      expect(service.expectedTradeInput(TOKEN, 100n)).toBe(600n);
      expect(service.expectedTradeReturn(TOKEN, 600n)).toBe(100n);
    });

    it('should halve every half-life', () => {
      mockClock.now.mockReturnValue(NOW + HALF_LIFE);
      expect(service.expectedTradeInput(TOKEN, 100n)).toBe(300n);

      mockClock.now.mockReturnValue(NOW + HALF_LIFE / 2);
      expect(service.tokenPrice(TOKEN)).toEqual({ sourceAmount: 4n, targetAmount: 1n });
    });

    it('should stop pricing a disabled token', () => {
      service.disableTrading(TOKEN);

      expect(service.tradingEnabled(TOKEN)).toBe(false);
      expect(() => service.tokenPrice(TOKEN)).toThrow(new ExchangeException(ExchangeErrorCode.TradingDisabled));
    });

    it('should reject an empty price', () => {
      expect(() => service.enableTrading(TOKEN, { sourceAmount: 0n, targetAmount: 1n })).toThrow(
        new ExchangeException(ExchangeErrorCode.InvalidPrice),
      );
    });

    it('should take the native token for other tokens', () => {
      expect(service.paymentToken(TOKEN)).toBe(NATIVE_TOKEN);
      expect(service.paymentToken(NATIVE_TOKEN)).toBe(FINAL_TARGET);
      expect(service.amountAvailableForTrading(TOKEN)).toBe(10000n);
    });
  });

  describe('trade', () => {
    beforeEach(() => {
      service.enableTrading(TOKEN, { sourceAmount: 3n, targetAmount: 1n });
      ledger.credit(NATIVE_TOKEN, TRADER, 1000n);
    });

    it('should sell the token for the native token', () => {
      expect(service.trade(TRADER, TOKEN, 100n, 600n, 600n)).toEqual({ sourceAmount: 600n, targetAmount: 100n });

      expect(ledger.balanceOf(TOKEN, TRADER)).toBe(100n);
      expect(ledger.balanceOf(NATIVE_TOKEN, TRADER)).toBe(400n);
      expect(ledger.balanceOf(NATIVE_TOKEN, POL)).toBe(2600n);
    });

    it('should send back what exceeds the price', () => {
      service.trade(TRADER, TOKEN, 100n, 600n, 700n);

      expect(ledger.balanceOf(NATIVE_TOKEN, TRADER)).toBe(400n);
      expect(ledger.balanceOf(NATIVE_TOKEN, POL)).toBe(2600n);
    });

    it('should validate the trade', () => {
      expect(() => service.trade(TRADER, TOKEN, 0n, 600n, 600n)).toThrow(
        new ExchangeException(ExchangeErrorCode.InvalidTradeActionAmount),
      );
      expect(() => service.trade(TRADER, TOKEN, 100n, 599n, 600n)).toThrow(
        new ExchangeException(ExchangeErrorCode.GreaterThanMaxInput),
      );
      expect(() => service.trade(TRADER, TOKEN, 10001n, 10n ** 6n, 10n ** 6n)).toThrow(
        new ExchangeException(ExchangeErrorCode.InsufficientSaleAmount),
      );
      expect(() => service.trade(TRADER, TOKEN, 100n, 600n, 599n)).toThrow(
        new ExchangeException(ExchangeErrorCode.InsufficientNativeTokenSent),
      );
    });

    it('should reject a trade worth nothing', () => {
      mockClock.now.mockReturnValue(NOW + HALF_LIFE * 10);

      expect(() => service.trade(TRADER, TOKEN, 1n, 600n, 600n)).toThrow(
        new ExchangeException(ExchangeErrorCode.InvalidTrade),
      );
    });
  });

  describe('native token sale', () => {
    beforeEach(() => {
      service.enableTrading(NATIVE_TOKEN, { sourceAmount: 1n, targetAmount: 1n });
      ledger.credit(FINAL_TARGET, TRADER, 10000n);
    });

    it('should fill the sale budget when trading is enabled', () => {
      expect(service.saleAmount()).toEqual({ initial: 1000n, current: 1000n });
      expect(service.amountAvailableForTrading(NATIVE_TOKEN)).toBe(1000n);
    });

    it('should draw the budget down', () => {
      expect(service.trade(TRADER, NATIVE_TOKEN, 800n, 1600n)).toEqual({ sourceAmount: 1600n, targetAmount: 800n });

      expect(service.saleAmount()).toEqual({ initial: 1000n, current: 200n });
      expect(ledger.balanceOf(NATIVE_TOKEN, TRADER)).toBe(800n);
      expect(ledger.balanceOf(FINAL_TARGET, POL)).toBe(1600n);
    });

    it('should refill the budget and raise the price once it runs low', () => {
      service.trade(TRADER, NATIVE_TOKEN, 800n, 1600n);
      service.trade(TRADER, NATIVE_TOKEN, 150n, 300n);

      expect(service.saleAmount()).toEqual({ initial: 1000n, current: 1000n });
      expect(service.auction(NATIVE_TOKEN)).toEqual({
        tradingStartTime: NOW,
        initialPrice: { sourceAmount: 2n, targetAmount: 1n },
        halfLife: HALF_LIFE,
      });
      expect(service.expectedTradeInput(NATIVE_TOKEN, 10n)).toBe(40n);
    });

    it('should reset once per threshold crossing', () => {
      service.trade(TRADER, NATIVE_TOKEN, 800n, 1600n);
      service.trade(TRADER, NATIVE_TOKEN, 150n, 300n);
      service.trade(TRADER, NATIVE_TOKEN, 100n, 400n);

      expect(service.saleAmount()).toEqual({ initial: 1000n, current: 900n });
      expect(service.auction(NATIVE_TOKEN)?.initialPrice).toEqual({ sourceAmount: 2n, targetAmount: 1n });

      service.trade(TRADER, NATIVE_TOKEN, 850n, 3400n);

      expect(service.saleAmount()).toEqual({ initial: 1000n, current: 100n });
      expect(service.auction(NATIVE_TOKEN)?.initialPrice).toEqual({ sourceAmount: 4n, targetAmount: 1n });
    });

    it('should keep the price bounded over many resets', () => {
      ledger.credit(NATIVE_TOKEN, POL, 10n ** 6n);
      ledger.credit(FINAL_TARGET, TRADER, 10n ** 6n);

      for (let i = 1; i <= 300; i++) {
        mockClock.now.mockReturnValue(NOW + HALF_LIFE * i);
        expect(service.trade(TRADER, NATIVE_TOKEN, 950n, 950n)).toEqual({ sourceAmount: 950n, targetAmount: 950n });
      }

      expect(service.auction(NATIVE_TOKEN)).toEqual({
        tradingStartTime: NOW + HALF_LIFE * 300,
        initialPrice: { sourceAmount: 1n, targetAmount: 1n },
        halfLife: HALF_LIFE,
      });
    });

    it('should not sell beyond the budget', () => {
      expect(() => service.trade(TRADER, NATIVE_TOKEN, 1001n, 10n ** 6n)).toThrow(
        new ExchangeException(ExchangeErrorCode.InsufficientSaleAmount),
      );
    });

    it('should keep the budget when the payment fails', () => {
      const poorTrader = '0x7000000000000000000000000000000000000007';

      expect(() => service.trade(poorTrader, NATIVE_TOKEN, 800n, 1600n)).toThrow(
        new ExchangeException(ExchangeErrorCode.InsufficientBalance),
      );
      expect(service.saleAmount()).toEqual({ initial: 1000n, current: 1000n });
      expect(ledger.balanceOf(NATIVE_TOKEN, POL)).toBe(2000n);
    });
  });
});
