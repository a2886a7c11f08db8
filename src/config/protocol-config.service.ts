import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';

export const NATIVE_TOKEN = '0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE';
export const PPM_RESOLUTION = 1_000_000;
export const DEFAULT_TRADING_FEE_PPM = 2000;

export interface AuctionSettings {
  // custody account holding the tokens for sale
  account: string;
  // token paid for every other token
  targetToken: string;
  // token paid for the target token itself, which is the throttled one
  finalTargetToken: string;
  marketPriceMultiplier: bigint;
  priceDecayHalfLife: number;
  priceDecayHalfLifeOnReset: number;
  priceResetMultiplier: bigint;
  initialSaleAmount: bigint;
  minSaleAmount: bigint;
  minTokenSaleAmount: bigint;
}

const TEN_DAYS = 10 * 24 * 60 * 60;
const TWELVE_HOURS = 12 * 60 * 60;
const ETHER = 10n ** 18n;
const UINT_PATTERN = /^\d+$/;

@Injectable()
export class ProtocolConfigService {
  private readonly logger = new Logger(ProtocolConfigService.name);
  private tradingFeePPM: number;
  private pairTradingFeePPM = new Map<bigint, number>();

  readonly vaultAccount: string;
  readonly pol: AuctionSettings;
  readonly feeAuction: AuctionSettings;

  constructor(private configService: ConfigService) {
    this.tradingFeePPM = this.fee(this.number('TRADING_FEE_PPM', DEFAULT_TRADING_FEE_PPM));
    this.vaultAccount = this.string('VAULT_ACCOUNT', '0x0000000000000000000000000000000000000a01');
    this.pol = {
      account: this.string('POL_ACCOUNT', '0x0000000000000000000000000000000000000a02'),
      targetToken: NATIVE_TOKEN,
      finalTargetToken: this.string('POL_FINAL_TARGET_TOKEN', '0x0000000000000000000000000000000000000b01'),
      marketPriceMultiplier: this.bigint('POL_MARKET_PRICE_MULTIPLIER', 2n, 1n),
      priceDecayHalfLife: this.number('POL_PRICE_DECAY_HALF_LIFE', TEN_DAYS, 1),
      priceDecayHalfLifeOnReset: this.number('POL_PRICE_DECAY_HALF_LIFE_ON_RESET', TEN_DAYS, 1),
      priceResetMultiplier: this.bigint('POL_PRICE_RESET_MULTIPLIER', 2n, 1n),
      initialSaleAmount: this.bigint('POL_SALE_AMOUNT', 100n * ETHER),
      minSaleAmount: this.bigint('POL_MIN_SALE_AMOUNT', 10n * ETHER),
      minTokenSaleAmount: this.bigint('POL_MIN_TOKEN_SALE_AMOUNT', 1n),
    };
    this.feeAuction = {
      account: this.string('FEE_AUCTION_ACCOUNT', '0x0000000000000000000000000000000000000a03'),
      targetToken: this.string('FEE_AUCTION_TARGET_TOKEN', NATIVE_TOKEN),
      finalTargetToken: this.string('FEE_AUCTION_FINAL_TARGET_TOKEN', '0x0000000000000000000000000000000000000b01'),
      marketPriceMultiplier: this.bigint('FEE_AUCTION_MARKET_PRICE_MULTIPLIER', 1n, 1n),
      priceDecayHalfLife: this.number('FEE_AUCTION_PRICE_DECAY_HALF_LIFE', TWELVE_HOURS, 1),
      priceDecayHalfLifeOnReset: this.number('FEE_AUCTION_PRICE_DECAY_HALF_LIFE_ON_RESET', TWELVE_HOURS, 1),
      priceResetMultiplier: this.bigint('FEE_AUCTION_PRICE_RESET_MULTIPLIER', 2n, 1n),
      initialSaleAmount: this.bigint('FEE_AUCTION_SALE_AMOUNT', 100n * ETHER),
      minSaleAmount: this.bigint('FEE_AUCTION_MIN_SALE_AMOUNT', 10n * ETHER),
      minTokenSaleAmount: this.bigint('FEE_AUCTION_MIN_TOKEN_SALE_AMOUNT', 1000n),
    };
  }

  getTradingFeePPM(): number {
    return this.tradingFeePPM;
  }

  setTradingFeePPM(fee: number) {
    this.tradingFeePPM = this.fee(fee);
    this.logger.log(`Trading fee set to ${fee} ppm`);
  }

  // a pair without its own fee pays the default one
  getPairTradingFeePPM(pairId: bigint): number {
    return this.pairTradingFeePPM.get(pairId) ?? this.tradingFeePPM;
  }

  setPairTradingFeePPM(pairId: bigint, fee: number) {
    this.pairTradingFeePPM.set(pairId, this.fee(fee));
    this.logger.log(`Trading fee of pair ${pairId} set to ${fee} ppm`);
  }

  private fee(value: number): number {
    if (!Number.isInteger(value) || value < 0 || value > PPM_RESOLUTION) {
      throw new ExchangeException(ExchangeErrorCode.InvalidFee);
    }
    return value;
  }

  private string(name: string, fallback: string): string {
    return this.configService.get<string>(name) ?? fallback;
  }

  private number(name: string, fallback: number, min = 0): number {
    const value = this.configService.get<string>(name);
    if (value === undefined) {
      return fallback;
    }
    const parsed = Number(value);
    if (!UINT_PATTERN.test(value) || !Number.isSafeInteger(parsed) || parsed < min) {
      throw new Error(`${name} must be an integer of at least ${min}, got "${value}"`);
    }
    return parsed;
  }

  private bigint(name: string, fallback: bigint, min = 0n): bigint {
    const value = this.configService.get<string>(name);
    if (value === undefined) {
      return fallback;
    }
    if (!UINT_PATTERN.test(value) || BigInt(value) < min) {
      throw new Error(`${name} must be an integer of at least ${min}, got "${value}"`);
    }
    return BigInt(value);
  }
}
