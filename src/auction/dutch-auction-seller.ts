import { Logger } from '@nestjs/common';
import { AuctionSettings, NATIVE_TOKEN } from '../config/protocol-config.service';
import { expDecay, isValidPrice, Price } from '../decay/decay-pricing.utils';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { checksumAddress, sameAddress } from '../isAddress.validator';
import { checkedMul, checkedSub, gcd, mulDivF } from '../math/math-ex.utils';
import { SourceAndTargetAmounts } from '../order/order.types';
import { ClockPort } from '../ports/clock.port';
import { FundsPort } from '../ports/funds.port';
import { atomically, Journal } from '../ports/journal';
import { ReentrancyGuard } from '../ports/reentrancy.guard';
import { SaleAmount, TokenAuction } from './auction.types';

/**
 * Sells the tokens it holds through per-token dutch auctions: each price starts at
 * `initialPrice * marketPriceMultiplier` and halves every `halfLife` seconds. The target
 * token is throttled by a sale budget; draining the budget below `minSaleAmount`
 * restarts its auction at `priceResetMultiplier` times the price reached.
 */
export abstract class DutchAuctionSeller {
  protected readonly logger: Logger;
  protected readonly guard = new ReentrancyGuard();
  private auctions = new Map<string, TokenAuction>();
  private sale: SaleAmount;

  protected constructor(
    protected readonly settings: AuctionSettings,
    protected readonly funds: FundsPort,
    protected readonly clock: ClockPort,
    name: string,
  ) {
    this.logger = new Logger(name);
    this.sale = { initial: settings.initialSaleAmount, current: settings.initialSaleAmount };
  }

  enableTrading(token: string, initialPrice: Price) {
    const sold = checksumAddress(token);
    if (!isValidPrice(initialPrice)) {
      throw new ExchangeException(ExchangeErrorCode.InvalidPrice);
    }

    this.auctions.set(sold.toLowerCase(), {
      tradingStartTime: this.clock.now(),
      initialPrice: { ...initialPrice },
      halfLife: this.settings.priceDecayHalfLife,
    });
    if (this.isThrottled(sold)) {
      this.sale = { ...this.sale, current: this.refill(sold, 0n) };
    }
    this.logger.log(`Trading enabled for ${sold} at ${initialPrice.sourceAmount}/${initialPrice.targetAmount}`);
  }

  disableTrading(token: string) {
    const sold = checksumAddress(token);
    const auction = this.auctions.get(sold.toLowerCase());
    if (auction) {
      this.auctions.set(sold.toLowerCase(), { ...auction, tradingStartTime: 0 });
      this.logger.log(`Trading disabled for ${sold}`);
    }
  }

  tradingEnabled(token: string): boolean {
    return (this.auctions.get(token.toLowerCase())?.tradingStartTime ?? 0) !== 0;
  }

  auction(token: string): TokenAuction | undefined {
    const auction = this.auctions.get(token.toLowerCase());
    return auction && { ...auction, initialPrice: { ...auction.initialPrice } };
  }

  saleAmount(): SaleAmount {
    return { ...this.sale };
  }

  // token the seller takes in exchange for `token`
  paymentToken(token: string): string {
    return this.isThrottled(token) ? this.settings.finalTargetToken : this.settings.targetToken;
  }

  tokenPrice(token: string): Price {
    const auction = this.enabledAuction(token);
    const elapsed = BigInt(Math.max(0, this.clock.now() - auction.tradingStartTime));
    const sourceAmount = checkedMul(auction.initialPrice.sourceAmount, this.settings.marketPriceMultiplier);
    return {
      sourceAmount: expDecay(sourceAmount, elapsed, BigInt(auction.halfLife)),
      targetAmount: auction.initialPrice.targetAmount,
    };
  }

  expectedTradeInput(token: string, targetAmount: bigint): bigint {
    const price = this.tokenPrice(token);
    return mulDivF(targetAmount, price.sourceAmount, price.targetAmount);
  }

  expectedTradeReturn(token: string, sourceAmount: bigint): bigint {
    const price = this.tokenPrice(token);
    if (price.sourceAmount === 0n) {
      throw new ExchangeException(ExchangeErrorCode.InvalidTrade);
    }
    return mulDivF(sourceAmount, price.targetAmount, price.sourceAmount);
  }

  amountAvailableForTrading(token: string): bigint {
    if (this.isThrottled(token)) {
      return this.sale.current;
    }
    return this.funds.balanceOf(token, this.funds.account);
  }

  /**
   * Buys `targetAmount` of `token`. A native-token payment is passed as `nativeValue`;
   * whatever exceeds the price is sent back.
   */
  trade(
    caller: string,
    token: string,
    targetAmount: bigint,
    maxInput: bigint,
    nativeValue = 0n,
  ): SourceAndTargetAmounts {
    return this.guard.run(() =>
      atomically((journal) => {
        const sold = checksumAddress(token);
        if (targetAmount <= 0n) {
          throw new ExchangeException(ExchangeErrorCode.InvalidTradeActionAmount);
        }

        const input = this.expectedTradeInput(sold, targetAmount);
        if (input === 0n) {
          throw new ExchangeException(ExchangeErrorCode.InvalidTrade);
        }
        if (input > maxInput) {
          throw new ExchangeException(ExchangeErrorCode.GreaterThanMaxInput);
        }
        if (targetAmount > this.amountAvailableForTrading(sold)) {
          throw new ExchangeException(ExchangeErrorCode.InsufficientSaleAmount);
        }

        const payment = this.paymentToken(sold);
        const nativePayment = sameAddress(payment, NATIVE_TOKEN);
        if (nativePayment && nativeValue < input) {
          throw new ExchangeException(ExchangeErrorCode.InsufficientNativeTokenSent);
        }

        if (this.isThrottled(sold)) {
          this.consumeSaleAmount(sold, targetAmount, journal);
        }

        if (nativePayment) {
          journal.transferIn(this.funds, NATIVE_TOKEN, caller, nativeValue);
          journal.transferOut(this.funds, NATIVE_TOKEN, caller, nativeValue - input);
        } else {
          journal.transferIn(this.funds, payment, caller, input);
        }
        journal.transferOut(this.funds, sold, caller, targetAmount);
        this.logger.log(`${caller} bought ${targetAmount} ${sold} for ${input} ${payment}`);

        return { sourceAmount: input, targetAmount };
      }),
    );
  }

  /**
   * Starts a new auction period for `token` at the current price times
   * `priceResetMultiplier`.
   */
  protected restart(token: string, halfLife: number, journal: Journal) {
    const key = token.toLowerCase();
    const previous = this.enabledAuction(token);
    const price = this.tokenPrice(token);

    // the market multiplier is applied again on every read, so the target leg absorbs it;
    // the legs are kept reduced so they do not grow from one reset to the next
    const sourceAmount = checkedMul(price.sourceAmount, this.settings.priceResetMultiplier);
    const targetAmount = checkedMul(price.targetAmount, this.settings.marketPriceMultiplier);
    const divisor = gcd(sourceAmount, targetAmount);
    this.auctions.set(key, {
      tradingStartTime: this.clock.now(),
      initialPrice: { sourceAmount: sourceAmount / divisor, targetAmount: targetAmount / divisor },
      halfLife,
    });
    journal.record(() => this.auctions.set(key, previous));
    this.logger.log(`Auction of ${token} restarted at ${price.sourceAmount}/${price.targetAmount}`);
  }

  protected isThrottled(token: string): boolean {
    return sameAddress(token, this.settings.targetToken);
  }

  protected setSaleAmount(next: SaleAmount, journal: Journal) {
    const previous = this.sale;
    this.sale = next;
    journal.record(() => (this.sale = previous));
  }

  // the budget tops up to the initial amount, or to what the seller still holds
  protected refill(token: string, pendingOutflow: bigint): bigint {
    const balance = this.funds.balanceOf(token, this.funds.account) - pendingOutflow;
    if (balance <= 0n) {
      return 0n;
    }
    return balance < this.sale.initial ? balance : this.sale.initial;
  }

  private consumeSaleAmount(token: string, amount: bigint, journal: Journal) {
    const current = checkedSub(this.sale.current, amount);
    if (current >= this.settings.minSaleAmount) {
      this.setSaleAmount({ ...this.sale, current }, journal);
      return;
    }

    this.setSaleAmount({ ...this.sale, current: this.refill(token, amount) }, journal);
    this.restart(token, this.settings.priceDecayHalfLifeOnReset, journal);
  }

  private enabledAuction(token: string): TokenAuction {
    const auction = this.auctions.get(token.toLowerCase());
    if (!auction || auction.tradingStartTime === 0) {
      throw new ExchangeException(ExchangeErrorCode.TradingDisabled);
    }
    return auction;
  }
}
