import { Inject, Injectable } from '@nestjs/common';
import * as _ from 'lodash';
import { ProtocolConfigService } from '../config/protocol-config.service';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';
import { checksumAddress } from '../isAddress.validator';
import { CLOCK_PORT, ClockPort } from '../ports/clock.port';
import { FEE_AUCTION_FUNDS_PORT, FundsPort } from '../ports/funds.port';
import { atomically } from '../ports/journal';
import { DutchAuctionSeller } from './dutch-auction-seller';

/**
 * Auctions collected fees for the target token; the target token is sold, throttled,
 * for the final target token.
 */
@Injectable()
export class FeeSellerService extends DutchAuctionSeller {
  constructor(
    protocolConfig: ProtocolConfigService,
    @Inject(FEE_AUCTION_FUNDS_PORT) funds: FundsPort,
    @Inject(CLOCK_PORT) clock: ClockPort,
  ) {
    super(protocolConfig.feeAuction, funds, clock, FeeSellerService.name);
  }

  /**
   * Restarts the auction of every listed token holding at least `minTokenSaleAmount`.
   * Returns the tokens that were restarted.
   */
  execute(tokens: string[]): string[] {
    return this.guard.run(() =>
      atomically((journal) => {
        if (tokens.length === 0) {
          throw new ExchangeException(ExchangeErrorCode.InvalidTokenLength);
        }
        const normalized = tokens.map((token) => checksumAddress(token));
        if (_.uniqBy(normalized, (token) => token.toLowerCase()).length !== normalized.length) {
          throw new ExchangeException(ExchangeErrorCode.DuplicateToken);
        }

        const restarted: string[] = [];
        for (const token of normalized) {
          if (!this.tradingEnabled(token)) {
            throw new ExchangeException(ExchangeErrorCode.TradingDisabled);
          }
          if (this.funds.balanceOf(token, this.funds.account) < this.settings.minTokenSaleAmount) {
            continue;
          }
          if (this.isThrottled(token)) {
            this.setSaleAmount({ ...this.saleAmount(), current: this.refill(token, 0n) }, journal);
          }
          this.restart(token, this.settings.priceDecayHalfLife, journal);
          restarted.push(token);
        }
        return restarted;
      }),
    );
  }
}
