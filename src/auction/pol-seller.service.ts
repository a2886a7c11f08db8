import { Inject, Injectable } from '@nestjs/common';
import { ProtocolConfigService } from '../config/protocol-config.service';
import { CLOCK_PORT, ClockPort } from '../ports/clock.port';
import { FundsPort, POL_FUNDS_PORT } from '../ports/funds.port';
import { DutchAuctionSeller } from './dutch-auction-seller';

/**
 * Protocol-owned liquidity seller: tokens go for the native token, and the native token
 * itself is sold, throttled, for the final target token.
 */
@Injectable()
export class PolSellerService extends DutchAuctionSeller {
  constructor(
    protocolConfig: ProtocolConfigService,
    @Inject(POL_FUNDS_PORT) funds: FundsPort,
    @Inject(CLOCK_PORT) clock: ClockPort,
  ) {
    super(protocolConfig.pol, funds, clock, PolSellerService.name);
  }
}
