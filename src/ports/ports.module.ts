import { Module } from '@nestjs/common';
import { ProtocolConfigModule } from '../config/protocol-config.module';
import { ProtocolConfigService } from '../config/protocol-config.service';
import { CLOCK_PORT, SystemClock } from './clock.port';
import { FEE_AUCTION_FUNDS_PORT, FUNDS_PORT, InMemoryTokenVault, POL_FUNDS_PORT, TokenLedger } from './funds.port';
import { InMemoryTicketLedger, OWNERSHIP_PORT } from './ownership.port';

export const FundsProvider = {
  provide: FUNDS_PORT,
  useFactory: (ledger: TokenLedger, config: ProtocolConfigService) => new InMemoryTokenVault(ledger, config.vaultAccount),
  inject: [TokenLedger, ProtocolConfigService],
};

export const PolFundsProvider = {
  provide: POL_FUNDS_PORT,
  useFactory: (ledger: TokenLedger, config: ProtocolConfigService) => new InMemoryTokenVault(ledger, config.pol.account),
  inject: [TokenLedger, ProtocolConfigService],
};

export const FeeAuctionFundsProvider = {
  provide: FEE_AUCTION_FUNDS_PORT,
  useFactory: (ledger: TokenLedger, config: ProtocolConfigService) =>
    new InMemoryTokenVault(ledger, config.feeAuction.account),
  inject: [TokenLedger, ProtocolConfigService],
};

@Module({
  imports: [ProtocolConfigModule],
  providers: [
    TokenLedger,
    FundsProvider,
    PolFundsProvider,
    FeeAuctionFundsProvider,
    { provide: OWNERSHIP_PORT, useClass: InMemoryTicketLedger },
    { provide: CLOCK_PORT, useClass: SystemClock },
  ],
  exports: [TokenLedger, FUNDS_PORT, POL_FUNDS_PORT, FEE_AUCTION_FUNDS_PORT, OWNERSHIP_PORT, CLOCK_PORT],
})
export class PortsModule {}
