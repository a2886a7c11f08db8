import { Module } from '@nestjs/common';
import { ProtocolConfigModule } from '../config/protocol-config.module';
import { PortsModule } from '../ports/ports.module';
import { FeeSellerService } from './fee-seller.service';
import { PolSellerService } from './pol-seller.service';

@Module({
  imports: [ProtocolConfigModule, PortsModule],
  providers: [PolSellerService, FeeSellerService],
  exports: [PolSellerService, FeeSellerService],
})
export class AuctionModule {}
