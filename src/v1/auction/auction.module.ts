import { Module } from '@nestjs/common';
import { AuctionController } from './auction.controller';
import { AuctionModule as AuctionSellersModule } from '../../auction/auction.module';

@Module({
  imports: [AuctionSellersModule],
  controllers: [AuctionController],
})
export class AuctionApiModule {}
