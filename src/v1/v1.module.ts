import { Module } from '@nestjs/common';
import { StrategiesModule } from './strategies/strategies.module';
import { AuctionApiModule } from './auction/auction.module';

@Module({
  imports: [StrategiesModule, AuctionApiModule],
})
export class V1Module {}
