import { Module } from '@nestjs/common';
import { StrategiesController } from './strategies.controller';
import { StrategyModule } from '../../strategy/strategy.module';

@Module({
  imports: [StrategyModule],
  controllers: [StrategiesController],
})
export class StrategiesModule {}
