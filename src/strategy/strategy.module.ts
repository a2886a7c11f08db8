import { Module } from '@nestjs/common';
import { ProtocolConfigModule } from '../config/protocol-config.module';
import { PairModule } from '../pair/pair.module';
import { PortsModule } from '../ports/ports.module';
import { StrategyService } from './strategy.service';

@Module({
  imports: [PairModule, ProtocolConfigModule, PortsModule],
  providers: [StrategyService],
  exports: [StrategyService],
})
export class StrategyModule {}
