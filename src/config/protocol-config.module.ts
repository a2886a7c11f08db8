import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProtocolConfigService } from './protocol-config.service';

@Module({
  providers: [ConfigService, ProtocolConfigService],
  exports: [ProtocolConfigService],
})
export class ProtocolConfigModule {}
