import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ProtocolConfigModule } from './config/protocol-config.module';
import { PortsModule } from './ports/ports.module';
import { PairModule } from './pair/pair.module';
import { StrategyModule } from './strategy/strategy.module';
import { AuctionModule } from './auction/auction.module';
import { V1Module } from './v1/v1.module';
import { LoggingMiddleware } from './logging.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    ProtocolConfigModule,
    PortsModule,
    PairModule,
    StrategyModule,
    AuctionModule,
    V1Module,
  ],
})
export class AppModule implements NestModule {
  // runs after the body parsers
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(LoggingMiddleware).forRoutes('*');
  }
}
