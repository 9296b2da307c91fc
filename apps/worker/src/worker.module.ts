import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { HealthController } from './health.controller';
import { MarketStreamModule } from './market-stream/market-stream.module';

@Module({
  imports: [CoreModule, MarketStreamModule],
  controllers: [HealthController],
})
export class WorkerModule {}
