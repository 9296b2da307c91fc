import { Module } from '@nestjs/common';
import { MarketDataModule } from '@libs/market-data';
import { MarketStreamService } from './market-stream.service';

@Module({
  imports: [MarketDataModule],
  providers: [MarketStreamService],
  exports: [MarketStreamService],
})
export class MarketStreamModule {}
