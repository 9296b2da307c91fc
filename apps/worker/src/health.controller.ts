import { Controller, Get } from '@nestjs/common';
import { MarketStreamHealth, MarketStreamService } from './market-stream/market-stream.service';

@Controller('health')
export class HealthController {
  constructor(private readonly marketStreamService: MarketStreamService) {}

  @Get()
  health(): { ok: true } {
    return { ok: true };
  }

  @Get('market-stream')
  marketStream(): { ok: true } & MarketStreamHealth {
    return { ok: true, ...this.marketStreamService.getHealth() };
  }
}
