import { ScrapeService } from '@metrics/scrape.service';
import { Controller, Get, Header } from '@nestjs/common';

/**
 * Prometheus scrape endpoint. Each request runs the full discovery and collection pipeline.
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly scrapeService: ScrapeService) {}

  @Get()
  @Header('Content-Type', 'text/plain')
  async getMetrics(): Promise<string> {
    return this.scrapeService.scrape();
  }
}
