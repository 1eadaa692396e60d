import { CollectorModule } from '@collector/collector.module';
import { DiscoveryModule } from '@discovery/discovery.module';
import { MetricsController } from '@metrics/metrics.controller';
import { MetricsService } from '@metrics/metrics.service';
import { ScrapeService } from '@metrics/scrape.service';
import { Module } from '@nestjs/common';

@Module({
  imports: [DiscoveryModule, CollectorModule],
  providers: [MetricsService, ScrapeService],
  controllers: [MetricsController],
  exports: [MetricsService, ScrapeService],
})
export class MetricsModule {}
