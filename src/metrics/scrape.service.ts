import { PodCollectorService } from '@collector/pod-collector.service';
import { PodDiscoveryService } from '@discovery/pod-discovery.service';
import { MetricsService } from '@metrics/metrics.service';
import { Injectable, Logger } from '@nestjs/common';
import { PodEndpoint, PodMetrics } from '@types';

/**
 * Runs one scrape: discover pods, collect from all of them, render.
 */
@Injectable()
export class ScrapeService {
  private readonly logger = new Logger(ScrapeService.name);

  constructor(
    private readonly discoveryService: PodDiscoveryService,
    private readonly collectorService: PodCollectorService,
    private readonly metricsService: MetricsService,
  ) {}

  async scrape(): Promise<string> {
    const records = await this.collectAll();
    return this.metricsService.render(records);
  }

  /**
   * Always yields at least one record: with nothing discovered, ordinal 0 is queried anyway
   */
  async collectAll(): Promise<PodMetrics[]> {
    const pods = await this.resolveTargets();
    this.logger.log(`Collecting metrics from ${pods.length} bitcoin pods`);
    return this.collectorService.aggregate(pods);
  }

  private async resolveTargets(): Promise<PodEndpoint[]> {
    const pods = await this.discoveryService.discover();
    if (pods.length > 0) {
      return pods;
    }

    const fallback = this.discoveryService.fallbackEndpoint();
    this.logger.warn(`Using fallback pod: ${fallback.host}`);
    return [fallback];
  }
}
