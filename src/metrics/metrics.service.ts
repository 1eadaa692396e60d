import { METRIC_NAMES, POD_LABEL } from '@common/constants/config';
import { Injectable, Logger } from '@nestjs/common';
import { PodMetrics } from '@types';
import { Gauge, Registry } from 'prom-client';

interface GaugeFamily {
  name: string;
  help: string;
  value: (record: PodMetrics) => number;
}

const POD_GAUGES: ReadonlyArray<GaugeFamily> = [
  { name: METRIC_NAMES.BLOCKS, help: 'Current block height', value: r => r.blocks },
  { name: METRIC_NAMES.PEERS, help: 'Number of connected peers', value: r => r.peers },
  { name: METRIC_NAMES.CONNECTIONS, help: 'Number of network connections', value: r => r.connections },
  { name: METRIC_NAMES.DIFFICULTY, help: 'Current network difficulty', value: r => r.difficulty },
  {
    name: METRIC_NAMES.VERIFICATION_PROGRESS,
    help: 'Blockchain verification progress (0-1)',
    value: r => r.verificationProgress,
  },
  { name: METRIC_NAMES.POD_HEALTHY, help: 'Bitcoin pod health status', value: r => (r.healthy ? 1 : 0) },
];

/**
 * Renders pod records in the Prometheus text exposition format
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  /**
   * Render one gauge sample per family and pod.
   * A registry is built per call so nothing carries over between scrapes.
   */
  async render(records: ReadonlyArray<PodMetrics>): Promise<string> {
    const registry = new Registry();

    for (const family of POD_GAUGES) {
      const gauge = new Gauge({
        name: family.name,
        help: family.help,
        labelNames: [POD_LABEL],
        registers: [registry],
      });

      for (const record of records) {
        gauge.set({ [POD_LABEL]: record.pod }, family.value(record));
      }
    }

    const output = await registry.metrics();
    this.logger.debug(`Rendered ${POD_GAUGES.length} metric families for ${records.length} pods`);
    return output;
  }
}
