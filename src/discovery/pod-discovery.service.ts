import { errorMessage } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { Injectable, Logger } from '@nestjs/common';
import { PodEndpoint } from '@types';
import { HostResolver } from './host-resolver';

/**
 * Discovers the pods of a bitcoin StatefulSet behind its headless service.
 *
 * Pods are named `<service>-<ordinal>` and get the DNS record
 * `<service>-<ordinal>.<service>.<namespace>.svc.cluster.local`. Ordinals are
 * probed in ascending order and the scan stops at the first one that does not
 * resolve, so ordinals are assumed contiguous from zero. A StatefulSet that
 * left a gap (or runs more than `maxPods` replicas) is undercounted.
 */
@Injectable()
export class PodDiscoveryService {
  private readonly logger = new Logger(PodDiscoveryService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly resolver: HostResolver,
  ) {}

  /**
   * Probe pod ordinals in order and return every pod that resolved
   */
  async discover(): Promise<PodEndpoint[]> {
    const { serviceName, namespace, maxPods } = this.configService.getDiscoveryConfig();
    const pods: PodEndpoint[] = [];

    for (let ordinal = 0; ordinal < maxPods; ordinal++) {
      const endpoint = this.endpointFor(ordinal);

      try {
        // Sequential on purpose: the first gap ends the scan
        await this.resolver.resolve(endpoint.host);
      } catch (error) {
        this.logger.debug(`Could not resolve ${endpoint.host}: ${errorMessage(error)}`);
        if (ordinal === 0) {
          this.logger.warn(`No bitcoin pods found starting from ${endpoint.host}`);
        }
        break;
      }

      pods.push(endpoint);
      this.logger.log(`Discovered bitcoin pod: ${endpoint.host}`);
    }

    if (pods.length === 0) {
      this.logger.warn(`No bitcoin pods discovered for service ${serviceName} in namespace ${namespace}`);
    }

    return pods;
  }

  /**
   * Ordinal 0 of the configured StatefulSet, used when discovery finds nothing
   */
  fallbackEndpoint(): PodEndpoint {
    return this.endpointFor(0);
  }

  /**
   * Build the endpoint of a pod ordinal
   */
  endpointFor(ordinal: number): PodEndpoint {
    const { serviceName, namespace, clusterDomain } = this.configService.getDiscoveryConfig();
    const pod = `${serviceName}-${ordinal}`;
    return {
      ordinal,
      host: `${pod}.${serviceName}.${namespace}.${clusterDomain}`,
      pod,
    };
  }
}
