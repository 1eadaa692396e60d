import { BITCOIN_RPC } from '@common/constants/config';
import { errorMessage } from '@common/utils/error-handler';
import { Injectable, Logger } from '@nestjs/common';
import { BitcoinRpcClient } from '@rpc/bitcoin-rpc.client';
import { BlockchainInfo, NetworkInfo, PeerInfo, PodEndpoint, PodMetrics, RpcResult } from '@types';

/**
 * Pod label of a host: its first DNS label
 */
export function podNameFromHost(host: string): string {
  return host.split('.')[0];
}

function numberOrZero(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Record for a pod that could not be queried at all
 */
export function unhealthyPodMetrics(host: string): PodMetrics {
  return {
    pod: podNameFromHost(host),
    host,
    blocks: 0,
    peers: 0,
    connections: 0,
    difficulty: 0,
    verificationProgress: 0,
    healthy: false,
  };
}

/**
 * Collects node state from bitcoin pods.
 *
 * Every RPC call is isolated: a failed call zeroes only the fields it feeds,
 * and `healthy` follows getblockchaininfo alone.
 */
@Injectable()
export class PodCollectorService {
  private readonly logger = new Logger(PodCollectorService.name);

  constructor(private readonly rpcClient: BitcoinRpcClient) {}

  /**
   * Query one pod. Never rejects.
   */
  async collect(endpoint: PodEndpoint): Promise<PodMetrics> {
    const { host } = endpoint;

    try {
      const [blockchain, peers, network] = await Promise.all([
        this.rpcClient.call<BlockchainInfo>(BITCOIN_RPC.METHODS.GET_BLOCKCHAIN_INFO, [], host),
        this.rpcClient.call<PeerInfo[]>(BITCOIN_RPC.METHODS.GET_PEER_INFO, [], host),
        this.rpcClient.call<NetworkInfo>(BITCOIN_RPC.METHODS.GET_NETWORK_INFO, [], host),
      ]);

      return this.buildRecord(host, blockchain, peers, network);
    } catch (error) {
      this.logger.error(`Failed to collect metrics from ${host}: ${errorMessage(error)}`);
      return unhealthyPodMetrics(host);
    }
  }

  /**
   * Query every pod concurrently. Returns one record per endpoint, in no particular order.
   */
  async aggregate(endpoints: PodEndpoint[]): Promise<PodMetrics[]> {
    const settled = await Promise.allSettled(endpoints.map(endpoint => this.collect(endpoint)));

    const byHost = new Map<string, PodMetrics>();
    settled.forEach((outcome, index) => {
      const { host } = endpoints[index];
      if (outcome.status === 'fulfilled') {
        byHost.set(host, outcome.value);
      } else {
        this.logger.error(`Collector for ${host} rejected: ${errorMessage(outcome.reason)}`);
        byHost.set(host, unhealthyPodMetrics(host));
      }
    });

    return [...byHost.values()];
  }

  private buildRecord(
    host: string,
    blockchain: RpcResult<BlockchainInfo>,
    peers: RpcResult<PeerInfo[]>,
    network: RpcResult<NetworkInfo>,
  ): PodMetrics {
    const chain: BlockchainInfo = blockchain.ok ? blockchain.value : {};
    const peerCount = peers.ok && Array.isArray(peers.value) ? peers.value.length : 0;
    const connections = network.ok ? numberOrZero(network.value.connections) : 0;

    if (!blockchain.ok) {
      this.logger.warn(`Pod ${host} is unhealthy: ${blockchain.error.toString()}`);
    }

    return {
      pod: podNameFromHost(host),
      host,
      blocks: numberOrZero(chain.blocks),
      peers: peerCount,
      connections,
      difficulty: numberOrZero(chain.difficulty),
      verificationProgress: numberOrZero(chain.verificationprogress),
      healthy: blockchain.ok,
    };
  }
}
