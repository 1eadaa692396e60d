/**
 * Connection settings for bitcoind RPC
 */
export interface RpcConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  timeoutMs: number;
}

/**
 * Settings for ordinal pod discovery
 */
export interface DiscoveryConfig {
  serviceName: string;
  namespace: string;
  clusterDomain: string;
  maxPods: number;
}
