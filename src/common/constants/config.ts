/**
 * Centralized configuration constants for the exporter
 */

// Bitcoin node RPC
export const BITCOIN_RPC = {
  JSONRPC_VERSION: '1.0',
  REQUEST_ID: 'exporter',

  // Single attempt per call, no retries
  TIMEOUT_MS: 10000,

  METHODS: {
    GET_BLOCKCHAIN_INFO: 'getblockchaininfo',
    GET_PEER_INFO: 'getpeerinfo',
    GET_NETWORK_INFO: 'getnetworkinfo',
  },
} as const;

// StatefulSet pod discovery
export const DISCOVERY = {
  // Ordinals 0..MAX_PODS-1 are probed, ordinal MAX_PODS never is
  MAX_PODS: 10,
  CLUSTER_DOMAIN: 'svc.cluster.local',
} as const;

// Exposition metric names
export const METRIC_NAMES = {
  BLOCKS: 'bitcoin_blocks',
  PEERS: 'bitcoin_peers',
  CONNECTIONS: 'bitcoin_connections',
  DIFFICULTY: 'bitcoin_difficulty',
  VERIFICATION_PROGRESS: 'bitcoin_verification_progress',
  POD_HEALTHY: 'bitcoin_pod_healthy',
} as const;

export const POD_LABEL = 'pod';

// Environment variable names
export const ENV_VARS = {
  // General
  NODE_ENV: 'NODE_ENV',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_TO_FILE: 'LOG_TO_FILE',
  PORT: 'PORT',

  // Bitcoin RPC
  BITCOIN_HOST: 'BITCOIN_HOST',
  BITCOIN_PORT: 'BITCOIN_PORT',
  BITCOIN_USER: 'BITCOIN_USER',
  BITCOIN_PASSWORD: 'BITCOIN_PASSWORD',

  // Discovery
  BITCOIN_SERVICE_NAME: 'BITCOIN_SERVICE_NAME',
  BITCOIN_NAMESPACE: 'BITCOIN_NAMESPACE',
} as const;

// Default values
export const DEFAULTS = {
  NODE_ENV: 'development',
  LOG_LEVEL: 'info',
  LOG_TO_FILE: false,
  PORT: 8000,

  BITCOIN_HOST: 'bitcoin-stack.bitcoin.svc.cluster.local',
  BITCOIN_PORT: 18332,
  BITCOIN_USER: 'bitcoin',
  BITCOIN_PASSWORD: 'bitcoin',

  BITCOIN_SERVICE_NAME: 'bitcoin-stack',
  BITCOIN_NAMESPACE: 'bitcoin',
} as const;
