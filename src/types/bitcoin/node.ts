/**
 * Subsets of bitcoind RPC results read by the exporter.
 * Members are optional: a node that omits one reports it as zero.
 */

/**
 * getblockchaininfo
 */
export interface BlockchainInfo {
  chain?: string;
  blocks?: number;
  headers?: number;
  difficulty?: number;
  verificationprogress?: number;
  initialblockdownload?: boolean;
}

/**
 * One entry of getpeerinfo
 */
export interface PeerInfo {
  id?: number;
  addr?: string;
  inbound?: boolean;
}

/**
 * getnetworkinfo
 */
export interface NetworkInfo {
  version?: number;
  subversion?: string;
  connections?: number;
  networkactive?: boolean;
}
