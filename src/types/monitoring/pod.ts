/**
 * One bitcoin pod of the StatefulSet, addressed through the headless service
 */
export interface PodEndpoint {
  readonly ordinal: number;
  readonly host: string;
  readonly pod: string;
}

/**
 * Values collected from one pod during a scrape
 */
export interface PodMetrics {
  readonly pod: string;
  readonly host: string;
  readonly blocks: number;
  readonly peers: number;
  readonly connections: number;
  readonly difficulty: number;
  readonly verificationProgress: number;
  // true iff getblockchaininfo succeeded
  readonly healthy: boolean;
}
