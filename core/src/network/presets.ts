/**
 * Network Configuration
 *
 * Cluster presets used for explorer links. The RPC endpoint itself is always
 * supplied explicitly to `initialize`: public cluster nodes do not serve the
 * DAS methods (`getAssetBatch`, `getAssetProofBatch`) transfers depend on.
 */

export type Cluster = "devnet" | "mainnet-beta";

export interface ClusterConfig {
  /** Solana cluster */
  cluster: Cluster;
  /** Explorer URL base */
  explorerUrl: string;
}

/**
 * Devnet configuration
 */
export const DEVNET_CONFIG: ClusterConfig = {
  cluster: "devnet",
  explorerUrl: "https://explorer.solana.com",
};

/**
 * Mainnet configuration
 */
export const MAINNET_CONFIG: ClusterConfig = {
  cluster: "mainnet-beta",
  explorerUrl: "https://explorer.solana.com",
};

export const CLUSTERS: Record<Cluster, ClusterConfig> = {
  devnet: DEVNET_CONFIG,
  "mainnet-beta": MAINNET_CONFIG,
};

/**
 * Default cluster (for development)
 */
export const DEFAULT_CLUSTER: Cluster = "devnet";

export function getClusterConfig(cluster: Cluster): ClusterConfig {
  return CLUSTERS[cluster];
}

/**
 * Get explorer URL for transaction
 */
export function getExplorerTxUrl(signature: string, cluster: Cluster): string {
  const config = getClusterConfig(cluster);
  return `${config.explorerUrl}/tx/${signature}${clusterSuffix(cluster)}`;
}

/**
 * Get explorer URL for address (tree, asset id or wallet)
 */
export function getExplorerAddressUrl(address: string, cluster: Cluster): string {
  const config = getClusterConfig(cluster);
  return `${config.explorerUrl}/address/${address}${clusterSuffix(cluster)}`;
}

function clusterSuffix(cluster: Cluster): string {
  return cluster === "devnet" ? "?cluster=devnet" : "";
}
