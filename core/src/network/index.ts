/**
 * cNFT Core Network
 * @module network
 */

export {
  DEVNET_CONFIG,
  MAINNET_CONFIG,
  CLUSTERS,
  DEFAULT_CLUSTER,
  getClusterConfig,
  getExplorerTxUrl,
  getExplorerAddressUrl,
  type Cluster,
  type ClusterConfig,
} from './presets.js';
