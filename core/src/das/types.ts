/**
 * Digital Asset Standard (DAS) Types
 * @module das/types
 */

/**
 * Where a compressed asset lives inside its Merkle tree
 */
export interface CompressionInfo {
  creatorHash: string;
  dataHash: string;
  /** Leaf position / nonce in the tree */
  leafId: number;
  treeAddress: string;
  /** `compressed` flag as reported by the DAS provider, when present */
  compressed?: boolean;
}

/**
 * Asset state as fetched for a single transfer attempt. Never cached.
 */
export interface AssetRecord {
  id: string;
  /** Current owner address, if the response carries one */
  owner?: string;
  /** Absent when the asset is not compressed or the response is malformed */
  compression?: CompressionInfo;
}

/**
 * Proof path and root from one `getAssetProofBatch` query. Only valid for the
 * tree state at the moment it was fetched.
 */
export interface AssetProof {
  /** Sibling hashes from leaf to root, base58 */
  proofPath: string[];
  root: string;
  treeId?: string;
  nodeIndex?: number;
}
