/**
 * cNFT DAS
 * @module das
 */

export { parseAssetBatch, parseAssetProofBatch } from './parse.js';
export type { AssetRecord, AssetProof, CompressionInfo } from './types.js';
