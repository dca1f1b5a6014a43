// src/adapters/index.ts
export type { ICompressionAdapter } from './ICompressionAdapter.js';
export {
  CompressionAdapterFactory,
  getDefaultFactory,
  resetDefaultFactory,
  guessCompression,
  detectCompression,
} from './CompressionAdapterFactory.js';

export { NoneAdapter } from './NoneAdapter.js';
export { GzipAdapter } from './GzipAdapter.js';
export { Bzip2Adapter } from './Bzip2Adapter.js';
export { XzAdapter } from './XzAdapter.js';
