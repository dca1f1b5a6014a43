// src/index.ts
export { Archive } from './core/Archive.js';
export { CompressionType } from './Types.js';
export type {
    ArchiveEntry,
    CompressionOptions,
    EntryCallback,
    EntryHeader,
    EntryType,
    ExtractOptions,
    PackOptions,
    ProgressData,
} from './Types.js';

export {
    CompressionAdapterFactory,
    getDefaultFactory,
    resetDefaultFactory,
    guessCompression,
    detectCompression,
    NoneAdapter,
    GzipAdapter,
    Bzip2Adapter,
    XzAdapter,
} from './adapters/index.js';
export type { ICompressionAdapter } from './adapters/index.js';
