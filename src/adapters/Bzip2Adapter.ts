// src/adapters/Bzip2Adapter.ts
import compressjs from 'compressjs';
import { CompressionType } from '../Types.js';
import type { CompressionOptions } from '../Types.js';
import type { ICompressionAdapter } from './ICompressionAdapter.js';
import { DEFAULT_BZIP2_BLOCK_SIZE, clampLevel, hasSignature, wrapError } from './utils.js';

/**
 * Adaptador BZIP2 usando compressjs (implementación en JS puro)
 * El nivel de compresión se usa como multiplicador del tamaño de bloque (1-9)
 */
export class Bzip2Adapter implements ICompressionAdapter {
  readonly type = CompressionType.BZIP2;
  readonly extensions = ['.bz2', '.bzip2'] as const;

  async compress(data: Buffer, options: CompressionOptions = {}): Promise<Buffer> {
    const blockSize = clampLevel(options.compressionLevel, 1, 9, DEFAULT_BZIP2_BLOCK_SIZE);
    const compressed = compressjs.Bzip2.compressFile(data, null, blockSize);
    return Buffer.from(Uint8Array.from(compressed));
  }

  async decompress(data: Buffer): Promise<Buffer> {
    try {
      const decompressed = compressjs.Bzip2.decompressFile(data);
      return Buffer.from(Uint8Array.from(decompressed));
    } catch (err) {
      throw wrapError('Invalid bzip2 data', err);
    }
  }

  canHandle(data: Uint8Array): boolean {
    // 'BZh'
    return hasSignature(data, [0x42, 0x5a, 0x68]);
  }
}
