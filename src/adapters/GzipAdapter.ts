// src/adapters/GzipAdapter.ts
import zlib from 'zlib';
import { promisify } from 'util';
import { CompressionType } from '../Types.js';
import type { CompressionOptions } from '../Types.js';
import type { ICompressionAdapter } from './ICompressionAdapter.js';
import { DEFAULT_GZIP_LEVEL, clampLevel, hasSignature, wrapError } from './utils.js';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

/**
 * Adaptador GZIP usando zlib de Node
 */
export class GzipAdapter implements ICompressionAdapter {
  readonly type = CompressionType.GZIP;
  readonly extensions = ['.gz', '.gzip'] as const;

  async compress(data: Buffer, options: CompressionOptions = {}): Promise<Buffer> {
    const level = clampLevel(options.compressionLevel, 0, 9, DEFAULT_GZIP_LEVEL);
    return gzip(data, { level, memLevel: 8 });
  }

  async decompress(data: Buffer): Promise<Buffer> {
    try {
      return await gunzip(data);
    } catch (err) {
      throw wrapError('Invalid gzip data', err);
    }
  }

  canHandle(data: Uint8Array): boolean {
    return hasSignature(data, [0x1f, 0x8b]);
  }
}
