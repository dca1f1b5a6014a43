// src/adapters/XzAdapter.ts
import { xz } from '@napi-rs/lzma';
import { CompressionType } from '../Types.js';
import type { ICompressionAdapter } from './ICompressionAdapter.js';
import { hasSignature, wrapError } from './utils.js';

const XZ_SIGNATURE = [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00];

/**
 * Adaptador LZMA que escribe y lee contenedores .xz usando @napi-rs/lzma
 * La librería usa siempre su preset por defecto: compressionLevel no aplica aquí
 */
export class XzAdapter implements ICompressionAdapter {
  readonly type = CompressionType.LZMA;
  readonly extensions = ['.xz', '.lzma'] as const;

  async compress(data: Buffer): Promise<Buffer> {
    return xz.compress(data);
  }

  async decompress(data: Buffer): Promise<Buffer> {
    try {
      return await xz.decompress(data);
    } catch (err) {
      throw wrapError('Invalid xz data', err);
    }
  }

  canHandle(data: Uint8Array): boolean {
    return hasSignature(data, XZ_SIGNATURE);
  }
}
