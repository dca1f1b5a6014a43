// src/adapters/NoneAdapter.ts
import { CompressionType } from '../Types.js';
import type { ICompressionAdapter } from './ICompressionAdapter.js';
import { hasSignature } from './utils.js';

// 'ustar' en el offset 257 de la primera cabecera
const USTAR_SIGNATURE = [0x75, 0x73, 0x74, 0x61, 0x72];
const USTAR_OFFSET = 257;

/**
 * Adaptador identidad: el tar se guarda tal cual
 */
export class NoneAdapter implements ICompressionAdapter {
  readonly type = CompressionType.NONE;
  readonly extensions = ['.tar'] as const;

  async compress(data: Buffer): Promise<Buffer> {
    return data;
  }

  async decompress(data: Buffer): Promise<Buffer> {
    return data;
  }

  canHandle(data: Uint8Array): boolean {
    return hasSignature(data, USTAR_SIGNATURE, USTAR_OFFSET);
  }
}
