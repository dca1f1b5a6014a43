// src/adapters/ICompressionAdapter.ts
import type { CompressionOptions, CompressionType } from '../Types.js';

/**
 * Interfaz base para adaptadores de compresión/descompresión.
 * Permite implementar diferentes librerías de compresión sin modificar el código principal.
 * Los adaptadores trabajan sobre buffers completos: el tar nunca se transmite por partes.
 */
export interface ICompressionAdapter {
  /**
   * Tipo de compresión que implementa este adaptador
   */
  readonly type: CompressionType;

  /**
   * Extensiones de archivo asociadas (en minúsculas, con el punto)
   */
  readonly extensions: readonly string[];

  /**
   * Comprime un buffer tar completo
   * @param data - Datos tar sin comprimir
   * @param options - Opciones de compresión
   */
  compress(data: Buffer, options?: CompressionOptions): Promise<Buffer>;

  /**
   * Descomprime un buffer completo
   * @param data - Datos comprimidos
   * @returns Datos tar sin comprimir
   */
  decompress(data: Buffer): Promise<Buffer>;

  /**
   * Verifica por magic bytes si los datos tienen el formato de este adaptador
   */
  canHandle(data: Uint8Array): boolean;
}
