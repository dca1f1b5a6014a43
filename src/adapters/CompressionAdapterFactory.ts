// src/adapters/CompressionAdapterFactory.ts
import { CompressionType } from '../Types.js';
import type { ICompressionAdapter } from './ICompressionAdapter.js';
import { NoneAdapter } from './NoneAdapter.js';
import { GzipAdapter } from './GzipAdapter.js';
import { Bzip2Adapter } from './Bzip2Adapter.js';
import { XzAdapter } from './XzAdapter.js';
import { getExtension } from './utils.js';

/**
 * Factory para crear y gestionar adaptadores de compresión.
 * Cada tipo de compresión tiene exactamente un adaptador registrado.
 */
export class CompressionAdapterFactory {
  private adapters = new Map<CompressionType, ICompressionAdapter>();

  constructor(adapters: ICompressionAdapter[] = createDefaultAdapters()) {
    adapters.forEach(adapter => this.registerAdapter(adapter));
  }

  /**
   * Obtiene el adaptador para el tipo de compresión indicado
   * @throws Error si el tipo no está registrado
   */
  getAdapter(type: CompressionType): ICompressionAdapter {
    const adapter = this.adapters.get(type);
    if (!adapter) {
      throw new Error(
        `Unsupported compression type: ${String(type)}. ` +
        `Available types: ${Array.from(this.adapters.keys()).join(', ')}`
      );
    }
    return adapter;
  }

  /**
   * Registra un adaptador, reemplazando el existente para el mismo tipo
   */
  registerAdapter(adapter: ICompressionAdapter): void {
    this.adapters.set(adapter.type, adapter);
  }

  getAdapters(): ICompressionAdapter[] {
    return Array.from(this.adapters.values());
  }

  hasAdapter(type: CompressionType): boolean {
    return this.adapters.has(type);
  }

  /**
   * Adivina la compresión por la extensión del archivo (sin distinguir mayúsculas)
   * @returns CompressionType.NONE si ninguna extensión coincide
   */
  guessCompression(fileName: string): CompressionType {
    const ext = getExtension(fileName);
    for (const adapter of this.adapters.values()) {
      if (adapter.type !== CompressionType.NONE && adapter.extensions.includes(ext)) {
        return adapter.type;
      }
    }
    return CompressionType.NONE;
  }

  /**
   * Detecta la compresión leyendo los magic bytes
   * @returns undefined si los datos no coinciden con ningún formato conocido
   */
  detectCompression(data: Uint8Array): CompressionType | undefined {
    for (const adapter of this.adapters.values()) {
      if (adapter.canHandle(data)) {
        return adapter.type;
      }
    }
    return undefined;
  }
}

function createDefaultAdapters(): ICompressionAdapter[] {
  return [new NoneAdapter(), new GzipAdapter(), new Bzip2Adapter(), new XzAdapter()];
}

/**
 * Singleton de la factory por defecto
 */
let defaultFactory: CompressionAdapterFactory | null = null;

export function getDefaultFactory(): CompressionAdapterFactory {
  if (!defaultFactory) {
    defaultFactory = new CompressionAdapterFactory();
  }
  return defaultFactory;
}

/**
 * Reinicia la factory por defecto (útil para tests)
 */
export function resetDefaultFactory(): void {
  defaultFactory = null;
}

export function guessCompression(fileName: string): CompressionType {
  return getDefaultFactory().guessCompression(fileName);
}

export function detectCompression(data: Uint8Array): CompressionType | undefined {
  return getDefaultFactory().detectCompression(data);
}
