// src/adapters/utils.ts
import path from 'path';

/**
 * Configuración por defecto
 */
export const HIGH_WATER_MARK = 256 * 1024;
export const PROGRESS_THROTTLE_MS = 100;

export const DEFAULT_DIRECTORY_MODE = 0o755;
export const DEFAULT_FILE_MODE = 0o644;

export const DEFAULT_GZIP_LEVEL = 6;
export const DEFAULT_BZIP2_BLOCK_SIZE = 9;

/**
 * Comprueba si un buffer empieza con la firma indicada
 */
export function hasSignature(data: Uint8Array, signature: readonly number[], offset: number = 0): boolean {
  if (data.length < offset + signature.length) return false;
  return signature.every((byte, index) => data[offset + index] === byte);
}

/**
 * Extensión del archivo en minúsculas ('.gz', '.xz', ...)
 */
export function getExtension(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

/**
 * Limita un nivel de compresión al rango permitido, usando el valor por defecto si no es válido
 */
export function clampLevel(level: number | undefined, min: number, max: number, fallback: number): number {
  if (level === undefined || !Number.isFinite(level)) return fallback;
  return Math.min(max, Math.max(min, Math.round(level)));
}

/**
 * Normaliza un error desconocido, conservando la causa original
 */
export function wrapError(message: string, cause: unknown): Error {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new Error(`${message}: ${detail}`, { cause });
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
