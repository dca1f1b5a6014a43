// src/Types.ts

// --- ENUMS ---
export enum CompressionType {
    NONE = 'none',
    GZIP = 'gzip',
    BZIP2 = 'bzip2',
    LZMA = 'lzma',
};

export type EntryType =
    | 'file'
    | 'directory'
    | 'symlink'
    | 'link'
    | 'character-device'
    | 'block-device'
    | 'fifo'
    | 'contiguous-file';

// --- INTERFACES DE ENTRADAS ---
export interface EntryHeader {
    /** Ruta relativa con separador '/', sin barra final */
    name: string;
    type: EntryType;
    mode: number;
    size: number;
    mtime?: Date;
    linkname?: string;
    uid?: number;
    gid?: number;
}

export interface ArchiveEntry {
    header: EntryHeader;
    content: Buffer;
}

export type EntryCallback = (header: EntryHeader, content: Buffer) => void | Promise<void>;

// --- INTERFAZ DE PROGRESO ---
export interface ProgressData {
    percentage: number;
    processedBytes: number;
    totalBytes: number;
    currentFile?: string;
}

// --- OPCIONES PARA LOS MÉTODOS ---
export interface CompressionOptions {
    /** Nivel de compresión (0-9): nivel gzip o tamaño de bloque bzip2; xz lo ignora */
    compressionLevel?: number;
}

export interface PackOptions {
    progressCallback?: (data: ProgressData) => void;
}

export interface ExtractOptions {
    progressCallback?: (data: ProgressData) => void;
}
