// src/core/Archive.ts
import fs from 'fs';
import { Readable } from 'stream';
import type { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { buffer } from 'stream/consumers';
import { getDefaultFactory } from '../adapters/CompressionAdapterFactory.js';
import { HIGH_WATER_MARK } from '../adapters/utils.js';
import * as TarService from '../services/TarService.js';
import { CompressionType } from '../Types.js';
import type {
    ArchiveEntry,
    CompressionOptions,
    EntryCallback,
    ExtractOptions,
    PackOptions,
} from '../Types.js';

/**
 * Tar sin comprimir en memoria junto con la compresión deseada.
 * La compresión solo se aplica al serializar (toBytes, toFile, save); `data` siempre es un tar plano.
 */
export class Archive {
    public data: Buffer;
    /** undefined significa "sin definir": toFile la adivina por la extensión */
    public compression?: CompressionType;

    constructor(data: Buffer = Buffer.alloc(0), compression?: CompressionType) {
        this.data = data;
        this.compression = compression;
    }

    // --- Construcción ---

    /**
     * Crea un tar con el contenido (!) del directorio indicado
     */
    public static async fromDirectory(directory: string, options: PackOptions = {}): Promise<Archive> {
        const data = await TarService.packDirectory(directory, options);
        return new Archive(data);
    }

    /**
     * Carga un blob con la compresión indicada
     */
    public static async fromBytes(
        data: Uint8Array,
        compression: CompressionType = CompressionType.NONE
    ): Promise<Archive> {
        const archive = new Archive(Buffer.alloc(0), compression);
        await archive.load(Readable.from([Buffer.from(data)]));
        return archive;
    }

    /**
     * Carga un tar desde un archivo.
     * Si no se indica la compresión, se adivina por la extensión.
     */
    public static async fromFile(
        filePath: string,
        compression: CompressionType = getDefaultFactory().guessCompression(filePath)
    ): Promise<Archive> {
        const archive = new Archive(Buffer.alloc(0), compression);
        await archive.load(fs.createReadStream(filePath, { highWaterMark: HIGH_WATER_MARK }));
        return archive;
    }

    public static async fromStream(
        input: Readable | AsyncIterable<Uint8Array>,
        compression: CompressionType = CompressionType.NONE
    ): Promise<Archive> {
        const archive = new Archive(Buffer.alloc(0), compression);
        await archive.load(input);
        return archive;
    }

    // --- Carga y guardado ---

    /**
     * Lee la entrada completa y la descomprime con la compresión del archivo
     * @returns Bytes del tar descomprimido
     */
    public async load(input: Readable | AsyncIterable<Uint8Array>): Promise<number> {
        const adapter = getDefaultFactory().getAdapter(this.compression ?? CompressionType.NONE);
        const raw = await buffer(input);
        this.data = await adapter.decompress(raw);
        return this.data.length;
    }

    /**
     * Comprime el tar y lo escribe en el stream de salida, que queda cerrado
     * @returns Bytes del tar sin comprimir que pasaron por el compresor
     */
    public async save(output: Writable, options: CompressionOptions = {}): Promise<number> {
        const compressed = await this.encode(this.compression ?? CompressionType.NONE, options);
        await pipeline(Readable.from([compressed]), output);
        return this.data.length;
    }

    public async toBytes(options: CompressionOptions = {}): Promise<Buffer> {
        return this.encode(this.compression ?? CompressionType.NONE, options);
    }

    /**
     * Guarda el tar en un archivo.
     * Si la compresión no está definida, se adivina por la extensión.
     * @returns Bytes del tar sin comprimir que pasaron por el compresor
     */
    public async toFile(filePath: string, options: CompressionOptions = {}): Promise<number> {
        const compression = this.compression ?? getDefaultFactory().guessCompression(filePath);
        // Comprimir antes de abrir el archivo: un error no deja archivos vacíos
        const compressed = await this.encode(compression, options);
        const output = fs.createWriteStream(filePath, { highWaterMark: HIGH_WATER_MARK });
        await pipeline(Readable.from([compressed]), output);
        return this.data.length;
    }

    // --- Contenido ---

    /**
     * Extrae el contenido del tar en el directorio indicado
     */
    public async toDirectory(directory: string, options: ExtractOptions = {}): Promise<void> {
        await TarService.extractToDirectory(this.data, directory, options);
    }

    /**
     * Llama al callback por cada entrada (directorios y archivos), en el orden del tar
     */
    public async forEachEntry(callback: EntryCallback): Promise<void> {
        await TarService.forEachEntry(this.data, callback);
    }

    public async readEntries(): Promise<ArchiveEntry[]> {
        return TarService.readEntries(this.data);
    }

    private async encode(compression: CompressionType, options: CompressionOptions): Promise<Buffer> {
        const adapter = getDefaultFactory().getAdapter(compression);
        return adapter.compress(this.data, options);
    }
}
