// src/services/TarService.ts
import fs from 'fs';
import path from 'path';
import tar from 'tar-stream';
import type { Headers } from 'tar-stream';
import { buffer } from 'stream/consumers';
import {
    DEFAULT_DIRECTORY_MODE,
    DEFAULT_FILE_MODE,
    PROGRESS_THROTTLE_MS,
    toError,
} from '../adapters/utils.js';
import type {
    ArchiveEntry,
    EntryCallback,
    EntryHeader,
    EntryType,
    ExtractOptions,
    PackOptions,
    ProgressData,
} from '../Types.js';

const ENTRY_TYPES: readonly EntryType[] = [
    'file',
    'directory',
    'symlink',
    'link',
    'character-device',
    'block-device',
    'fifo',
    'contiguous-file',
];

interface WalkedEntry {
    fullPath: string;
    name: string;
    stats: fs.Stats;
}

interface ProgressReporter {
    update(processedBytes: number, currentFile: string): void;
    complete(): void;
}

/**
 * Reporta progreso con throttle; el 100% se envía siempre al terminar
 */
function createProgressReporter(
    totalBytes: number,
    progressCallback?: (data: ProgressData) => void
): ProgressReporter {
    let lastProgressUpdate = Date.now();

    return {
        update(processedBytes, currentFile) {
            const now = Date.now();
            if (progressCallback && now - lastProgressUpdate > PROGRESS_THROTTLE_MS) {
                lastProgressUpdate = now;
                progressCallback({
                    percentage: totalBytes > 0 ?
                        Math.min(99, (processedBytes / totalBytes) * 100) : 0,
                    processedBytes,
                    totalBytes,
                    currentFile,
                });
            }
        },
        complete() {
            progressCallback?.({
                percentage: 100,
                processedBytes: totalBytes,
                totalBytes,
            });
        },
    };
}

// Orden por bytes UTF-8, no por unidades UTF-16
function compareNames(a: string, b: string): number {
    return Buffer.compare(Buffer.from(a), Buffer.from(b));
}

function isEntryType(value: unknown): value is EntryType {
    return typeof value === 'string' && ENTRY_TYPES.some(type => type === value);
}

/**
 * Recorre el directorio en profundidad (pre-orden), con los hijos ordenados por nombre.
 * Un directorio siempre aparece antes que su contenido.
 */
async function walkDirectory(root: string, dirPath: string, entries: WalkedEntry[]): Promise<void> {
    const names = (await fs.promises.readdir(dirPath)).sort(compareNames);

    for (const name of names) {
        const fullPath = path.join(dirPath, name);
        const stats = await fs.promises.lstat(fullPath);
        const relativePath = path.relative(root, fullPath).split(path.sep).join('/');

        entries.push({ fullPath, name: relativePath, stats });

        if (stats.isDirectory()) {
            await walkDirectory(root, fullPath, entries);
        }
    }
}

function toTarHeaders(entry: WalkedEntry, linkname?: string): Headers {
    const { stats } = entry;
    const common = {
        mode: stats.mode & 0o7777,
        mtime: stats.mtime,
        uid: stats.uid,
        gid: stats.gid,
    };

    if (stats.isDirectory()) {
        return { ...common, name: `${entry.name}/`, type: 'directory' };
    }
    if (stats.isSymbolicLink()) {
        return { ...common, name: entry.name, type: 'symlink', linkname };
    }
    if (stats.isFile()) {
        return { ...common, name: entry.name, type: 'file', size: stats.size };
    }
    throw new Error(`Unsupported file type: ${entry.fullPath}`);
}

/**
 * Convierte la cabecera de tar-stream a nuestra EntryHeader
 */
export function toEntryHeader(headers: Headers): EntryHeader {
    const type: EntryType = isEntryType(headers.type) ? headers.type : 'file';
    const defaultMode = type === 'directory' ? DEFAULT_DIRECTORY_MODE : DEFAULT_FILE_MODE;

    return {
        name: headers.name.replace(/\/+$/, ''),
        type,
        mode: headers.mode ?? defaultMode,
        size: headers.size ?? 0,
        mtime: headers.mtime,
        linkname: headers.linkname ?? undefined,
        uid: headers.uid,
        gid: headers.gid,
    };
}

/**
 * Empaqueta el contenido (!) de un directorio en un tar sin comprimir
 */
export async function packDirectory(sourcePath: string, options: PackOptions = {}): Promise<Buffer> {
    const root = path.resolve(sourcePath);
    const rootStats = await fs.promises.stat(root);
    if (!rootStats.isDirectory()) {
        throw new Error(`Path is not a directory: ${sourcePath}`);
    }

    const walked: WalkedEntry[] = [];
    await walkDirectory(root, root, walked);

    const totalBytes = walked.reduce(
        (sum, entry) => (entry.stats.isFile() ? sum + entry.stats.size : sum),
        0
    );
    const progress = createProgressReporter(totalBytes, options.progressCallback);
    let processedBytes = 0;

    // Leer todo antes de empaquetar: cualquier error de lectura aborta sin dejar el pack a medias
    const prepared: Array<{ headers: Headers; content?: Buffer }> = [];
    for (const entry of walked) {
        if (entry.stats.isSymbolicLink()) {
            const linkname = await fs.promises.readlink(entry.fullPath);
            prepared.push({ headers: toTarHeaders(entry, linkname) });
        } else if (entry.stats.isFile()) {
            const content = await fs.promises.readFile(entry.fullPath);
            prepared.push({ headers: { ...toTarHeaders(entry), size: content.length }, content });
            processedBytes += content.length;
            progress.update(processedBytes, entry.name);
        } else {
            prepared.push({ headers: toTarHeaders(entry) });
        }
    }

    const pack = tar.pack();
    const output = buffer(pack);

    for (const { headers, content } of prepared) {
        if (content) {
            pack.entry(headers, content);
        } else {
            pack.entry(headers);
        }
    }
    pack.finalize();

    const data = await output;
    progress.complete();
    return data;
}

/**
 * Recorre las entradas del tar en orden, entregando la cabecera y el contenido completo.
 * Un error en el callback detiene la iteración.
 */
export function forEachEntry(data: Buffer, callback: EntryCallback): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const extractor = tar.extract();
        let isSettled = false;

        const safeReject = (error: Error) => {
            if (!isSettled) {
                isSettled = true;
                extractor.destroy();
                reject(error);
            }
        };

        extractor.on('entry', (headers, stream, next) => {
            buffer(stream)
                .then(content => callback(toEntryHeader(headers), content))
                .then(() => next())
                .catch((err: unknown) => safeReject(toError(err)));
        });

        extractor.on('finish', () => {
            if (!isSettled) {
                isSettled = true;
                resolve();
            }
        });

        extractor.on('error', safeReject);

        extractor.end(data);
    });
}

export async function readEntries(data: Buffer): Promise<ArchiveEntry[]> {
    const entries: ArchiveEntry[] = [];
    await forEachEntry(data, (header, content) => {
        entries.push({ header, content });
    });
    return entries;
}

function isInside(root: string, target: string): boolean {
    return target === root || target.startsWith(root + path.sep);
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Rechaza rutas que escapan del directorio destino
 */
function resolveEntryPath(root: string, name: string): string {
    const target = path.resolve(root, name);
    if (!isInside(root, target)) {
        throw new Error(`${name} points outside extraction directory`);
    }
    return target;
}

/**
 * Comprueba la ruta real del ancestro existente más cercano: un enlace simbólico
 * ya extraído no puede llevar la escritura fuera del destino
 */
async function assertRealPathInside(realRoot: string, dirPath: string, name: string): Promise<void> {
    let current = dirPath;
    for (;;) {
        try {
            const real = await fs.promises.realpath(current);
            if (!isInside(realRoot, real)) {
                throw new Error(`${name} points outside extraction directory`);
            }
            return;
        } catch (err) {
            const parent = path.dirname(current);
            if (!isNotFound(err) || parent === current) throw err;
            current = parent;
        }
    }
}

/**
 * Un enlace simbólico existente en la ruta de un archivo se reemplaza, no se sigue
 */
async function removeSymlink(entryPath: string): Promise<void> {
    try {
        const stats = await fs.promises.lstat(entryPath);
        if (stats.isSymbolicLink()) {
            await fs.promises.unlink(entryPath);
        }
    } catch (err) {
        if (!isNotFound(err)) throw err;
    }
}

/**
 * Extrae el tar en un directorio, creándolo si no existe
 */
export async function extractToDirectory(
    data: Buffer,
    destinationPath: string,
    options: ExtractOptions = {}
): Promise<void> {
    const root = path.resolve(destinationPath);
    await fs.promises.mkdir(root, { recursive: true, mode: DEFAULT_DIRECTORY_MODE });
    const realRoot = await fs.promises.realpath(root);

    const progress = createProgressReporter(data.length, options.progressCallback);
    let processedBytes = 0;

    await forEachEntry(data, async (header, content) => {
        const entryPath = resolveEntryPath(root, header.name);
        await assertRealPathInside(realRoot, path.dirname(entryPath), header.name);

        switch (header.type) {
            case 'directory':
                await fs.promises.mkdir(entryPath, { recursive: true, mode: header.mode });
                break;

            case 'symlink':
                await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });
                try {
                    await fs.promises.symlink(header.linkname ?? '', entryPath);
                } catch (err) {
                    // Los enlaces simbólicos son best-effort: se continúa con la extracción
                    console.warn(`Could not create symlink ${header.name} -> ${header.linkname}:`, err);
                }
                break;

            case 'file':
            case 'contiguous-file':
                await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });
                await removeSymlink(entryPath);
                await fs.promises.writeFile(entryPath, content);
                // Restaurar permisos originales del archivo
                await fs.promises.chmod(entryPath, header.mode);
                break;

            default:
                console.warn(`Skipping unsupported entry type '${header.type}': ${header.name}`);
        }

        processedBytes += header.size;
        progress.update(processedBytes, header.name);
    });

    progress.complete();
}
