import fs from 'fs';
import os from 'os';
import path from 'path';
import tar from 'tar-stream';
import type { Headers } from 'tar-stream';
import { buffer } from 'stream/consumers';

export const DATA_A = 'foobar!';
export const DATA_B = 'bazinga!';

export function createTempDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

/**
 * Crea el árbol:
 *   a        (0o640)
 *   sub/     (0o700)
 *   sub/b    (0o755)
 * y, si se pide, un enlace simbólico `link -> a`
 */
export function createSourceTree(root: string, withSymlink: boolean = false): void {
    fs.mkdirSync(path.join(root, 'sub'), { recursive: true });
    fs.writeFileSync(path.join(root, 'a'), DATA_A);
    fs.chmodSync(path.join(root, 'a'), 0o640);
    fs.writeFileSync(path.join(root, 'sub', 'b'), DATA_B);
    fs.chmodSync(path.join(root, 'sub', 'b'), 0o755);
    fs.chmodSync(path.join(root, 'sub'), 0o700);
    if (withSymlink) {
        fs.symlinkSync('a', path.join(root, 'link'));
    }
}

/**
 * Construye un tar a mano, para casos que fromDirectory nunca produciría
 */
export async function buildTar(entries: Array<{ headers: Headers; content?: string }>): Promise<Buffer> {
    const pack = tar.pack();
    const output = buffer(pack);
    for (const { headers, content } of entries) {
        if (content !== undefined) {
            pack.entry(headers, content);
        } else {
            pack.entry(headers);
        }
    }
    pack.finalize();
    return output;
}
