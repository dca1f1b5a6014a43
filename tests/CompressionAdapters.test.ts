import { describe, test, expect, afterEach } from 'vitest';
import {
    CompressionAdapterFactory,
    CompressionType,
    GzipAdapter,
    Bzip2Adapter,
    XzAdapter,
    NoneAdapter,
    getDefaultFactory,
    resetDefaultFactory,
    guessCompression,
    detectCompression,
} from '../src/index.js';
import type { ICompressionAdapter } from '../src/index.js';

const SAMPLE = Buffer.from('foobar! foobar! foobar! bazinga!\n'.repeat(64));

describe('guessCompression', () => {
    test('should map extensions to compression types', () => {
        expect(guessCompression('x.tar.gz')).toBe(CompressionType.GZIP);
        expect(guessCompression('x.tar.gzip')).toBe(CompressionType.GZIP);
        expect(guessCompression('x.tar.bz2')).toBe(CompressionType.BZIP2);
        expect(guessCompression('x.tar.bzip2')).toBe(CompressionType.BZIP2);
        expect(guessCompression('x.tar.xz')).toBe(CompressionType.LZMA);
        expect(guessCompression('x.tar.lzma')).toBe(CompressionType.LZMA);
        expect(guessCompression('x.tar')).toBe(CompressionType.NONE);
    });

    test('should ignore case', () => {
        expect(guessCompression('X.TAR.GZ')).toBe(CompressionType.GZIP);
        expect(guessCompression('x.tar.Bz2')).toBe(CompressionType.BZIP2);
        expect(guessCompression('/tmp/backup.TAR.XZ')).toBe(CompressionType.LZMA);
        expect(guessCompression('x.TAR')).toBe(CompressionType.NONE);
    });

    test('should fall back to none for unknown or missing extensions', () => {
        expect(guessCompression('archive')).toBe(CompressionType.NONE);
        expect(guessCompression('archive.zip')).toBe(CompressionType.NONE);
        expect(guessCompression('archive.tgz')).toBe(CompressionType.NONE);
    });
});

describe('Adapters', () => {
    const adapters: ICompressionAdapter[] = [
        new NoneAdapter(),
        new GzipAdapter(),
        new Bzip2Adapter(),
        new XzAdapter(),
    ];

    test.each(adapters)(
        '$type should restore the original bytes',
        async (adapter) => {
            const compressed = await adapter.compress(SAMPLE);
            const restored = await adapter.decompress(compressed);
            expect(restored.equals(SAMPLE)).toBe(true);
        }
    );

    test('compressed output should start with the format signature', async () => {
        const gz = await new GzipAdapter().compress(SAMPLE);
        expect([...gz.subarray(0, 2)]).toEqual([0x1f, 0x8b]);

        const bz2 = await new Bzip2Adapter().compress(SAMPLE);
        expect(bz2.subarray(0, 3).toString('ascii')).toBe('BZh');

        const xz = await new XzAdapter().compress(SAMPLE);
        expect([...xz.subarray(0, 6)]).toEqual([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]);
    });

    test('bzip2 should encode the block size from the compression level', async () => {
        const adapter = new Bzip2Adapter();
        expect((await adapter.compress(SAMPLE, { compressionLevel: 1 })).subarray(0, 4).toString('ascii')).toBe('BZh1');
        expect((await adapter.compress(SAMPLE)).subarray(0, 4).toString('ascii')).toBe('BZh9');
        expect((await adapter.compress(SAMPLE, { compressionLevel: 42 })).subarray(0, 4).toString('ascii')).toBe('BZh9');
    });

    test('xz should accept and ignore a compression level', async () => {
        const adapter: ICompressionAdapter = new XzAdapter();
        const compressed = await adapter.compress(SAMPLE, { compressionLevel: 9 });
        expect((await adapter.decompress(compressed)).equals(SAMPLE)).toBe(true);
    });

    test('gzip compression level should change the output', async () => {
        const adapter = new GzipAdapter();
        const stored = await adapter.compress(SAMPLE, { compressionLevel: 0 });
        const best = await adapter.compress(SAMPLE, { compressionLevel: 9 });
        expect(stored.length).toBeGreaterThan(SAMPLE.length);
        expect(best.length).toBeLessThan(SAMPLE.length);
    });

    test('should reject malformed gzip data', async () => {
        await expect(new GzipAdapter().decompress(Buffer.from('definitely not gzip')))
            .rejects.toThrow(/^Invalid gzip data: /);
    });

    test('should reject malformed xz data', async () => {
        await expect(new XzAdapter().decompress(Buffer.from('definitely not xz')))
            .rejects.toThrow(/^Invalid xz data: /);
    });

    test('should reject malformed bzip2 data', async () => {
        await expect(new Bzip2Adapter().decompress(Buffer.from('definitely not bzip2')))
            .rejects.toThrow(/^Invalid bzip2 data: /);
    });
});

describe('CompressionAdapterFactory', () => {
    afterEach(() => {
        resetDefaultFactory();
    });

    test('should have one adapter per compression type', () => {
        const factory = new CompressionAdapterFactory();
        expect(factory.getAdapters().map(a => a.type)).toEqual([
            CompressionType.NONE,
            CompressionType.GZIP,
            CompressionType.BZIP2,
            CompressionType.LZMA,
        ]);
        expect(factory.getAdapter(CompressionType.BZIP2)).toBeInstanceOf(Bzip2Adapter);
    });

    test('should throw for unknown compression types', () => {
        const factory = new CompressionAdapterFactory();
        const unknownType: string = 'zstd';
        expect(() => factory.getAdapter(unknownType as CompressionType)).toThrow(
            'Unsupported compression type: zstd. Available types: none, gzip, bzip2, lzma'
        );
        expect(factory.hasAdapter(unknownType as CompressionType)).toBe(false);
    });

    test('should throw when a type has no registered adapter', () => {
        const factory = new CompressionAdapterFactory([new NoneAdapter()]);
        expect(() => factory.getAdapter(CompressionType.GZIP)).toThrow(
            'Unsupported compression type: gzip. Available types: none'
        );
    });

    test('registerAdapter should replace the adapter for the same type', async () => {
        const calls: string[] = [];
        const custom: ICompressionAdapter = {
            type: CompressionType.GZIP,
            extensions: ['.gz', '.tgz'],
            async compress(data) {
                calls.push('compress');
                return data;
            },
            async decompress(data) {
                calls.push('decompress');
                return data;
            },
            canHandle: () => false,
        };

        getDefaultFactory().registerAdapter(custom);

        expect(getDefaultFactory().getAdapter(CompressionType.GZIP)).toBe(custom);
        expect(guessCompression('backup.tgz')).toBe(CompressionType.GZIP);
        await getDefaultFactory().getAdapter(CompressionType.GZIP).compress(SAMPLE);
        expect(calls).toEqual(['compress']);
    });

    test('resetDefaultFactory should restore the default adapters', () => {
        const first = getDefaultFactory();
        resetDefaultFactory();
        const second = getDefaultFactory();
        expect(second).not.toBe(first);
        expect(second.getAdapter(CompressionType.GZIP)).toBeInstanceOf(GzipAdapter);
    });
});

describe('detectCompression', () => {
    test('should detect compressed formats by magic bytes', async () => {
        expect(detectCompression(await new GzipAdapter().compress(SAMPLE))).toBe(CompressionType.GZIP);
        expect(detectCompression(await new Bzip2Adapter().compress(SAMPLE))).toBe(CompressionType.BZIP2);
        expect(detectCompression(await new XzAdapter().compress(SAMPLE))).toBe(CompressionType.LZMA);
    });

    test('should detect a plain tar by its ustar signature', () => {
        const header = Buffer.alloc(512);
        header.write('ustar', 257, 'ascii');
        expect(detectCompression(header)).toBe(CompressionType.NONE);
    });

    test('should return undefined for unknown or short data', () => {
        expect(detectCompression(Buffer.from('hello'))).toBeUndefined();
        expect(detectCompression(new Uint8Array(0))).toBeUndefined();
    });
});
