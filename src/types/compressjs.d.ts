// compressjs no publica tipos; solo se declara lo que usa Bzip2Adapter
declare module 'compressjs' {
  namespace compressjs {
    interface Algorithm {
      compressFile(input: Uint8Array | ArrayLike<number>, output?: null, blockSizeMultiplier?: number): ArrayLike<number>;
      decompressFile(input: Uint8Array | ArrayLike<number>): ArrayLike<number>;
    }

    const Bzip2: Algorithm;
  }

  export = compressjs;
}
