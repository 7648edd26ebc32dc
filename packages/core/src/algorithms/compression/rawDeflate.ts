import { deflateSync, inflateSync } from 'fflate';
import { CompressionError, DecompressionError, describeError } from '../../errors/index.js';

/**
 * Raw deflate (RFC 1951, no zlib or gzip framing) at the library's default
 * level. The device reads the bitstream directly after the vendor prologue.
 */
export function compress(data: Uint8Array): Uint8Array {
  try {
    return deflateSync(data);
  } catch (err) {
    throw new CompressionError(`Compression failed: ${describeError(err)}`, { cause: err });
  }
}

export function decompress(data: Uint8Array): Uint8Array {
  try {
    return inflateSync(data);
  } catch (err) {
    throw new DecompressionError(`Decompression failed: ${describeError(err)}`, { cause: err });
  }
}
