import { compress } from '../algorithms/compression/rawDeflate.js';
import { BLOCK_SIZE, type KeystreamCipher } from '../algorithms/keystream/KeystreamCipher.js';
import { PROTECTED_PROLOGUE } from '../templates/problem.js';
import { concat, padToBlock } from '../util/bytes.js';
import { crc32 } from '../util/crc32.js';
import { createLogger, type Logger } from '../util/logger.js';
import { InvalidBlockLengthError, TnsPackError } from '../errors/index.js';
import type { Entry } from '../types/index.js';

/** Binds a cipher and logger to {@link assembleProtectedPayload}. */
export class PayloadAssembler {
  constructor(
    private readonly cipher: KeystreamCipher,
    private readonly log: Logger = createLogger(),
  ) {}

  protect(templated: Uint8Array): Uint8Array {
    return assembleProtectedPayload(templated, this.cipher, this.log);
  }

  protectedEntry(name: string, templated: Uint8Array): Entry {
    return protectedEntry(name, this.protect(templated));
  }
}

/**
 * Deflate → zero-pad to 8 → keystream → prepend the vendor prologue.
 * The cipher restarts its counter for each call.
 */
export function assembleProtectedPayload(
  templated: Uint8Array,
  cipher: KeystreamCipher,
  log: Logger = createLogger(),
): Uint8Array {
  const deflated = compress(templated);
  const padded   = Uint8Array.from(padToBlock(deflated, BLOCK_SIZE));

  try {
    cipher.protect(padded);
  } catch (err) {
    // padding guarantees alignment; reaching this is a bug
    if (err instanceof InvalidBlockLengthError) {
      throw new TnsPackError(`Internal error: padded payload is ${padded.length} bytes`, { cause: err });
    }
    throw err;
  }

  log.log(3, `payload: ${templated.length} → ${deflated.length} deflated → ${padded.length} padded`);
  return concat(PROTECTED_PROLOGUE, padded);
}

/** Entry for bytes that are already protected; size and CRC describe the stored bytes. */
export function protectedEntry(name: string, body: Uint8Array): Entry {
  return {
    name,
    body,
    method          : 'vendor-protected',
    uncompressedSize: body.length,
    crc32           : crc32(body),
  };
}

/** Plain deflated entry; size and CRC describe `original`, not the stored bytes. */
export function companionEntry(name: string, original: Uint8Array): Entry {
  return {
    name,
    body            : compress(original),
    method          : 'deflated',
    uncompressedSize: original.length,
    crc32           : crc32(original),
  };
}
