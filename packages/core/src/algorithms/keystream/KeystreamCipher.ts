import type { BlockCipherProvider, BlockEncryptor } from '../../providers/BlockCipherProvider.js';
import { InvalidBlockLengthError, TnsPackError } from '../../errors/index.js';

export const BLOCK_SIZE = 8;

/** Added to the block counter to form the keystream seed (mod 2^32). */
export const IVEC_BASE = 0x6fe21307;

/** The counter resets here, so the keystream repeats every 1024 blocks. */
export const COUNTER_PERIOD = 1024;

/** K1 | K2 | K3 of the document key, EDE3 order. */
export const DOCUMENT_KEY = Uint8Array.of(
  0x16, 0xa7, 0xa7, 0x32, 0x68, 0xa7, 0xba, 0x73,
  0xd9, 0xa8, 0x86, 0xa4, 0x34, 0x45, 0x94, 0x10,
  0x3d, 0x80, 0x8c, 0xb5, 0xdf, 0xb3, 0x80, 0x6b,
);

/**
 * Document protection used inside `.tns` problems.
 *
 * For block `n` the seed `IVEC_BASE + (n mod 1024)` is written little-endian
 * into the last four bytes of an otherwise zero block, encrypted with 3DES-ECB,
 * and the result is XORed into the plaintext. Every call starts from block 0,
 * so the transform is deterministic and its own inverse.
 */
export class KeystreamCipher {
  private readonly engine: BlockEncryptor;
  private readonly masks: Uint8Array[] = [];

  constructor(provider: BlockCipherProvider) {
    this.engine = provider.createTripleDes(DOCUMENT_KEY);
    if (this.engine.blockSize !== BLOCK_SIZE) {
      throw new TnsPackError(`Block cipher must use ${BLOCK_SIZE}-byte blocks, got ${this.engine.blockSize}`);
    }
  }

  /** Counter block for a counter value in `[0, COUNTER_PERIOD)`. */
  static counterBlock(counter: number): Uint8Array {
    const seed  = (IVEC_BASE + counter) >>> 0;
    const block = new Uint8Array(BLOCK_SIZE);
    block[4] = seed & 0xff;
    block[5] = (seed >>> 8) & 0xff;
    block[6] = (seed >>> 16) & 0xff;
    block[7] = (seed >>> 24) & 0xff;
    return block;
  }

  /** The 8-byte mask XORed into block `blockIndex` of a buffer. */
  maskAt(blockIndex: number): Uint8Array {
    if (!Number.isInteger(blockIndex) || blockIndex < 0) {
      throw new RangeError(`Invalid block index: ${blockIndex}`);
    }
    return Uint8Array.from(this.mask(blockIndex % COUNTER_PERIOD));
  }

  /**
   * Encrypt `data` in place.
   * @throws {InvalidBlockLengthError} when the length is not a multiple of 8;
   *   no byte is modified in that case.
   */
  protect(data: Uint8Array): void {
    if (data.length % BLOCK_SIZE !== 0) {
      throw new InvalidBlockLengthError(data.length, BLOCK_SIZE);
    }

    let counter = 0;
    for (let off = 0; off < data.length; off += BLOCK_SIZE) {
      const mask = this.mask(counter);
      for (let i = 0; i < BLOCK_SIZE; i++) data[off + i] ^= mask[i];

      counter += 1;
      if (counter === COUNTER_PERIOD) counter = 0;
    }
  }

  /** Inverse of {@link protect}; the keystream XOR is symmetric. */
  unprotect(data: Uint8Array): void {
    this.protect(data);
  }

  private mask(counter: number): Uint8Array {
    let m = this.masks[counter];
    if (!m) {
      m = this.engine.encryptBlock(KeystreamCipher.counterBlock(counter));
      if (m.length !== BLOCK_SIZE) {
        throw new TnsPackError(`Block cipher produced ${m.length} bytes, expected ${BLOCK_SIZE}`);
      }
      this.masks[counter] = m;
    }
    return m;
  }
}
