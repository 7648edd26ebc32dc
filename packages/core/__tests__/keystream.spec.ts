import {
  COUNTER_PERIOD,
  DOCUMENT_KEY,
  KeystreamCipher,
} from '../src/algorithms/keystream/KeystreamCipher.js';
import { InvalidBlockLengthError, TnsPackError } from '../src/errors/index.js';
import type { BlockCipherProvider } from '../src/providers/BlockCipherProvider.js';
import { nodeProvider } from '../../node-runtime/src/provider.js';

const hex = (b: Uint8Array) => Buffer.from(b).toString('hex');

describe('KeystreamCipher', () => {
  let cipher: KeystreamCipher;

  beforeEach(() => {
    cipher = new KeystreamCipher(nodeProvider);
  });

  it('builds counter blocks from the little-endian seed', () => {
    expect(hex(KeystreamCipher.counterBlock(0))).toBe('000000000713e26f');
    expect(hex(KeystreamCipher.counterBlock(1023))).toBe('000000000617e26f');
  });

  it('derives the first masks from the document key', () => {
    expect(hex(cipher.maskAt(0))).toBe('5c8a8713eb07f05d');
    expect(hex(cipher.maskAt(1))).toBe('745329c3ee6a1872');
  });

  it('repeats the keystream every 1024 blocks', () => {
    expect(cipher.maskAt(COUNTER_PERIOD)).toEqual(cipher.maskAt(0));
    expect(cipher.maskAt(COUNTER_PERIOD + 1)).toEqual(cipher.maskAt(1));
  });

  it('protects the 1025th block with the first mask', () => {
    const data = new Uint8Array((COUNTER_PERIOD + 1) * 8);
    cipher.protect(data);

    expect(hex(data.subarray(0, 8))).toBe('5c8a8713eb07f05d');
    expect(hex(data.subarray(COUNTER_PERIOD * 8))).toBe('5c8a8713eb07f05d');
  });

  it('XORs each block with its mask', () => {
    const data = new Uint8Array(16).fill(0xff);
    cipher.protect(data);
    expect(hex(data)).toBe('a37578ec14f80fa2' + '8bacd63c1195e78d');
  });

  it('gives different output for all-zero and all-0xFF blocks', () => {
    const zeros = new Uint8Array(8);
    const ones  = new Uint8Array(8).fill(0xff);
    cipher.protect(zeros);
    cipher.protect(ones);
    expect(hex(zeros)).not.toBe(hex(ones));
  });

  it('is deterministic across calls and instances', () => {
    const input = Uint8Array.from({ length: 64 }, (_, i) => i * 3);
    const a = Uint8Array.from(input);
    const b = Uint8Array.from(input);

    cipher.protect(a);
    new KeystreamCipher(nodeProvider).protect(b);
    expect(a).toEqual(b);
    expect(a).not.toEqual(input);
  });

  it('restores the input with unprotect', () => {
    const input = Uint8Array.from({ length: 40 }, (_, i) => 255 - i);
    const data  = Uint8Array.from(input);

    cipher.protect(data);
    cipher.unprotect(data);
    expect(data).toEqual(input);
  });

  it('rejects unaligned input without touching it', () => {
    const data = Uint8Array.of(1, 2, 3, 4, 5, 6, 7);
    expect(() => cipher.protect(data)).toThrow(InvalidBlockLengthError);
    expect(Array.from(data)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(() => cipher.protect(new Uint8Array(12)))
      .toThrow('Data length must be a multiple of 8 bytes, got 12 bytes');
  });

  it('accepts an empty buffer', () => {
    const data = new Uint8Array(0);
    expect(() => cipher.protect(data)).not.toThrow();
    expect(data.length).toBe(0);
  });

  it('rejects negative or fractional block indices', () => {
    expect(() => cipher.maskAt(-1)).toThrow(RangeError);
    expect(() => cipher.maskAt(1.5)).toThrow(RangeError);
  });

  it('hands the 24-byte document key to the provider', () => {
    const seen: Uint8Array[] = [];
    const provider: BlockCipherProvider = {
      createTripleDes(key) {
        seen.push(key);
        return { blockSize: 8, encryptBlock: block => Uint8Array.from(block) };
      },
    };
    new KeystreamCipher(provider);
    expect(hex(seen[0])).toBe('16a7a73268a7ba73d9a886a4344594103d808cb5dfb3806b');
    expect(seen[0]).toBe(DOCUMENT_KEY);
  });

  it('refuses a provider with the wrong block size', () => {
    const provider: BlockCipherProvider = {
      createTripleDes: () => ({ blockSize: 16, encryptBlock: block => block }),
    };
    expect(() => new KeystreamCipher(provider)).toThrow(TnsPackError);
  });
});
