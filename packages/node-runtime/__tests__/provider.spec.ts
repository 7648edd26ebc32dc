import { nodeProvider } from '../src/provider.js';
import { DOCUMENT_KEY, KeystreamCipher } from '../../core/src/algorithms/keystream/KeystreamCipher.js';
import { TnsPackError } from '../../core/src/errors/index.js';

const hex = (b: Uint8Array) => Buffer.from(b).toString('hex');

describe('nodeProvider (des-ede3)', () => {
  const engine = nodeProvider.createTripleDes(DOCUMENT_KEY);

  it('encrypts a single block without padding', () => {
    const out = engine.encryptBlock(KeystreamCipher.counterBlock(0));
    expect(engine.blockSize).toBe(8);
    expect(hex(out)).toBe('5c8a8713eb07f05d');
  });

  it('keeps blocks independent', () => {
    const second = engine.encryptBlock(KeystreamCipher.counterBlock(1));
    const first  = engine.encryptBlock(KeystreamCipher.counterBlock(0));
    expect(hex(second)).toBe('745329c3ee6a1872');
    expect(hex(first)).toBe('5c8a8713eb07f05d');
  });

  it('rejects keys that are not 24 bytes', () => {
    expect(() => nodeProvider.createTripleDes(new Uint8Array(16)))
      .toThrow('Triple DES needs a 24-byte key, got 16');
  });

  it('rejects partial blocks', () => {
    expect(() => engine.encryptBlock(new Uint8Array(7))).toThrow(TnsPackError);
  });
});
