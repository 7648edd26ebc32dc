import { compress, decompress } from '../src/algorithms/compression/rawDeflate.js';
import { DecompressionError } from '../src/errors/index.js';

const enc = new TextEncoder();

describe('raw deflate', () => {
  it('round-trips empty input', () => {
    expect(decompress(compress(new Uint8Array(0))).length).toBe(0);
  });

  it('round-trips a short string', () => {
    const text = enc.encode('Hello, World!');
    expect(decompress(compress(text))).toEqual(text);
  });

  it('shrinks repetitive input', () => {
    const data = enc.encode('A'.repeat(1000));
    const packed = compress(data);
    expect(packed.length).toBeLessThan(500);
    expect(decompress(packed)).toEqual(data);
  });

  it('emits a bare deflate stream without zlib framing', () => {
    // a zlib header would start with 0x78
    expect(compress(enc.encode('abc'))[0]).not.toBe(0x78);
  });

  it('wraps malformed input in DecompressionError', () => {
    // BFINAL=1, BTYPE=11 (reserved)
    expect(() => decompress(Uint8Array.of(0x07))).toThrow(DecompressionError);
  });
});
