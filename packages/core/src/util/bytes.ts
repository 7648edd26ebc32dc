const utf8Encoder = new TextEncoder();

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

export function encodeUtf8(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/**
 * One byte per UTF-16 code unit. Only for compiled-in templates whose
 * characters are all in 0x00–0xFF.
 */
export function latin1(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) throw new RangeError(`Non-latin1 character at ${i}`);
    out[i] = code;
  }
  return out;
}

export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new RangeError('Invalid hex string');
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/** Append zero bytes up to the next multiple of `blockSize`; aligned input is returned unchanged. */
export function padToBlock(data: Uint8Array, blockSize: number): Uint8Array {
  const rem = data.length % blockSize;
  if (rem === 0) return data;
  const out = new Uint8Array(data.length + (blockSize - rem));
  out.set(data, 0);
  return out;
}
