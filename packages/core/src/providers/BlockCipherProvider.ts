/** A keyed single-block primitive (ECB, no padding, no chaining). */
export interface BlockEncryptor {
  readonly blockSize: number;
  encryptBlock(block: Uint8Array): Uint8Array;
}

/** Platform hook for the block cipher behind the keystream. */
export interface BlockCipherProvider {
  /** Three-key triple DES (EDE3); `key` is 24 bytes. */
  createTripleDes(key: Uint8Array): BlockEncryptor;
}
