/* ------------------------- Conversion inputs ------------------------- */
export type ScriptKind = 'lua' | 'python' | 'text';

/* ------------------------- Format variants --------------------------- */
/**
 * One archive flavour. Variants differ only in the 4-byte version tag that
 * follows the vendor magic in the first local header.
 */
export interface VariantDescriptor {
  readonly id: string;
  /** Four ASCII digits, e.g. "0500". */
  readonly versionTag: string;
  readonly description: string;
}

/* ------------------------- Archive entries --------------------------- */
export type EntryMethod = 'vendor-protected' | 'deflated';

/** One named payload handed to the archive writer. Order is significant. */
export interface Entry {
  readonly name: string;
  /** Bytes exactly as stored (already deflated and/or protected). */
  readonly body: Uint8Array;
  readonly method: EntryMethod;
  /**
   * For `deflated`, the size before compression. For `vendor-protected`,
   * the stored length.
   */
  readonly uncompressedSize: number;
  /**
   * CRC-32 of the original bytes for `deflated`, of the stored bytes for
   * `vendor-protected`.
   */
  readonly crc32: number;
}

/** Writer ledger row, recorded as each local header is emitted. */
export interface WrittenEntry {
  readonly nameBytes: Uint8Array;
  readonly method: EntryMethod;
  readonly crc32: number;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
  readonly localHeaderOffset: number;
}
