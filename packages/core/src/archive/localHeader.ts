import { encodeUtf8 } from '../util/bytes.js';
import type { ByteSink } from './ByteSink.js';
import {
  FIXED_DOS_DATETIME,
  LOCAL_HEADER_SIGNATURE,
  METHOD_CODES,
  VENDOR_MAGIC,
  VERSION_NEEDED,
} from './constants.js';
import type { WrittenEntry } from '../types/index.js';

/** Entry 0 carries the vendor magic and version tag; the rest use the ZIP signature. */
export type HeaderPosition = 'first' | 'subsequent';

/**
 * Local header layout:
 *
 *   first      : "*TIMLP"(6) | versionTag(4) | fields(26) | name
 *   subsequent : "PK\x03\x04"(4)             | fields(26) | name
 *
 * fields = needed(2) flags(2) method(2) dostime(4) crc(4) csize(4) usize(4) nlen(2) xlen(2)
 */
export function writeLocalHeader(
  sink: ByteSink,
  position: HeaderPosition,
  entry: Omit<WrittenEntry, 'localHeaderOffset'>,
  versionTag: string,
): void {
  if (position === 'first') {
    sink.write(encodeUtf8(VENDOR_MAGIC));
    sink.write(encodeUtf8(versionTag));
  } else {
    sink.writeUint32LE(LOCAL_HEADER_SIGNATURE, 'signature');
  }

  sink.writeUint16LE(VERSION_NEEDED, 'version needed');
  sink.writeUint16LE(0, 'flags');
  sink.writeUint16LE(METHOD_CODES[entry.method], 'method');
  sink.writeUint32LE(FIXED_DOS_DATETIME, 'date/time');
  sink.writeUint32LE(entry.crc32, 'crc32');
  sink.writeUint32LE(entry.compressedSize, 'compressed size');
  sink.writeUint32LE(entry.uncompressedSize, 'uncompressed size');
  sink.writeUint16LE(entry.nameBytes.length, 'name length');
  sink.writeUint16LE(0, 'extra length');
  sink.write(entry.nameBytes);
}
