import type { ByteSink } from './ByteSink.js';
import {
  CENTRAL_HEADER_SIGNATURE,
  FIXED_DOS_DATETIME,
  METHOD_CODES,
  VENDOR_END_SIGNATURE,
  VERSION_MADE_BY,
  VERSION_NEEDED,
} from './constants.js';
import { encodeUtf8 } from '../util/bytes.js';
import type { WrittenEntry } from '../types/index.js';

export interface CentralDirectoryInfo {
  offset: number;
  size: number;
  count: number;
}

export function writeCentralDirectory(
  sink: ByteSink,
  entries: readonly WrittenEntry[],
): CentralDirectoryInfo {
  const offset = sink.position;

  for (const entry of entries) {
    sink.writeUint32LE(CENTRAL_HEADER_SIGNATURE, 'signature');
    sink.writeUint16LE(VERSION_MADE_BY, 'version made by');
    sink.writeUint16LE(VERSION_NEEDED, 'version needed');
    sink.writeUint16LE(0, 'flags');
    sink.writeUint16LE(METHOD_CODES[entry.method], 'method');
    sink.writeUint32LE(FIXED_DOS_DATETIME, 'date/time');
    sink.writeUint32LE(entry.crc32, 'crc32');
    sink.writeUint32LE(entry.compressedSize, 'compressed size');
    sink.writeUint32LE(entry.uncompressedSize, 'uncompressed size');
    sink.writeUint16LE(entry.nameBytes.length, 'name length');
    sink.writeUint16LE(0, 'extra length');
    sink.writeUint16LE(0, 'comment length');
    sink.writeUint16LE(0, 'disk number');
    sink.writeUint16LE(0, 'internal attributes');
    sink.writeUint32LE(0, 'external attributes');
    sink.writeUint32LE(entry.localHeaderOffset, 'local header offset');
    sink.write(entry.nameBytes);
  }

  return { offset, size: sink.position - offset, count: entries.length };
}

/** End record; identical to the ZIP EOCD except for the `TIPD` signature. */
export function writeEndOfDirectory(sink: ByteSink, cd: CentralDirectoryInfo): void {
  sink.write(encodeUtf8(VENDOR_END_SIGNATURE));
  sink.writeUint16LE(0, 'disk number');
  sink.writeUint16LE(0, 'central directory disk');
  sink.writeUint16LE(cd.count, 'entries on disk');
  sink.writeUint16LE(cd.count, 'total entries');
  sink.writeUint32LE(cd.size, 'central directory size');
  sink.writeUint32LE(cd.offset, 'central directory offset');
  sink.writeUint16LE(0, 'comment length');
}
