import { ByteSink } from './ByteSink.js';
import { writeLocalHeader } from './localHeader.js';
import { writeCentralDirectory, writeEndOfDirectory } from './centralDirectory.js';
import { MAX_UINT16, MAX_UINT32 } from './constants.js';
import { ArchiveWriteError, TnsPackError, describeError } from '../errors/index.js';
import { encodeUtf8 } from '../util/bytes.js';
import { createLogger, type Logger } from '../util/logger.js';
import type { Entry, VariantDescriptor, WrittenEntry } from '../types/index.js';

/**
 * Serialize `entries`, in the given order, into one `.tns` image.
 *
 * Single forward pass: local header + body per entry, then the central
 * directory built from the ledger, then the `TIPD` end record.
 *
 * @throws {ArchiveWriteError} on an empty entry list or a field that does not fit.
 */
export function serializeArchive(
  entries: readonly Entry[],
  variant: VariantDescriptor,
  log: Logger = createLogger(),
): Uint8Array {
  if (entries.length === 0) throw new ArchiveWriteError('Archive needs at least one entry');
  if (entries.length > MAX_UINT16) {
    throw new ArchiveWriteError(`Too many entries: ${entries.length}`);
  }

  const sink   = new ByteSink();
  const ledger : WrittenEntry[] = [];

  try {
    entries.forEach((entry, i) => {
      const nameBytes = encodeUtf8(entry.name);
      if (nameBytes.length > MAX_UINT16) {
        throw new ArchiveWriteError(`Entry name too long (${nameBytes.length} bytes): ${entry.name.slice(0, 32)}…`);
      }
      if (entry.body.length > MAX_UINT32 || sink.position + entry.body.length > MAX_UINT32) {
        throw new ArchiveWriteError(`Entry ${entry.name} does not fit in a 32-bit archive`);
      }

      const written: WrittenEntry = {
        nameBytes,
        method          : entry.method,
        crc32           : entry.crc32,
        compressedSize  : entry.body.length,
        uncompressedSize: entry.uncompressedSize,
        localHeaderOffset: sink.position,
      };

      writeLocalHeader(sink, i === 0 ? 'first' : 'subsequent', written, variant.versionTag);
      sink.write(entry.body);
      ledger.push(written);

      log.log(3, `entry ${entry.name}: ${entry.method}, ${entry.body.length} bytes at ${written.localHeaderOffset}`);
    });

    const cd = writeCentralDirectory(sink, ledger);
    writeEndOfDirectory(sink, cd);
  } catch (err) {
    if (err instanceof TnsPackError) throw err;
    throw new ArchiveWriteError(`Failed to write archive: ${describeError(err)}`, { cause: err });
  }

  const image = sink.toUint8Array();
  log.log(2, `archive ${variant.id} (${variant.versionTag}): ${ledger.length} entries, ${image.length} bytes`);
  return image;
}
