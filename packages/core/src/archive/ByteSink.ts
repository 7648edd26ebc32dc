import { concat } from '../util/bytes.js';
import { ArchiveWriteError } from '../errors/index.js';
import { MAX_UINT16, MAX_UINT32 } from './constants.js';

/**
 * Append-only in-memory output. `position` is the offset the next write lands at.
 */
export class ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  get position(): number {
    return this.length;
  }

  write(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  writeUint16LE(value: number, label: string): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_UINT16) {
      throw new ArchiveWriteError(`${label} out of range for uint16: ${value}`);
    }
    this.write(Uint8Array.of(value & 0xff, (value >>> 8) & 0xff));
  }

  writeUint32LE(value: number, label: string): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
      throw new ArchiveWriteError(`${label} out of range for uint32: ${value}`);
    }
    this.write(Uint8Array.of(
      value & 0xff,
      (value >>> 8) & 0xff,
      (value >>> 16) & 0xff,
      (value >>> 24) & 0xff,
    ));
  }

  toUint8Array(): Uint8Array {
    return concat(...this.chunks);
  }
}
