import { serializeArchive } from '../src/archive/ArchiveWriter.js';
import { VariantRegistry } from '../src/config/VariantRegistry.js';
import { ArchiveWriteError } from '../src/errors/index.js';
import type { Entry } from '../src/types/index.js';
import '../src/config/defaults.js';

const ascii = (b: Uint8Array, from: number, to: number) =>
  String.fromCharCode(...b.subarray(from, to));

const entries: Entry[] = [
  {
    name: 'a.txt',
    body: Uint8Array.of(1, 2, 3),
    method: 'deflated',
    uncompressedSize: 10,
    crc32: 0x11223344,
  },
  {
    name: 'bc',
    body: Uint8Array.of(9, 9),
    method: 'vendor-protected',
    uncompressedSize: 2,
    crc32: 0xaabbccdd,
  },
];

/*
 * Expected layout:
 *   0   first local header (36) + "a.txt" + body(3)  → 44
 *   44  PK\3\4 header (30) + "bc" + body(2)          → 78
 *   78  central directory: 46+5, 46+2                → 177
 *   177 TIPD end record (22)                         → 199
 */
describe('serializeArchive', () => {
  const image = serializeArchive(entries, VariantRegistry.get('standard'));
  const view  = new DataView(image.buffer, image.byteOffset, image.byteLength);

  it('has the expected total length', () => {
    expect(image.length).toBe(199);
  });

  it('writes the vendor magic and version tag for the first entry', () => {
    expect(ascii(image, 0, 6)).toBe('*TIMLP');
    expect(ascii(image, 6, 10)).toBe('0500');
    expect(view.getUint16(10, true)).toBe(20);         // version needed
    expect(view.getUint16(12, true)).toBe(0);          // flags
    expect(view.getUint16(14, true)).toBe(8);          // method
    expect(view.getUint32(16, true)).toBe(0x00200000); // date/time
    expect(view.getUint32(20, true)).toBe(0x11223344);
    expect(view.getUint32(24, true)).toBe(3);
    expect(view.getUint32(28, true)).toBe(10);
    expect(view.getUint16(32, true)).toBe(5);
    expect(view.getUint16(34, true)).toBe(0);
    expect(ascii(image, 36, 41)).toBe('a.txt');
    expect(Array.from(image.subarray(41, 44))).toEqual([1, 2, 3]);
  });

  it('writes a standard local header for later entries', () => {
    expect(Array.from(image.subarray(44, 48))).toEqual([0x50, 0x4b, 0x03, 0x04]);
    expect(view.getUint16(52, true)).toBe(0x0d);
    expect(view.getUint32(58, true)).toBe(0xaabbccdd);
    expect(view.getUint32(62, true)).toBe(2);
    expect(view.getUint32(66, true)).toBe(2);
    expect(ascii(image, 74, 76)).toBe('bc');
    expect(Array.from(image.subarray(76, 78))).toEqual([9, 9]);
  });

  it('writes a central directory record per entry', () => {
    expect(Array.from(image.subarray(78, 82))).toEqual([0x50, 0x4b, 0x01, 0x02]);
    expect(view.getUint16(82, true)).toBe(20);   // made by
    expect(view.getUint16(84, true)).toBe(20);   // needed
    expect(view.getUint16(88, true)).toBe(8);
    expect(view.getUint32(94, true)).toBe(0x11223344);
    expect(view.getUint32(98, true)).toBe(3);
    expect(view.getUint32(102, true)).toBe(10);
    expect(view.getUint32(120, true)).toBe(0);   // local header offset
    expect(ascii(image, 124, 129)).toBe('a.txt');

    expect(Array.from(image.subarray(129, 133))).toEqual([0x50, 0x4b, 0x01, 0x02]);
    expect(view.getUint16(139, true)).toBe(0x0d);
    expect(view.getUint32(171, true)).toBe(44);
    expect(ascii(image, 175, 177)).toBe('bc');
  });

  it('ends with the TIPD record', () => {
    expect(ascii(image, 177, 181)).toBe('TIPD');
    expect(view.getUint16(181, true)).toBe(0);
    expect(view.getUint16(183, true)).toBe(0);
    expect(view.getUint16(185, true)).toBe(2);
    expect(view.getUint16(187, true)).toBe(2);
    expect(view.getUint32(189, true)).toBe(99);  // central directory size
    expect(view.getUint32(193, true)).toBe(78);  // central directory offset
    expect(view.getUint16(197, true)).toBe(0);
  });

  it('uses the bitmap variant tag when asked', () => {
    const bitmap = serializeArchive(entries, VariantRegistry.get('bitmap'));
    expect(ascii(bitmap, 6, 10)).toBe('0700');
    expect(bitmap.subarray(10)).toEqual(image.subarray(10));
  });

  it('is byte-identical across runs', () => {
    expect(serializeArchive(entries, VariantRegistry.current)).toEqual(image);
  });

  it('keeps single-entry archives consistent', () => {
    const one = serializeArchive([entries[1]], VariantRegistry.current);
    const v   = new DataView(one.buffer, one.byteOffset, one.byteLength);
    // 36 + 2 + 2 local, 46 + 2 central, 22 end
    const end = 88;
    expect(one.length).toBe(end + 22);
    expect(ascii(one, end, end + 4)).toBe('TIPD');
    expect(v.getUint16(end + 10, true)).toBe(1);
    expect(v.getUint32(end + 12, true)).toBe(48);
    expect(v.getUint32(end + 16, true)).toBe(40);
  });

  it('rejects an empty entry list', () => {
    expect(() => serializeArchive([], VariantRegistry.current)).toThrow(ArchiveWriteError);
  });

  it('rejects names longer than 65535 bytes', () => {
    const long: Entry = { ...entries[0], name: 'x'.repeat(65536) };
    expect(() => serializeArchive([long], VariantRegistry.current)).toThrow(ArchiveWriteError);
  });

  it('rejects sizes that do not fit 32 bits', () => {
    const huge: Entry = { ...entries[0], uncompressedSize: 2 ** 32 };
    expect(() => serializeArchive([huge], VariantRegistry.current))
      .toThrow('uncompressed size out of range for uint32: 4294967296');
  });
});
