// packages/node-runtime/src/index.ts
import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';

import {
  TnsConverter,
  IoError,
  VariantRegistry,
  createLogger,
  describeError,
  scriptKindFromPath,
  serializeArchive,
  type ConverterOptions,
  type Entry,
  type Logger,
} from '../../core/src/index.js';
import { nodeProvider } from './provider.js';

// a BOM stays part of the text so Python companions keep the file's bytes
const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function createConverter(cfg?: ConverterOptions): TnsConverter {
  return new TnsConverter(nodeProvider, cfg);
}

/**
 * Serialize `entries` and write the image with a single `writeFile`.
 * Serialization errors surface before the file is touched.
 */
export async function writeArchive(
  path: string,
  entries: Entry[],
  variantId: string = VariantRegistry.current.id,
  log: Logger = createLogger(),
): Promise<void> {
  const image = serializeArchive(entries, VariantRegistry.get(variantId), log);
  await writeOutput(path, image);
}

/**
 * Read `inputPath`, pick the script kind from its extension and write the
 * finished `.tns` to `outputPath`. Nothing is written unless conversion
 * succeeds. Python sources keep their base name inside the archive.
 */
export async function convertFile(
  inputPath : string,
  outputPath: string,
  cfg       : ConverterOptions = {},
): Promise<void> {
  const log = createLogger(cfg.verbose ?? 0, cfg.logger, 'file');

  let raw: Uint8Array;
  try {
    raw = await readFile(inputPath);
  } catch (err) {
    throw new IoError(`Cannot read input file ${inputPath}: ${describeError(err)}`, inputPath, { cause: err });
  }

  let source: string;
  try {
    source = strictUtf8.decode(raw);
  } catch (err) {
    throw new IoError(`Input file ${inputPath} is not valid UTF-8`, inputPath, { cause: err });
  }

  const kind = scriptKindFromPath(inputPath);
  log.log(2, `${inputPath}: ${kind}, ${source.length} chars`);

  const image = createConverter(cfg).convert(kind, source, basename(inputPath));
  await writeOutput(outputPath, image);
  log.log(1, `wrote ${image.length} bytes to ${outputPath}`);
}

async function writeOutput(path: string, image: Uint8Array): Promise<void> {
  try {
    await writeFile(path, image);
  } catch (err) {
    throw new IoError(`Cannot write output file ${path}: ${describeError(err)}`, path, { cause: err });
  }
}

export { TnsConverter } from '../../core/src/index.js';
export { nodeProvider } from './provider.js';
