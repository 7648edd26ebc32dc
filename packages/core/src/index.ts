// packages/core/src/index.ts

import './config/defaults.js';

export { TnsConverter, type ConverterOptions } from './converter/TnsConverter.js';

export {
  KeystreamCipher,
  BLOCK_SIZE,
  COUNTER_PERIOD,
  IVEC_BASE,
} from './algorithms/keystream/KeystreamCipher.js';
export { compress, decompress } from './algorithms/compression/rawDeflate.js';

export {
  PayloadAssembler,
  assembleProtectedPayload,
  protectedEntry,
  companionEntry,
} from './payload/PayloadAssembler.js';
export { serializeArchive } from './archive/ArchiveWriter.js';
export { VENDOR_MAGIC, VENDOR_END_SIGNATURE } from './archive/constants.js';

export { VariantRegistry } from './config/VariantRegistry.js';
export { scriptKindFromPath } from './config/scriptKinds.js';

export { wrapLuaScript, wrapPythonScript } from './templates/problem.js';
export { textToLuaScript } from './templates/textNote.js';
export { latexToUnicode } from './notation/latex.js';

export { crc32 } from './util/crc32.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';

export type { BlockCipherProvider, BlockEncryptor } from './providers/BlockCipherProvider.js';
export type { Entry, EntryMethod, ScriptKind, VariantDescriptor, WrittenEntry } from './types/index.js';

export {
  TnsPackError,
  InvalidBlockLengthError,
  CompressionError,
  DecompressionError,
  IoError,
  InvalidInputError,
  ArchiveWriteError,
  VariantError,
  describeError,
} from './errors/index.js';
