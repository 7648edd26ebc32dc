import '../config/defaults.js';

import type { BlockCipherProvider } from '../providers/BlockCipherProvider.js';
import { KeystreamCipher } from '../algorithms/keystream/KeystreamCipher.js';
import { PayloadAssembler, companionEntry, protectedEntry } from '../payload/PayloadAssembler.js';
import { serializeArchive } from '../archive/ArchiveWriter.js';
import { VariantRegistry } from '../config/VariantRegistry.js';
import { DOCUMENT_ENTRY_NAME, PROBLEM_ENTRY_NAME } from '../config/defaults.js';
import { DEFAULT_DOCUMENT, wrapLuaScript, wrapPythonScript } from '../templates/problem.js';
import { textToLuaScript } from '../templates/textNote.js';
import { encodeUtf8 } from '../util/bytes.js';
import { createLogger, type Logger, type Verbosity } from '../util/logger.js';
import { InvalidInputError } from '../errors/index.js';
import type { Entry, ScriptKind, VariantDescriptor } from '../types/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring a converter.
 */
export interface ConverterOptions {
  /** Archive format variant id; defaults to the registry's current variant */
  variant?  : string;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?  : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?   : (msg: string) => void;
}

/**
 * Builds `.tns` images in memory. Every call starts from fresh buffers; a
 * failure at any step throws before an image exists.
 */
export class TnsConverter {
  private readonly variant  : VariantDescriptor;
  private readonly assembler: PayloadAssembler;
  private readonly log      : Logger;

  constructor(provider: BlockCipherProvider, opt: ConverterOptions = {}) {
    this.variant   = VariantRegistry.get(opt.variant ?? VariantRegistry.current.id);
    this.log       = createLogger(opt.verbose ?? 0, opt.logger, 'convert');
    this.assembler = new PayloadAssembler(new KeystreamCipher(provider), this.log.child('payload'));
  }

  get formatVariant(): VariantDescriptor {
    return this.variant;
  }

  /** Lua script → `Document.xml` + protected `Problem1.xml`. */
  convertLua(script: string): Uint8Array {
    this.log.log(2, `lua script: ${script.length} chars`);
    const problem = wrapLuaScript(script);
    return this.archive([
      protectedEntry(DOCUMENT_ENTRY_NAME, DEFAULT_DOCUMENT),
      this.assembler.protectedEntry(PROBLEM_ENTRY_NAME, problem),
    ]);
  }

  /**
   * Python script → `Document.xml`, protected `Problem1.xml` naming the
   * script, and the script itself deflated under `filename`.
   * @throws {InvalidInputError} for an empty or over-long filename.
   */
  convertPython(script: string, filename: string): Uint8Array {
    this.log.log(2, `python script ${filename}: ${script.length} chars`);
    const problem = wrapPythonScript(filename);
    return this.archive([
      protectedEntry(DOCUMENT_ENTRY_NAME, DEFAULT_DOCUMENT),
      this.assembler.protectedEntry(PROBLEM_ENTRY_NAME, problem),
      companionEntry(filename, encodeUtf8(script)),
    ]);
  }

  /** Plain text → a Lua note viewer → Lua path. */
  convertText(text: string): Uint8Array {
    this.log.log(2, `text note: ${text.length} chars`);
    return this.convertLua(textToLuaScript(text));
  }

  /** Dispatch on script kind; `filename` is required for Python. */
  convert(kind: ScriptKind, source: string, filename?: string): Uint8Array {
    switch (kind) {
      case 'lua':
        return this.convertLua(source);
      case 'python':
        if (filename === undefined) throw new InvalidInputError('Python conversion needs a script filename');
        return this.convertPython(source, filename);
      case 'text':
        return this.convertText(source);
    }
  }

  private archive(entries: Entry[]): Uint8Array {
    return serializeArchive(entries, this.variant, this.log.child('archive'));
  }
}
