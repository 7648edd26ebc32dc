import { concat, encodeUtf8, hexToBytes, latin1 } from '../util/bytes.js';
import { InvalidInputError } from '../errors/index.js';
import { MAX_PYTHON_FILENAME_BYTES } from '../config/defaults.js';

/*
 * Problem templates are TI "compressed XML": element names are interned
 * and closing tags are written as 0x0E <index>. They are kept as byte
 * strings (one char per byte).
 */

const LUA_PROLOGUE =
  'TIXC0100-1.0?><prob xmlns="urn:TI.P\xa8_[\x1f\x0a" ver="1.0" pbname=""><sym>\x0e\x01' +
  '<card clay="0" h1="\xf1\x00\x00\xff" h2="\xf1\x00\x00\xff" w1="\xf1\x00\x00\xff" w2="\xf1\x00\x00\xff">' +
  '<isDummyCard>0\x0e\x03<flag>0\x0e\x04' +
  '<wdgt xmlns:sc="urn:TI.S\xac\x84\xf2*App" type="TI.S\xac\x84\xf2*App" ver="1.0">' +
  '<sc:mFlags>0\x0e\x06<sc:value>-1\x0e\x07<sc:script version="512" id="0"><![CDATA[';

const LUA_EPILOGUE = ']]>\x0e\x08\x0e\x05\x0e\x02\x0e\x00';

const PYTHON_PROLOGUE =
  'TIXC0100-1.0?><prob xmlns="urn:TI.Problem" ver="1.0" pbname=""><sym>\x0e\x01' +
  '<card clay="0" h1="10000" h2="10000" w1="10000" w2="10000">' +
  '<isDummyCard>0\x0e\x03<flag>0\x0e\x04' +
  '<wdgt xmlns:py="urn:TI.PythonEditor" type="TI.PythonEditor" ver="1.0"><py:data><py:name>';

const PYTHON_EPILOGUE =
  '\x0e\x07<py:dirf>-10000000\x0e\x08\x0e\x06<py:mFlags>1024\x0e\x09<py:value>10\x0e\x0a\x0e\x05\x0e\x02\x0e\x00';

/** Vendor header in front of every deflated + protected problem body. */
export const PROTECTED_PROLOGUE = hexToBytes(
  '0fced8d28106865b99dda23dd9e94bd431bb50b64db32924706049381c30f899004b9264e458e6bc',
);

/** `Document.xml` for a single-problem document, already deflated and protected. */
export const DEFAULT_DOCUMENT = hexToBytes(
  '0fced8d28106865b4a4ac5cea916f2d51da82f6e0022f2f0c1a606774d7ea6c03af05c74baaa4460' +
  'cd58e670d740f69c17dcf09477bfcadef70209c962b15def22fa5137a0819148e1834dad08312dd0' +
  'd3e32d60ab13c2982bed395b092439922f0c7a4c9574913b0cf460cc7327cb077e7fa91787e2aca2' +
  '3bcca0c4e38e89f0c0519fc2bece2845c3d41190a6ec53a0fb5b466b41ade953bb97dbb1d268e2f6' +
  '360f2636759be91f48ade92967005819c3c01276a04a73f3b1d30918d606dd9724533e22a4fb8250' +
  '7b7c12884e7d4180fe72922987e85c5672ff29168c425b8b9ba7d2086dd398ff91a99ef393a82e1c' +
  'b2a96b6adff6ce2d1517ce6ec04f9a9c0edf198d2dfa699f11d22012e07914044e628f0a2a18725a' +
  '8b80b33c9bd567594b514de0c33828c3dccd3922128c4055',
);

const CDATA_RESTART = ']]><![CDATA[';

/**
 * Split every `]]>` in a script so it cannot close the CDATA section:
 * `a]]>b` becomes `a]]]]><![CDATA[>b`.
 */
export function escapeCdataTerminators(script: string): string {
  return script.split(']]>').join(`]]${CDATA_RESTART}>`);
}

/** Lua problem body: prologue, script inside CDATA, epilogue. */
export function wrapLuaScript(script: string): Uint8Array {
  return concat(
    latin1(LUA_PROLOGUE),
    encodeUtf8(escapeCdataTerminators(script)),
    latin1(LUA_EPILOGUE),
  );
}

/**
 * Python problem body. It only names the script; the source travels as a
 * separate archive entry under the same name.
 * @throws {InvalidInputError} when the name exceeds 240 UTF-8 bytes.
 */
export function wrapPythonScript(filename: string): Uint8Array {
  const name = encodeUtf8(filename);
  if (name.length > MAX_PYTHON_FILENAME_BYTES) {
    throw new InvalidInputError(
      `Python script filenames are limited to ${MAX_PYTHON_FILENAME_BYTES} bytes, got ${name.length}`,
    );
  }
  if (name.length === 0) throw new InvalidInputError('Python script filename is empty');
  return concat(latin1(PYTHON_PROLOGUE), name, latin1(PYTHON_EPILOGUE));
}
