import symbols from './symbols.json' with { type: 'json' };

const COMMANDS     = new Map<string, string>(Object.entries(symbols.commands));
const SUPERSCRIPTS = new Map<string, string>(Object.entries(symbols.superscripts));
const SUBSCRIPTS   = new Map<string, string>(Object.entries(symbols.subscripts));

type Match = { text: string; consumed: number };

/**
 * Render common LaTeX math notation with characters the handheld font has.
 *
 * - `\alpha`, `\times`, `\leq`, … from the symbol table (some map to ASCII
 *   spellings such as `\infty` → `inf`)
 * - `\frac12` style vulgar fractions, `\,` `\;` `\:` `\!` `\|`
 * - `x^2`, `x^{10}` superscripts and `H_2`, `a_{ij}` subscripts; a group
 *   with any character lacking a script form is written as `(…)` instead
 *
 * Unknown commands and unclosed groups are left as typed.
 */
export function latexToUnicode(input: string): string {
  const chars = Array.from(input);
  let out = '';
  let i = 0;

  while (i < chars.length) {
    const c = chars[i];
    let m: Match | null = null;
    if (c === '\\')      m = matchCommand(chars, i);
    else if (c === '^')  m = shiftScript(chars, i + 1, SUPERSCRIPTS);
    else if (c === '_')  m = shiftScript(chars, i + 1, SUBSCRIPTS);

    if (m) {
      out += m.text;
      i += c === '\\' ? m.consumed : 1 + m.consumed;
    } else {
      out += c;
      i += 1;
    }
  }
  return out;
}

function matchCommand(chars: string[], start: number): Match | null {
  let i   = start + 1;
  let cmd = '\\';
  while (i < chars.length && /^[A-Za-z]$/.test(chars[i])) cmd += chars[i++];

  if (cmd === '\\frac' && i + 1 < chars.length) {
    const frac = COMMANDS.get(`\\frac${chars[i]}${chars[i + 1]}`);
    if (frac !== undefined) return { text: frac, consumed: i + 2 - start };
  }

  const named = COMMANDS.get(cmd);
  if (named !== undefined) return { text: named, consumed: i - start };

  if (start + 1 < chars.length) {
    const single = COMMANDS.get(`\\${chars[start + 1]}`);
    if (single !== undefined) return { text: single, consumed: 2 };
  }
  return null;
}

function shiftScript(chars: string[], start: number, table: Map<string, string>): Match | null {
  if (start >= chars.length) return null;

  let group: string[];
  let consumed: number;
  if (chars[start] === '{') {
    const close = chars.indexOf('}', start + 1);
    if (close === -1) return null;
    group    = chars.slice(start + 1, close);
    consumed = close - start + 1;
  } else {
    group    = [chars[start]];
    consumed = 1;
  }
  if (group.length === 0) return null;

  const shifted = group.map(ch => table.get(ch));
  if (shifted.every((s): s is string => s !== undefined)) {
    return { text: shifted.join(''), consumed };
  }
  return { text: `(${group.join('')})`, consumed };
}
