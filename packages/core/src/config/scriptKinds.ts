import type { ScriptKind } from '../types/index.js';

const BY_EXTENSION: Readonly<Record<string, ScriptKind>> = {
  lua: 'lua',
  py : 'python',
};

/** Pick the conversion path from a file name; unknown extensions are plain text. */
export function scriptKindFromPath(path: string): ScriptKind {
  const base = path.split(/[\\/]/).pop() ?? '';
  const dot  = base.lastIndexOf('.');
  if (dot <= 0) return 'text';
  return BY_EXTENSION[base.slice(dot + 1).toLowerCase()] ?? 'text';
}
