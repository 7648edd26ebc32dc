/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
  /** Same level and sink, messages tagged with `[scope]`. */
  child(scope: string): Logger;
}

const LEVELS = [0, 1, 2, 3, 4] as const;

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
  scope?: string,
): Logger {
  const tag = scope ? `[${scope}] ` : '';
  return {
    level,
    log(lvl, msg) {
      if (lvl <= level) sink(`${lvl}| ${tag}${msg}`);
    },
    child(next) {
      return createLogger(level, sink, next);
    },
  };
}

/** Clamp an arbitrary count (e.g. repeated `-v` flags) into a verbosity level. */
export function toVerbosity(n: number): Verbosity {
  const i = Number.isFinite(n) ? Math.trunc(n) : 0;
  return LEVELS[Math.min(LEVELS.length - 1, Math.max(0, i))];
}
