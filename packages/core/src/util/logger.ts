/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl <= this.level) sink(`${lvl}| ${msg}`);
    },
  };
}

export function toVerbosity(n: number): Verbosity {
  if (n <= 0) return 0;
  if (n >= 4) return 4;
  return n === 1 ? 1 : n === 2 ? 2 : 3;
}

export const silentLogger: Logger = createLogger(0, () => {});
