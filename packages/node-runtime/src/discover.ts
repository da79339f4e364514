// packages/node-runtime/src/discover.ts
import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { FilesystemError } from '../../core/src/index.js';

export const CONTAINER_EXT = '.ncm';

export interface DiscoverOptions {
  recursive? : boolean;
}

/**
 * Expand files and directories into container paths. Files named
 * explicitly are taken as they are; directories contribute `*.ncm` in any
 * letter case. Result is absolute, de-duplicated and sorted.
 */
export async function findContainers(paths: readonly string[], opt: DiscoverOptions = {}): Promise<string[]> {
  const found = new Set<string>();

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const e of entries) {
      const full = join(dir, e.name);
      if (e.isDirectory()) {
        if (opt.recursive) await walk(full);
      } else if (e.isFile() && extname(e.name).toLowerCase() === CONTAINER_EXT) {
        found.add(full);
      }
    }
  }

  for (const p of paths) {
    const abs = resolve(p);
    const st  = await stat(abs).catch((err: unknown) => {
      throw inputError(p, err);
    });
    if (st.isDirectory()) await walk(abs);
    else if (st.isFile()) found.add(abs);
    else throw new FilesystemError(`Not a file or directory: ${p}`);
  }

  return [...found].sort();
}

function inputError(p: string, err: unknown): FilesystemError {
  const code = err instanceof Error && 'code' in err ? String(err.code) : undefined;
  if (code === 'ENOENT') return new FilesystemError(`Input not found: ${p}`);
  const why = code ?? (err instanceof Error ? err.message : String(err));
  return new FilesystemError(`Cannot read input ${p}: ${why}`);
}
