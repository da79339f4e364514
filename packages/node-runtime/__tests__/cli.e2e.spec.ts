import { fileURLToPath } from 'node:url';
import { execa } from 'execa';
import { PKG_VERSION } from '../src/program.js';

/* ------------------------------------------------------------------ */
/*  Paths & runner                                                     */
/* ------------------------------------------------------------------ */
const CLI = fileURLToPath(new URL('../src/cli.ts', import.meta.url));

// Node needs the tsx loader for the TypeScript entry point
const run = (args: string[], input?: Buffer) =>
  execa(process.execPath, ['--import', 'tsx', CLI, ...args], {
    input,
    encoding: 'utf8',
    reject  : false,
  });

/* ------------------------------------------------------------------ */
/*  Tests                                                              */
/* ------------------------------------------------------------------ */
describe('ncm-unlock (CLI)', () => {
  it('prints the version', async () => {
    const res = await run(['--version']);
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe(PKG_VERSION);
  });

  it('exits non-zero with a tagged error on foreign input', async () => {
    const res = await run(['inspect', '-'], Buffer.from('not a container at all'));
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toBe('Error [InvalidMagicError]: Invalid input format. Not an NCM container.');
  });

  it('rejects unknown commands', async () => {
    const res = await run(['explode']);
    expect(res.exitCode).toBe(1);
    expect(res.stderr).toMatch(/unknown command 'explode'/);
  });
});
