#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stdin, stdout, stderr, exit as processExit } from 'node:process';
import { run } from './program.js';

process.on('uncaughtException', err => {
  stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  processExit(1);
});

process.on('unhandledRejection', (err: unknown) => {
  if (err instanceof Error) {
    stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
});

const code = await run(process.argv.slice(2), {
  out: s => { stdout.write(s); },
  err: s => { stderr.write(s); },
  stdin,
  stdout,
});
process.exitCode = code;
