#!/usr/bin/env node
import dotenv from 'dotenv';
import { resolveRuntime } from '../config/runtime.js';
import { createLogger } from '../log.js';
import { describeError } from '../utils/errors.js';
import { run } from './main.js';

dotenv.config({ override: false });

async function main(): Promise<number> {
  const runtime = resolveRuntime();
  const log = createLogger(runtime);
  return run(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    stdin: process.stdin,
    log,
    runtime,
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${describeError(err)}\n`);
    process.exitCode = 1;
  }
);
