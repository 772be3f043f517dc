import type { Logger } from 'pino';
import type { Runtime } from '../config/runtime.js';
import { BigInteger } from '../lib/num/BigInteger.js';
import { formatBigInteger } from '../lib/num/format.js';
import { readBigIntegers } from '../lib/num/stream.js';
import { describeError } from '../utils/errors.js';
import { getPalette, type Palette } from './theme.js';

export const DEFAULT_OPERANDS: readonly [string, string] = ['100_200_100', '300_200_100'];

export type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  stdin: AsyncIterable<string | Buffer>;
  log: Logger;
  runtime: Pick<Runtime, 'color' | 'parseMode'>;
};

type CliArgs = {
  operands: string[];
  grouped: boolean;
  stdin: boolean;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = 'usage: digitwise [a] [b] [--grouped] [--stdin]';

export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { operands: [], grouped: false, stdin: false };
  for (const arg of argv) {
    if (arg === '--grouped') out.grouped = true;
    else if (arg === '--stdin') out.stdin = true;
    else if (arg.startsWith('--')) throw new UsageError(`Unknown option ${arg}`);
    else out.operands.push(arg);
  }
  if (out.stdin && out.operands.length > 0) throw new UsageError('--stdin takes no operands');
  if (out.operands.length !== 0 && out.operands.length !== 2) {
    throw new UsageError(`Expected two operands, got ${out.operands.length}`);
  }
  return out;
}

function report(a: BigInteger, b: BigInteger, grouped: boolean, palette: Palette): string[] {
  const show = (v: BigInteger) => palette.value(formatBigInteger(v, { grouped }));
  return [
    `${palette.label('binary plus says:')} ${show(a.add(b))}`,
    `${palette.label('binary minus says:')} ${show(a.sub(b))}`,
    `${palette.label('binary star says:')} ${show(a.mul(b))}`,
  ];
}

async function* pairs(io: CliIo): AsyncGenerator<[BigInteger, BigInteger]> {
  let first: BigInteger | null = null;
  for await (const value of readBigIntegers(io.stdin, { mode: io.runtime.parseMode })) {
    if (first === null) {
      first = value;
    } else {
      yield [first, value];
      first = null;
    }
  }
  if (first !== null) throw new UsageError('Odd number of operands on stdin');
}

/**
 * Runs the calculator; resolves to the process exit code
 */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  const palette = getPalette(io.runtime.color);
  const write = (line: string) => io.stdout.write(`${line}\n`);

  try {
    const args = parseArgs(argv);
    const opts = { mode: io.runtime.parseMode };

    if (args.stdin) {
      for await (const [a, b] of pairs(io)) {
        io.log.debug({ a: a.toString(), b: b.toString() }, 'operands');
        report(a, b, args.grouped, palette).forEach(write);
      }
      return 0;
    }

    const [rawA, rawB] = args.operands.length === 2 ? args.operands : DEFAULT_OPERANDS;
    const a = BigInteger.parse(rawA, opts);
    const b = BigInteger.parse(rawB, opts);
    io.log.debug({ a: a.toString(), b: b.toString() }, 'operands');
    report(a, b, args.grouped, palette).forEach(write);
    return 0;
  } catch (err) {
    io.log.error({ err }, 'digitwise failed');
    io.stderr.write(`${palette.error(describeError(err))}\n`);
    if (err instanceof UsageError) {
      io.stderr.write(`${palette.dim(USAGE)}\n`);
      return 2;
    }
    return 1;
  }
}
