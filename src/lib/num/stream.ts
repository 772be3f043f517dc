/**
 * Stream-style input and output
 * Values are written as canonical text and read back from
 * whitespace-delimited tokens.
 */

import { StringDecoder } from 'node:string_decoder';
import { BigInteger } from './BigInteger.js';
import type { ParseOptions } from './parse.js';

const WHITESPACE = /\s/;

export function writeBigInteger(out: NodeJS.WritableStream, value: BigInteger): boolean {
  return out.write(value.toString());
}

/**
 * Reads whitespace-delimited BigIntegers out of a string
 */
export class TokenReader implements Iterable<BigInteger> {
  private pos = 0;

  constructor(private readonly text: string, private readonly opts: ParseOptions = {}) {}

  /** The next raw token, or null at the end of input */
  nextToken(): string | null {
    while (this.pos < this.text.length && WHITESPACE.test(this.text[this.pos])) this.pos++;
    if (this.pos >= this.text.length) return null;

    const start = this.pos;
    while (this.pos < this.text.length && !WHITESPACE.test(this.text[this.pos])) this.pos++;
    return this.text.slice(start, this.pos);
  }

  next(): BigInteger | null {
    const token = this.nextToken();
    return token === null ? null : BigInteger.parse(token, this.opts);
  }

  *[Symbol.iterator](): Iterator<BigInteger> {
    for (let value = this.next(); value !== null; value = this.next()) {
      yield value;
    }
  }
}

/**
 * Reads BigIntegers from a readable stream; a token may span chunks
 */
export async function* readBigIntegers(
  input: AsyncIterable<string | Buffer>,
  opts: ParseOptions = {}
): AsyncGenerator<BigInteger> {
  // Keeps a multibyte character split across chunks whole
  const decoder = new StringDecoder('utf8');
  let pending = '';

  for await (const chunk of input) {
    pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    // Everything up to the last whitespace is complete
    let cut = -1;
    for (let i = pending.length - 1; i >= 0; i--) {
      if (WHITESPACE.test(pending[i])) {
        cut = i;
        break;
      }
    }
    if (cut < 0) continue;

    yield* new TokenReader(pending.slice(0, cut), opts);
    pending = pending.slice(cut + 1);
  }

  pending += decoder.end();
  yield* new TokenReader(pending, opts);
}
