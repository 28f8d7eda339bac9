/**
 * Permutation - a bijection on an alphabet described in cycle notation.
 *
 * A cycle specification is a run of parenthesised cycles such as
 * "(AELTPHQXRU) (BKNW) (S)". Each cycle maps every symbol to the one after
 * it and its last symbol back to its first. Symbols named in no cycle map to
 * themselves.
 *
 * The forward and backward tables are built once at construction, so
 * permute and invert are single array lookups.
 *
 * @example
 * ```typescript
 * const alphabet = new Alphabet('ABCD');
 * const perm = Permutation.fromCycles('(BACD)', alphabet);
 * perm.permute(0);        // 2 (A -> C)
 * perm.invertSymbol('A'); // 'B'
 * ```
 */

import { Alphabet } from './alphabet.service';
import { CipherError, CipherErrorCode } from '../utils/cipher-error';

export class Permutation {
  private readonly forward: readonly number[];
  private readonly backward: readonly number[];
  private readonly cycleList: readonly string[];

  private constructor(
    private readonly alpha: Alphabet,
    cycles: readonly string[]
  ) {
    const size = alpha.size();
    const forward = Array.from({ length: size }, (_, i) => i);
    const backward = Array.from({ length: size }, (_, i) => i);

    for (const cycle of cycles) {
      const members = Array.from(cycle, symbol => alpha.toIndex(symbol));
      members.forEach((from, position) => {
        const to = members[(position + 1) % members.length];
        forward[from] = to;
        backward[to] = from;
      });
    }

    this.forward = forward;
    this.backward = backward;
    this.cycleList = cycles;
  }

  /**
   * Parses a cycle specification over the given alphabet.
   *
   * @param spec - Parenthesised cycles, optionally separated by whitespace
   * @throws {CipherError} MALFORMED_CYCLE on unbalanced or nested parentheses,
   *   stray text, empty cycles, repeated symbols or unknown symbols
   */
  static fromCycles(spec: string, alphabet: Alphabet): Permutation {
    return new Permutation(alphabet, parseCycles(spec, alphabet));
  }

  static identity(alphabet: Alphabet): Permutation {
    return new Permutation(alphabet, []);
  }

  size(): number {
    return this.alpha.size();
  }

  alphabet(): Alphabet {
    return this.alpha;
  }

  permute(index: number): number {
    this.alpha.checkIndex(index);
    return this.forward[index];
  }

  invert(index: number): number {
    this.alpha.checkIndex(index);
    return this.backward[index];
  }

  permuteSymbol(symbol: string): string {
    return this.alpha.toSymbol(this.forward[this.alpha.toIndex(symbol)]);
  }

  invertSymbol(symbol: string): string {
    return this.alpha.toSymbol(this.backward[this.alpha.toIndex(symbol)]);
  }

  /**
   * True iff no symbol maps to itself.
   */
  derangement(): boolean {
    return this.forward.every((to, from) => to !== from);
  }

  /**
   * True iff applying the permutation twice is the identity, i.e. every
   * cycle is a fixed point or a swap.
   */
  isInvolution(): boolean {
    return this.forward.every((to, from) => this.forward[to] === from);
  }

  /**
   * The cycles exactly as given at construction.
   */
  cycles(): readonly string[] {
    return this.cycleList;
  }

  toString(): string {
    return this.cycleList.map(cycle => `(${cycle})`).join(' ');
  }
}

function malformed(
  message: string,
  spec: string,
  details: Record<string, unknown> = {}
): CipherError {
  return new CipherError(CipherErrorCode.MALFORMED_CYCLE, message, {
    spec,
    ...details,
  });
}

/**
 * Splits a cycle specification into cycles, checking every symbol against
 * the alphabet and against every symbol seen before it.
 */
function parseCycles(spec: string, alphabet: Alphabet): string[] {
  const cycles: string[] = [];
  const seen = new Set<string>();
  let current: string[] | null = null;

  for (const char of spec) {
    if (char === '(') {
      if (current !== null) {
        throw malformed('Nested "(" in cycle specification', spec);
      }
      current = [];
    } else if (char === ')') {
      if (current === null) {
        throw malformed('Unmatched ")" in cycle specification', spec);
      }
      if (current.length === 0) {
        throw malformed('Empty cycle in cycle specification', spec);
      }
      cycles.push(current.join(''));
      current = null;
    } else if (/\s/.test(char)) {
      if (current !== null) {
        throw malformed('Whitespace inside a cycle', spec);
      }
    } else {
      if (current === null) {
        throw malformed(`Symbol '${char}' outside parentheses`, spec, {
          symbol: char,
        });
      }
      if (!alphabet.contains(char)) {
        throw malformed(`Unknown symbol '${char}' in cycle`, spec, {
          symbol: char,
        });
      }
      if (seen.has(char)) {
        throw malformed(`Symbol '${char}' appears more than once`, spec, {
          symbol: char,
        });
      }
      seen.add(char);
      current.push(char);
    }
  }

  if (current !== null) {
    throw malformed('Unmatched "(" in cycle specification', spec);
  }

  return cycles;
}
