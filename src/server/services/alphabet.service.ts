/**
 * Alphabet - bijection between a symbol set and dense integer indices.
 *
 * Symbols are single characters. The characters '(', ')', '*' and whitespace
 * are reserved by the cycle notation and the transcript format, so they can
 * never be alphabet members.
 *
 * @example
 * ```typescript
 * const alphabet = new Alphabet('ABCDEFGHIJKLMNOPQRSTUVWXYZ');
 * alphabet.toIndex('C'); // 2
 * alphabet.toSymbol(25); // 'Z'
 * ```
 */

import { CipherError, CipherErrorCode } from '../utils/cipher-error';

export const DEFAULT_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

const RESERVED_SYMBOL = /[()*\s]/;

export class Alphabet {
  private readonly chars: readonly string[];
  private readonly indices: ReadonlyMap<string, number>;

  /**
   * @param symbols - The symbols in index order
   * @throws {CipherError} MALFORMED_ALPHABET if empty, repeating or reserved
   */
  constructor(symbols: string = DEFAULT_ALPHABET) {
    const chars = Array.from(symbols);
    if (chars.length === 0) {
      throw new CipherError(
        CipherErrorCode.MALFORMED_ALPHABET,
        'Alphabet must contain at least one symbol'
      );
    }

    const indices = new Map<string, number>();
    chars.forEach((symbol, index) => {
      if (RESERVED_SYMBOL.test(symbol)) {
        throw new CipherError(
          CipherErrorCode.MALFORMED_ALPHABET,
          `Alphabet may not contain reserved character ${JSON.stringify(symbol)}`,
          { symbol }
        );
      }
      if (indices.has(symbol)) {
        throw new CipherError(
          CipherErrorCode.MALFORMED_ALPHABET,
          `Alphabet repeats symbol '${symbol}'`,
          { symbol }
        );
      }
      indices.set(symbol, index);
    });

    this.chars = chars;
    this.indices = indices;
  }

  size(): number {
    return this.chars.length;
  }

  contains(symbol: string): boolean {
    return this.indices.has(symbol);
  }

  /**
   * The symbols in index order, as one string.
   */
  symbols(): string {
    return this.chars.join('');
  }

  /**
   * @throws {CipherError} INVALID_SYMBOL if the symbol is not a member
   */
  toIndex(symbol: string): number {
    const index = this.indices.get(symbol);
    if (index === undefined) {
      throw new CipherError(
        CipherErrorCode.INVALID_SYMBOL,
        `Symbol ${JSON.stringify(symbol)} is not in the alphabet`,
        { symbol, alphabet: this.symbols() }
      );
    }
    return index;
  }

  /**
   * Index to symbol. The index is not reduced modulo the size.
   *
   * @throws {CipherError} INDEX_OUT_OF_RANGE unless 0 <= index < size
   */
  toSymbol(index: number): string {
    this.checkIndex(index);
    return this.chars[index];
  }

  /**
   * @throws {CipherError} INDEX_OUT_OF_RANGE unless index is an integer in [0, size)
   */
  checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.chars.length) {
      throw new CipherError(
        CipherErrorCode.INDEX_OUT_OF_RANGE,
        `Index ${index} is outside [0, ${this.chars.length})`,
        { index, size: this.chars.length }
      );
    }
  }

  equals(other: Alphabet): boolean {
    return other === this || other.symbols() === this.symbols();
  }
}
