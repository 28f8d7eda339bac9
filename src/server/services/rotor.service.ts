/**
 * Rotor templates and bound rotors.
 *
 * Templates are built with `fixedRotor`, `movingRotor` and `reflector` and
 * live in an immutable catalog. A `Rotor` binds one template to a mutable
 * setting and dispatches the variant-specific behaviour (set, advance,
 * atNotch) on the template's `kind`.
 *
 * Conversion at setting s over an alphabet of size n:
 *   forward(i)  = (permute((i + s) mod n) - s) mod n
 *   backward(i) = (invert((i + s) mod n) - s) mod n
 */

import type { Alphabet } from './alphabet.service';
import type { Permutation } from './permutation.service';
import type {
  FixedRotorTemplate,
  MovingRotorTemplate,
  ReflectorTemplate,
  RotorKind,
  RotorTemplate,
} from '../types/rotor.types';
import { CipherError, CipherErrorCode } from '../utils/cipher-error';

export function fixedRotor(
  name: string,
  permutation: Permutation
): FixedRotorTemplate {
  return { kind: 'fixed', name, permutation };
}

/**
 * @param notches - Notch symbols, e.g. 'Q' or 'ZM'
 * @throws {CipherError} INVALID_SYMBOL if a notch is not in the alphabet
 */
export function movingRotor(
  name: string,
  permutation: Permutation,
  notches: string
): MovingRotorTemplate {
  const alphabet = permutation.alphabet();
  const notchSet = new Set<string>();
  for (const symbol of notches) {
    alphabet.toIndex(symbol);
    notchSet.add(symbol);
  }
  return { kind: 'moving', name, permutation, notches: notchSet };
}

export function reflector(
  name: string,
  permutation: Permutation
): ReflectorTemplate {
  return { kind: 'reflector', name, permutation };
}

/**
 * A rotor template bound to a rotational setting.
 */
export class Rotor {
  private posn = 0;

  constructor(readonly template: RotorTemplate) {}

  name(): string {
    return this.template.name;
  }

  kind(): RotorKind {
    return this.template.kind;
  }

  alphabet(): Alphabet {
    return this.template.permutation.alphabet();
  }

  size(): number {
    return this.template.permutation.size();
  }

  setting(): number {
    return this.posn;
  }

  /**
   * True iff this rotor can be driven by a pawl.
   */
  rotates(): boolean {
    return this.template.kind === 'moving';
  }

  reflecting(): boolean {
    return this.template.kind === 'reflector';
  }

  /**
   * Whether `set(posn)` would succeed.
   */
  canSet(posn: number): boolean {
    if (!Number.isInteger(posn) || posn < 0 || posn >= this.size()) {
      return false;
    }
    return this.template.kind !== 'reflector' || posn === 0;
  }

  /**
   * @throws {CipherError} INDEX_OUT_OF_RANGE if posn is not a valid index
   * @throws {CipherError} INVALID_OPERATION if a reflector is set to anything but 0
   */
  set(posn: number): void {
    this.alphabet().checkIndex(posn);
    switch (this.template.kind) {
      case 'reflector':
        if (posn !== 0) {
          throw new CipherError(
            CipherErrorCode.INVALID_OPERATION,
            `Reflector ${this.template.name} has only one position`,
            { rotor: this.template.name, posn }
          );
        }
        break;
      case 'fixed':
      case 'moving':
        break;
    }
    this.posn = posn;
  }

  setSymbol(symbol: string): void {
    this.set(this.alphabet().toIndex(symbol));
  }

  atNotch(): boolean {
    switch (this.template.kind) {
      case 'moving':
        return this.template.notches.has(this.alphabet().toSymbol(this.posn));
      case 'fixed':
      case 'reflector':
        return false;
    }
  }

  /**
   * Moving rotors step by one position; the other variants stay put.
   */
  advance(): void {
    switch (this.template.kind) {
      case 'moving':
        this.posn = (this.posn + 1) % this.size();
        break;
      case 'fixed':
      case 'reflector':
        break;
    }
  }

  convertForward(index: number): number {
    this.alphabet().checkIndex(index);
    const size = this.size();
    const contact = this.template.permutation.permute(
      wrap(index + this.posn, size)
    );
    return wrap(contact - this.posn, size);
  }

  convertBackward(index: number): number {
    this.alphabet().checkIndex(index);
    const size = this.size();
    const contact = this.template.permutation.invert(
      wrap(index + this.posn, size)
    );
    return wrap(contact - this.posn, size);
  }
}

function wrap(value: number, size: number): number {
  const r = value % size;
  return r < 0 ? r + size : r;
}
