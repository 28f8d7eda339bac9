/**
 * Machine - the rotor cipher engine.
 *
 * Owns numRotors ordered slots (slot 0 is the reflector, slot numRotors-1
 * the fastest rotor), a pawl count, and a plugboard. Each symbol converted:
 * 1. Steps the rotors (see `step`)
 * 2. Passes through the plugboard
 * 3. Passes right-to-left through every slot including the reflector, then
 *    left-to-right back through slots 1..numRotors-1
 * 4. Passes through the plugboard again
 *
 * Rotors are bound per Machine from immutable catalog templates, so one
 * catalog can back any number of Machines without shared state.
 *
 * Every public operation validates its input completely before mutating
 * anything: a failed call leaves slots, settings and plugboard as they were.
 *
 * @example
 * ```typescript
 * const machine = new Machine(alphabet, 5, 3, catalog);
 * machine.insertRotors(['B', 'Beta', 'I', 'II', 'III']);
 * machine.setRotors('AAAA');
 * machine.convert('AAAAA'); // 'BDZGO'
 * ```
 */

import { Alphabet } from './alphabet.service';
import { Permutation } from './permutation.service';
import { Rotor } from './rotor.service';
import type { MachineTraceSink, RotorCatalog } from '../types/rotor.types';
import { CipherError, CipherErrorCode } from '../utils/cipher-error';

export interface MachineOptions {
  /** Receives one record per converted symbol */
  trace?: MachineTraceSink;
}

export class Machine {
  private readonly slots: Array<Rotor | undefined>;
  private board: Permutation;
  private readonly trace?: MachineTraceSink;

  /**
   * @param alpha - Alphabet shared by every rotor
   * @param rotorCount - Number of slots, at least 2
   * @param pawls - Number of rightmost slots that can advance, 0 <= pawls < rotorCount
   * @param catalog - Available rotor templates, by name
   * @throws {CipherError} INVALID_CONFIGURATION on bad counts or a foreign-alphabet rotor
   */
  constructor(
    private readonly alpha: Alphabet,
    private readonly rotorCount: number,
    private readonly pawls: number,
    private readonly catalog: RotorCatalog,
    options: MachineOptions = {}
  ) {
    if (!Number.isInteger(rotorCount) || rotorCount < 2) {
      throw new CipherError(
        CipherErrorCode.INVALID_CONFIGURATION,
        `Machine needs at least 2 rotor slots, got ${rotorCount}`,
        { numRotors: rotorCount }
      );
    }
    if (!Number.isInteger(pawls) || pawls < 0 || pawls >= rotorCount) {
      throw new CipherError(
        CipherErrorCode.INVALID_CONFIGURATION,
        `Pawl count must satisfy 0 <= pawls < ${rotorCount}, got ${pawls}`,
        { numRotors: rotorCount, pawls }
      );
    }
    for (const template of catalog.values()) {
      if (!template.permutation.alphabet().equals(alpha)) {
        throw new CipherError(
          CipherErrorCode.INVALID_CONFIGURATION,
          `Rotor ${template.name} is defined over a different alphabet`,
          { rotor: template.name }
        );
      }
    }

    this.slots = new Array<Rotor | undefined>(rotorCount).fill(undefined);
    this.board = Permutation.identity(alpha);
    this.trace = options.trace;
  }

  numRotors(): number {
    return this.rotorCount;
  }

  numPawls(): number {
    return this.pawls;
  }

  alphabet(): Alphabet {
    return this.alpha;
  }

  plugboard(): Permutation {
    return this.board;
  }

  /**
   * The rotor in slot k; slot 0 holds the reflector.
   *
   * @throws {CipherError} INDEX_OUT_OF_RANGE for a bad slot number
   * @throws {CipherError} INVALID_OPERATION if the slot is empty
   */
  getRotor(k: number): Rotor {
    if (!Number.isInteger(k) || k < 0 || k >= this.rotorCount) {
      throw new CipherError(
        CipherErrorCode.INDEX_OUT_OF_RANGE,
        `Slot ${k} is outside [0, ${this.rotorCount})`,
        { slot: k }
      );
    }
    const rotor = this.slots[k];
    if (rotor === undefined) {
      throw new CipherError(
        CipherErrorCode.INVALID_OPERATION,
        `Slot ${k} is empty; insert rotors first`,
        { slot: k }
      );
    }
    return rotor;
  }

  /**
   * Binds fresh rotors, each at setting 0, into the slots in order.
   * Slot position constraints are not checked here; see
   * `validateArrangement` in the catalog service.
   *
   * @param names - Exactly numRotors names, the reflector first
   * @throws {CipherError} INVALID_LENGTH if the name count is wrong
   * @throws {CipherError} UNKNOWN_ROTOR_NAME if a name is not in the catalog
   */
  insertRotors(names: readonly string[]): void {
    if (names.length !== this.rotorCount) {
      throw new CipherError(
        CipherErrorCode.INVALID_LENGTH,
        `Expected ${this.rotorCount} rotor names, got ${names.length}`,
        { expected: this.rotorCount, received: names.length }
      );
    }

    const templates = names.map(name => {
      const template = this.catalog.get(name);
      if (template === undefined) {
        throw new CipherError(
          CipherErrorCode.UNKNOWN_ROTOR_NAME,
          `Unknown rotor name: ${name}`,
          { name, available: [...this.catalog.keys()] }
        );
      }
      return template;
    });

    templates.forEach((template, slot) => {
      this.slots[slot] = new Rotor(template);
    });
  }

  /**
   * Sets slots 1..numRotors-1 from a string of numRotors-1 symbols; the first
   * symbol sets the leftmost rotor after the reflector.
   *
   * @throws {CipherError} INVALID_LENGTH if the setting has the wrong length
   * @throws {CipherError} INVALID_SYMBOL if a symbol is not in the alphabet
   * @throws {CipherError} INVALID_OPERATION if rotors are missing or a rotor
   *   cannot take its position
   */
  setRotors(setting: string): void {
    const symbols = Array.from(setting);
    if (symbols.length !== this.rotorCount - 1) {
      throw new CipherError(
        CipherErrorCode.INVALID_LENGTH,
        `Setting must be ${this.rotorCount - 1} symbols long, got ${symbols.length}`,
        { expected: this.rotorCount - 1, received: setting }
      );
    }

    const positions = symbols.map(symbol => this.alpha.toIndex(symbol));
    const rotors = this.boundRotors();
    positions.forEach((posn, i) => {
      const rotor = rotors[i + 1];
      if (!rotor.canSet(posn)) {
        throw new CipherError(
          CipherErrorCode.INVALID_OPERATION,
          `Rotor ${rotor.name()} cannot be set to ${symbols[i]}`,
          { rotor: rotor.name(), setting: symbols[i] }
        );
      }
    });

    positions.forEach((posn, i) => rotors[i + 1].set(posn));
  }

  /**
   * Replaces the plugboard.
   *
   * @throws {CipherError} INVALID_OPERATION if the permutation uses another
   *   alphabet or is not an involution
   */
  setPlugboard(plugboard: Permutation): void {
    if (!plugboard.alphabet().equals(this.alpha)) {
      throw new CipherError(
        CipherErrorCode.INVALID_OPERATION,
        'Plugboard must use the machine alphabet',
        { plugboard: plugboard.toString() }
      );
    }
    if (!plugboard.isInvolution()) {
      throw new CipherError(
        CipherErrorCode.INVALID_OPERATION,
        'Plugboard must consist of swaps only',
        { plugboard: plugboard.toString() }
      );
    }
    this.board = plugboard;
  }

  /**
   * Current settings of slots 1..numRotors-1, in the form setRotors takes.
   */
  settings(): string {
    return this.boundRotors()
      .slice(1)
      .map(rotor => this.alpha.toSymbol(rotor.setting()))
      .join('');
  }

  /**
   * Converts one index, or a whole message, after stepping the rotors once
   * per symbol. Conversion is stateful: repeated calls continue from the
   * settings the previous call left.
   *
   * @throws {CipherError} INDEX_OUT_OF_RANGE / INVALID_SYMBOL on bad input
   * @throws {CipherError} INVALID_OPERATION if rotors have not been inserted
   */
  convert(index: number): number;
  convert(message: string): string;
  convert(input: number | string): number | string {
    if (typeof input === 'number') {
      this.alpha.checkIndex(input);
      return this.convertIndex(input, this.boundRotors());
    }

    const indices = Array.from(input, symbol => this.alpha.toIndex(symbol));
    const rotors = this.boundRotors();
    const output = new Array<string>(indices.length);
    indices.forEach((index, i) => {
      output[i] = this.alpha.toSymbol(this.convertIndex(index, rotors));
    });
    return output.join('');
  }

  private convertIndex(c: number, rotors: readonly Rotor[]): number {
    this.step(rotors);
    const input = c;
    const plugboardIn = this.board.permute(c);
    const rotorsOut = this.applyRotors(plugboardIn, rotors);
    const output = this.board.permute(rotorsOut);

    if (this.trace) {
      this.trace({
        settings: this.settings(),
        input: this.alpha.toSymbol(input),
        plugboardIn: this.alpha.toSymbol(plugboardIn),
        rotorsOut: this.alpha.toSymbol(rotorsOut),
        output: this.alpha.toSymbol(output),
      });
    }

    return output;
  }

  /**
   * Advances the rotors for one keypress.
   *
   * Walks the pawl-driven slots left of the fast rotor. A slot advances when
   * its right neighbour is at a notch, and that neighbour is then flagged to
   * advance on the next iteration too: the double-step of the historical
   * machine, where the middle rotor moves on two consecutive keypresses.
   * The flag reaches one slot only. The fast rotor always advances.
   */
  private step(rotors: readonly Rotor[]): void {
    let pending = false;
    for (let i = this.rotorCount - this.pawls; i < this.rotorCount - 1; i++) {
      if (rotors[i + 1].atNotch()) {
        rotors[i].advance();
        pending = true;
      } else if (pending) {
        rotors[i].advance();
        pending = false;
      }
    }
    rotors[this.rotorCount - 1].advance();
  }

  private applyRotors(c: number, rotors: readonly Rotor[]): number {
    let result = c;
    for (let i = this.rotorCount - 1; i >= 0; i--) {
      result = rotors[i].convertForward(result);
    }
    for (let i = 1; i < this.rotorCount; i++) {
      result = rotors[i].convertBackward(result);
    }
    return result;
  }

  /**
   * @throws {CipherError} INVALID_OPERATION if any slot is empty
   */
  private boundRotors(): Rotor[] {
    return this.slots.map((_, slot) => this.getRotor(slot));
  }
}
