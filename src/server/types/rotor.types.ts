/**
 * Type definitions for rotor templates and machine catalogs.
 *
 * A rotor template is immutable catalog data. Machines never mutate
 * templates: each Machine binds its own Rotor instance (template + setting)
 * per slot, so two Machines built from one catalog share nothing mutable.
 */

import type { Alphabet } from '../services/alphabet.service';
import type { Permutation } from '../services/permutation.service';

/**
 * Rotor variant tag.
 * - fixed: never advances
 * - moving: advances when driven by a pawl and carries notches
 * - reflector: never advances and only accepts setting 0
 */
export type RotorKind = 'fixed' | 'moving' | 'reflector';

interface RotorTemplateBase {
  /** Identifier, unique within a catalog */
  readonly name: string;
  /** Wiring at setting 0 */
  readonly permutation: Permutation;
}

export interface FixedRotorTemplate extends RotorTemplateBase {
  readonly kind: 'fixed';
}

export interface MovingRotorTemplate extends RotorTemplateBase {
  readonly kind: 'moving';
  /** Symbols at which this rotor is at its notch */
  readonly notches: ReadonlySet<string>;
}

export interface ReflectorTemplate extends RotorTemplateBase {
  readonly kind: 'reflector';
}

export type RotorTemplate =
  | FixedRotorTemplate
  | MovingRotorTemplate
  | ReflectorTemplate;

/**
 * Immutable mapping from rotor name to template.
 */
export type RotorCatalog = ReadonlyMap<string, RotorTemplate>;

/**
 * Everything a catalog provider hands to the machine: the alphabet, the
 * slot and pawl counts, and the available rotors.
 *
 * @example
 * {
 *   alphabet: new Alphabet('ABCDEFGHIJKLMNOPQRSTUVWXYZ'),
 *   numRotors: 5,
 *   pawls: 3,
 *   rotors: new Map([['I', movingRotor('I', perm, 'Q')], ...])
 * }
 */
export interface MachineConfig {
  readonly alphabet: Alphabet;
  readonly numRotors: number;
  readonly pawls: number;
  readonly rotors: RotorCatalog;
}

/**
 * One converted symbol, as seen by a trace sink.
 */
export interface ConversionTrace {
  /** Settings of slots 1..numRotors-1 after stepping */
  settings: string;
  /** Input symbol */
  input: string;
  /** Symbol after the first plugboard pass */
  plugboardIn: string;
  /** Symbol after the rotor stack */
  rotorsOut: string;
  /** Output symbol after the second plugboard pass */
  output: string;
}

/**
 * Receives one record per converted symbol. Must not throw.
 */
export type MachineTraceSink = (trace: ConversionTrace) => void;
