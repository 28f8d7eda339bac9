import { describe, it, expect } from 'vitest';
import { Alphabet } from '../src/server/services/alphabet.service';
import { Permutation } from '../src/server/services/permutation.service';
import {
  Rotor,
  fixedRotor,
  movingRotor,
  reflector,
} from '../src/server/services/rotor.service';
import { CipherErrorCode } from '../src/server/utils/cipher-error';
import { expectCipherError } from './helpers';

/**
 * Unit tests for rotor templates and bound rotors
 *
 * These tests verify:
 * - Conversion at setting 0 and at an offset
 * - Stepping and notch detection per variant
 * - Reflectors refusing any setting but 0
 * - Rotor instances not sharing settings
 */

describe('Rotor', () => {
  const alphabet = new Alphabet();
  const wiringI = Permutation.fromCycles(
    '(AELTPHQXRU) (BKNW) (CMOY) (DFG) (IV) (JZ) (S)',
    alphabet
  );
  const wiringB = Permutation.fromCycles(
    '(AE) (BN) (CK) (DQ) (FU) (GY) (HW) (IJ) (LO) (MP) (RX) (SZ) (TV)',
    alphabet
  );
  const rotorI = movingRotor('I', wiringI, 'Q');

  describe('templates', () => {
    it('should tag each variant', () => {
      expect(rotorI.kind).toBe('moving');
      expect(fixedRotor('Beta', wiringI).kind).toBe('fixed');
      expect(reflector('B', wiringB).kind).toBe('reflector');
    });

    it('should reject notches outside the alphabet', () => {
      expectCipherError(
        () => movingRotor('X', wiringI, 'Q1'),
        CipherErrorCode.INVALID_SYMBOL
      );
    });

    it('should report capabilities', () => {
      const moving = new Rotor(rotorI);
      const fixed = new Rotor(fixedRotor('Beta', wiringI));
      const refl = new Rotor(reflector('B', wiringB));
      expect([moving.rotates(), moving.reflecting()]).toEqual([true, false]);
      expect([fixed.rotates(), fixed.reflecting()]).toEqual([false, false]);
      expect([refl.rotates(), refl.reflecting()]).toEqual([false, true]);
    });
  });

  describe('conversion', () => {
    it('should apply the wiring at setting 0', () => {
      const rotor = new Rotor(rotorI);
      expect(alphabet.toSymbol(rotor.convertForward(0))).toBe('E');
      expect(alphabet.toSymbol(rotor.convertBackward(0))).toBe('U');
    });

    it('should offset by the setting', () => {
      const rotor = new Rotor(rotorI);
      rotor.setSymbol('B');
      expect(alphabet.toSymbol(rotor.convertForward(0))).toBe('J');
      expect(alphabet.toSymbol(rotor.convertBackward(0))).toBe('V');
      expect(alphabet.toSymbol(rotor.convertForward(25))).toBe('D');
    });

    it('should round-trip at every setting', () => {
      const rotor = new Rotor(rotorI);
      for (let posn = 0; posn < 26; posn++) {
        rotor.set(posn);
        for (let i = 0; i < 26; i++) {
          expect(rotor.convertBackward(rotor.convertForward(i))).toBe(i);
        }
      }
    });

    it('should reject indices outside the alphabet', () => {
      const rotor = new Rotor(rotorI);
      expectCipherError(() => rotor.convertForward(26), CipherErrorCode.INDEX_OUT_OF_RANGE);
      expectCipherError(() => rotor.convertBackward(-1), CipherErrorCode.INDEX_OUT_OF_RANGE);
    });
  });

  describe('stepping', () => {
    it('should advance moving rotors and wrap around', () => {
      const rotor = new Rotor(rotorI);
      rotor.setSymbol('Z');
      rotor.advance();
      expect(rotor.setting()).toBe(0);
    });

    it('should be at its notch only at notch symbols', () => {
      const rotor = new Rotor(rotorI);
      rotor.setSymbol('P');
      expect(rotor.atNotch()).toBe(false);
      rotor.advance();
      expect(rotor.atNotch()).toBe(true);
      rotor.advance();
      expect(rotor.atNotch()).toBe(false);
    });

    it('should support several notches', () => {
      const rotor = new Rotor(movingRotor('VI', wiringI, 'ZM'));
      rotor.setSymbol('M');
      expect(rotor.atNotch()).toBe(true);
      rotor.setSymbol('Z');
      expect(rotor.atNotch()).toBe(true);
      rotor.setSymbol('N');
      expect(rotor.atNotch()).toBe(false);
    });

    it('should keep fixed rotors and reflectors in place', () => {
      const fixed = new Rotor(fixedRotor('Beta', wiringI));
      fixed.setSymbol('C');
      fixed.advance();
      expect(fixed.setting()).toBe(2);
      expect(fixed.atNotch()).toBe(false);

      const refl = new Rotor(reflector('B', wiringB));
      refl.advance();
      expect(refl.setting()).toBe(0);
      expect(refl.atNotch()).toBe(false);
    });
  });

  describe('set', () => {
    it('should reject settings outside the alphabet', () => {
      const rotor = new Rotor(rotorI);
      expectCipherError(() => rotor.set(26), CipherErrorCode.INDEX_OUT_OF_RANGE);
      expect(rotor.canSet(26)).toBe(false);
      expect(rotor.setting()).toBe(0);
    });

    it('should only allow reflectors at setting 0', () => {
      const refl = new Rotor(reflector('B', wiringB));
      expect(refl.canSet(0)).toBe(true);
      expect(refl.canSet(1)).toBe(false);
      expect(() => refl.set(0)).not.toThrow();
      const error = expectCipherError(
        () => refl.set(1),
        CipherErrorCode.INVALID_OPERATION
      );
      expect(error.message).toBe('Reflector B has only one position');
      expect(refl.setting()).toBe(0);
    });

    it('should keep settings per instance', () => {
      const first = new Rotor(rotorI);
      const second = new Rotor(rotorI);
      first.setSymbol('K');
      expect(first.setting()).toBe(10);
      expect(second.setting()).toBe(0);
    });
  });
});
