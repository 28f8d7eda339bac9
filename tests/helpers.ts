import path from 'path';
import { expect } from 'vitest';
import { loadMachineConfig } from '../src/server/services/catalog.service';
import type { MachineConfig } from '../src/server/types/rotor.types';
import { CipherError, CipherErrorCode } from '../src/server/utils/cipher-error';

export const CATALOG_YAML = path.resolve(__dirname, '../config/catalog.yaml');
export const CATALOG_CONF = path.resolve(__dirname, '../config/default.conf');
export const FIXTURES = path.resolve(__dirname, 'fixtures');

/**
 * Loads the bundled M4 catalog without writing the load record.
 */
export function loadTestCatalog(file: string = CATALOG_YAML): MachineConfig {
  return loadMachineConfig(file, () => undefined);
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export function expectCipherError(
  fn: () => unknown,
  code: CipherErrorCode
): CipherError {
  const error = captureError(fn);
  expect(error).toBeInstanceOf(CipherError);
  expect(error).toMatchObject({ code });
  if (!(error instanceof CipherError)) {
    throw error;
  }
  return error;
}
