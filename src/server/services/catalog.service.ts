/**
 * Catalog Service - builds machine configurations from catalog files
 *
 * Two formats are understood:
 *
 * Classic text format (.conf):
 * ```
 * ABCDEFGHIJKLMNOPQRSTUVWXYZ
 * 5 3
 *  I MQ      (AELTPHQXRU) (BKNW) (CMOY) (DFG) (IV) (JZ) (S)
 *  Beta N    (ALBEVFCYODJWUGNMQTZSKPR) (HIX)
 *  B R       (AE) (BN) (CK) (DQ) (FU) (GY) (HW) (IJ) (LO) (MP)
 *            (RX) (SZ) (TV)
 * ```
 * The alphabet, then the slot and pawl counts, then rotors as
 * whitespace-separated tokens: name, type (M + notches, N, or R), cycles.
 * A rotor's cycles may run on over several lines.
 *
 * YAML format (.yaml / .yml):
 * ```yaml
 * alphabet: ABCDEFGHIJKLMNOPQRSTUVWXYZ
 * slots: 5
 * pawls: 3
 * rotors:
 *   - { name: I, type: moving, notches: Q, cycles: "(AELTPHQXRU) (BKNW) ..." }
 * ```
 *
 * Both produce an immutable MachineConfig; `createMachine` turns it into a
 * Machine with its own rotor instances.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { Alphabet } from './alphabet.service';
import { Machine, MachineOptions } from './machine.service';
import { Permutation } from './permutation.service';
import { fixedRotor, movingRotor, reflector } from './rotor.service';
import type {
  MachineConfig,
  RotorKind,
  RotorTemplate,
} from '../types/rotor.types';
import { CipherError, CipherErrorCode } from '../utils/cipher-error';

const CYCLE_TOKEN = /^\(.*\)$/;
const COUNT_TOKEN = /^\d+$/;

/**
 * Public description of a catalog, as served by GET /api/catalog.
 */
export interface CatalogSummary {
  alphabet: string;
  slots: number;
  pawls: number;
  rotors: Array<{ name: string; type: RotorKind; notches: string }>;
}

function invalid(
  message: string,
  details: Record<string, unknown> = {}
): CipherError {
  return new CipherError(
    CipherErrorCode.INVALID_CONFIGURATION,
    message,
    details
  );
}

/**
 * Builds one template, rejecting reflectors with fixed points.
 */
function buildTemplate(
  name: string,
  kind: RotorKind,
  notches: string,
  cycles: string,
  alphabet: Alphabet
): RotorTemplate {
  const permutation = Permutation.fromCycles(cycles, alphabet);
  switch (kind) {
    case 'moving':
      return movingRotor(name, permutation, notches);
    case 'fixed':
      return fixedRotor(name, permutation);
    case 'reflector':
      if (!permutation.derangement()) {
        throw invalid(`Reflector ${name} must map every symbol elsewhere`, {
          rotor: name,
        });
      }
      return reflector(name, permutation);
  }
}

function buildConfig(
  alphabet: Alphabet,
  numRotors: number,
  pawls: number,
  templates: RotorTemplate[]
): MachineConfig {
  if (!Number.isInteger(numRotors) || numRotors < 2) {
    throw invalid(`Slot count must be an integer of at least 2`, {
      slots: numRotors,
    });
  }
  if (!Number.isInteger(pawls) || pawls < 0 || pawls >= numRotors) {
    throw invalid(`Pawl count must satisfy 0 <= pawls < ${numRotors}`, {
      pawls,
    });
  }

  const rotors = new Map<string, RotorTemplate>();
  for (const template of templates) {
    if (rotors.has(template.name)) {
      throw invalid(`Rotor ${template.name} is defined more than once`, {
        rotor: template.name,
      });
    }
    rotors.set(template.name, template);
  }

  return { alphabet, numRotors, pawls, rotors };
}

/**
 * Parses the classic text catalog format.
 *
 * @throws {CipherError} INVALID_CONFIGURATION for structural problems;
 *   MALFORMED_ALPHABET, MALFORMED_CYCLE or INVALID_SYMBOL from the
 *   constructors underneath
 */
export function parseConfText(text: string): MachineConfig {
  const tokens = text.split(/\s+/).filter(token => token.length > 0);
  if (tokens.length < 3) {
    throw invalid(
      'Catalog must start with an alphabet and the slot and pawl counts'
    );
  }

  const [alphabetToken, slotsToken, pawlsToken] = tokens;
  const alphabet = new Alphabet(alphabetToken);
  if (!COUNT_TOKEN.test(slotsToken) || !COUNT_TOKEN.test(pawlsToken)) {
    throw invalid('Slot and pawl counts must be non-negative integers', {
      slots: slotsToken,
      pawls: pawlsToken,
    });
  }

  const templates: RotorTemplate[] = [];
  let i = 3;
  while (i < tokens.length) {
    const name = tokens[i];
    const typeToken = tokens[i + 1];
    if (CYCLE_TOKEN.test(name)) {
      throw invalid(`Expected a rotor name, found cycle ${name}`);
    }
    if (typeToken === undefined) {
      throw invalid(`Rotor ${name} is missing its type`, { rotor: name });
    }

    i += 2;
    const cycles: string[] = [];
    while (i < tokens.length && CYCLE_TOKEN.test(tokens[i])) {
      cycles.push(tokens[i]);
      i++;
    }

    const { kind, notches } = parseTypeToken(name, typeToken);
    templates.push(
      buildTemplate(name, kind, notches, cycles.join(' '), alphabet)
    );
  }

  return buildConfig(
    alphabet,
    Number.parseInt(slotsToken, 10),
    Number.parseInt(pawlsToken, 10),
    templates
  );
}

function parseTypeToken(
  name: string,
  token: string
): { kind: RotorKind; notches: string } {
  const tag = token.charAt(0);
  const rest = token.slice(1);
  if (tag === 'M') {
    return { kind: 'moving', notches: rest };
  }
  if ((tag === 'N' || tag === 'R') && rest.length === 0) {
    return { kind: tag === 'N' ? 'fixed' : 'reflector', notches: '' };
  }
  throw invalid(`Rotor ${name} has invalid type ${token}`, {
    rotor: name,
    type: token,
  });
}

const YAML_TYPES: Record<string, RotorKind> = {
  moving: 'moving',
  fixed: 'fixed',
  reflector: 'reflector',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(
  record: Record<string, unknown>,
  key: string,
  where: string
): string {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw invalid(`${where}: '${key}' must be a string`, {
    field: key,
    received: value,
  });
}

function requireInteger(
  record: Record<string, unknown>,
  key: string
): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw invalid(`Catalog '${key}' must be an integer`, {
      field: key,
      received: value,
    });
  }
  return value;
}

/**
 * Parses the YAML catalog format.
 *
 * @throws {CipherError} INVALID_CONFIGURATION for structural problems
 */
export function parseYamlCatalog(text: string): MachineConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw invalid('Catalog is not valid YAML', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (!isRecord(document)) {
    throw invalid('Catalog must be a YAML mapping');
  }

  const alphabet = new Alphabet(requireString(document, 'alphabet', 'Catalog'));
  const numRotors = requireInteger(document, 'slots');
  const pawls = requireInteger(document, 'pawls');

  const entries = document.rotors;
  if (!Array.isArray(entries)) {
    throw invalid("Catalog 'rotors' must be a list");
  }

  const templates = entries.map((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      throw invalid(`Rotor entry ${index} must be a mapping`, { index });
    }
    const name = requireString(entry, 'name', `Rotor entry ${index}`);
    const typeName = requireString(entry, 'type', `Rotor ${name}`);
    const kind = YAML_TYPES[typeName];
    if (kind === undefined) {
      throw invalid(`Rotor ${name} has invalid type ${typeName}`, {
        rotor: name,
        type: typeName,
      });
    }
    const notches =
      entry.notches === undefined
        ? ''
        : requireString(entry, 'notches', `Rotor ${name}`);
    if (kind !== 'moving' && notches.length > 0) {
      throw invalid(`Only moving rotors have notches (rotor ${name})`, {
        rotor: name,
      });
    }
    const cycles =
      entry.cycles === undefined
        ? ''
        : requireString(entry, 'cycles', `Rotor ${name}`);
    return buildTemplate(name, kind, notches, cycles, alphabet);
  });

  return buildConfig(alphabet, numRotors, pawls, templates);
}

/**
 * Reads a catalog file, choosing the parser by extension: .yaml and .yml
 * are YAML, anything else the classic text format.
 *
 * @param filePath - Absolute path, or relative to process.cwd()
 * @param log - Receives the JSON load record (stdout by default)
 * @throws {CipherError} INVALID_CONFIGURATION if the file cannot be read
 */
export function loadMachineConfig(
  filePath: string,
  log: (line: string) => void = line => console.log(line)
): MachineConfig {
  const resolved = path.resolve(process.cwd(), filePath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw invalid(`Cannot read catalog file ${resolved}`, {
      path: resolved,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const extension = path.extname(resolved).toLowerCase();
  const config =
    extension === '.yaml' || extension === '.yml'
      ? parseYamlCatalog(text)
      : parseConfText(text);

  log(
    JSON.stringify({
      operation: 'loadMachineConfig',
      path: resolved,
      slots: config.numRotors,
      pawls: config.pawls,
      rotors: config.rotors.size,
      timestamp: new Date().toISOString(),
    })
  );

  return config;
}

export function createMachine(
  config: MachineConfig,
  options: MachineOptions = {}
): Machine {
  return new Machine(
    config.alphabet,
    config.numRotors,
    config.pawls,
    config.rotors,
    options
  );
}

/**
 * Checks that a rotor arrangement is one the physical machine could hold:
 * - exactly numRotors names
 * - a reflector in slot 0 and nowhere else
 * - no rotor used twice
 * - moving rotors only in the rightmost `pawls` slots
 *
 * @throws {CipherError} UNKNOWN_ROTOR_NAME or INVALID_CONFIGURATION
 */
export function validateArrangement(
  config: MachineConfig,
  names: readonly string[]
): void {
  if (names.length !== config.numRotors) {
    throw invalid(
      `Expected ${config.numRotors} rotors, got ${names.length}`,
      { expected: config.numRotors, received: names.length }
    );
  }

  const firstMovingSlot = config.numRotors - config.pawls;
  const used = new Set<string>();
  names.forEach((name, slot) => {
    const template = config.rotors.get(name);
    if (template === undefined) {
      throw new CipherError(
        CipherErrorCode.UNKNOWN_ROTOR_NAME,
        `Unknown rotor name: ${name}`,
        { name }
      );
    }
    if (used.has(name)) {
      throw invalid(`Rotor ${name} is used more than once`, { rotor: name });
    }
    used.add(name);

    if (slot === 0 && template.kind !== 'reflector') {
      throw invalid(`First rotor must be a reflector, got ${name}`, {
        rotor: name,
      });
    }
    if (slot > 0 && template.kind === 'reflector') {
      throw invalid(`Reflector ${name} may only sit in the first slot`, {
        rotor: name,
        slot,
      });
    }
    if (template.kind === 'moving' && slot < firstMovingSlot) {
      throw invalid(
        `Moving rotor ${name} must be in one of the rightmost ${config.pawls} slots`,
        { rotor: name, slot }
      );
    }
  });
}

export function describeCatalog(config: MachineConfig): CatalogSummary {
  return {
    alphabet: config.alphabet.symbols(),
    slots: config.numRotors,
    pawls: config.pawls,
    rotors: [...config.rotors.values()].map(template => ({
      name: template.name,
      type: template.kind,
      notches:
        template.kind === 'moving' ? [...template.notches].join('') : '',
    })),
  };
}
