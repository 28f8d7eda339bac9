/**
 * Transcript Service - settings lines, message lines and output formatting
 *
 * A transcript is a sequence of lines. A line starting with '*' configures
 * the machine:
 *
 *   * B Beta III IV I AXLE (YF) (ZH)
 *
 * i.e. the reflector and the other rotors left to right, the initial setting
 * of every rotor after the reflector, and optional plugboard swaps. Every
 * other line is a message: its whitespace is dropped (and letters upper-cased
 * for an upper-case alphabet), it is converted with
 * the current machine, and the result is written in groups of five.
 * Blank lines come out blank.
 *
 * Each settings line builds a fresh Machine from the immutable catalog.
 */

import { Machine, MachineOptions } from './machine.service';
import { Permutation } from './permutation.service';
import { createMachine, validateArrangement } from './catalog.service';
import type { MachineConfig } from '../types/rotor.types';
import { CipherError, CipherErrorCode } from '../utils/cipher-error';

const SETTINGS_MARKER = '*';
const DEFAULT_GROUP_SIZE = 5;
const CYCLE_TOKEN = /^\(.*\)$/;

export interface MachineSettings {
  /** Rotor names, reflector first */
  rotors: string[];
  /** Initial settings of every rotor after the reflector */
  setting: string;
  /** Plugboard cycles, e.g. "(YF) (ZH)"; empty for no plugboard */
  plugboard: string;
}

export interface ConversionRequest extends MachineSettings {
  message: string;
}

export interface ConversionResult {
  /** Converted message, ungrouped */
  output: string;
  /** Converted message in groups of five */
  grouped: string;
  /** Rotor settings after the last symbol */
  finalSetting: string;
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

export function isSettingsLine(line: string): boolean {
  return line.trimStart().startsWith(SETTINGS_MARKER);
}

/**
 * Splits a settings line into rotor names, setting and plugboard.
 *
 * @throws {CipherError} INVALID_CONFIGURATION if the line is not a settings
 *   line, has too few tokens, or has stray tokens after the setting
 */
export function parseSettingsLine(
  line: string,
  config: MachineConfig
): MachineSettings {
  const trimmed = line.trim();
  if (!trimmed.startsWith(SETTINGS_MARKER)) {
    throw invalid(`Settings line must start with '${SETTINGS_MARKER}'`);
  }

  const tokens = trimmed
    .slice(SETTINGS_MARKER.length)
    .split(/\s+/)
    .filter(token => token.length > 0);
  if (tokens.length < config.numRotors + 1) {
    throw invalid(
      `Settings line needs ${config.numRotors} rotors and a setting`,
      { tokens: tokens.length }
    );
  }

  const rotors = tokens.slice(0, config.numRotors);
  const setting = tokens[config.numRotors];
  const plugboardTokens = tokens.slice(config.numRotors + 1);
  const stray = plugboardTokens.find(token => !CYCLE_TOKEN.test(token));
  if (stray !== undefined) {
    throw invalid(`Unexpected token '${stray}' in settings line`, {
      token: stray,
    });
  }

  return { rotors, setting, plugboard: plugboardTokens.join(' ') };
}

/**
 * Builds the plugboard for a settings line. Every cycle must be a swap.
 *
 * @throws {CipherError} MALFORMED_CYCLE or INVALID_CONFIGURATION
 */
export function buildPlugboard(
  spec: string,
  config: MachineConfig
): Permutation {
  const plugboard = Permutation.fromCycles(spec, config.alphabet);
  const long = plugboard.cycles().find(cycle => Array.from(cycle).length > 2);
  if (long !== undefined) {
    throw invalid(`Plugboard cycle (${long}) is not a swap`, {
      cycle: long,
    });
  }
  return plugboard;
}

/**
 * Validates settings in full, then installs them on the machine.
 */
export function applySettings(
  machine: Machine,
  config: MachineConfig,
  settings: MachineSettings
): void {
  validateArrangement(config, settings.rotors);
  const plugboard = buildPlugboard(settings.plugboard, config);

  const symbols = Array.from(settings.setting);
  if (symbols.length !== config.numRotors - 1) {
    throw new CipherError(
      CipherErrorCode.INVALID_LENGTH,
      `Setting must be ${config.numRotors - 1} symbols long, got ${symbols.length}`,
      { expected: config.numRotors - 1, received: settings.setting }
    );
  }
  symbols.forEach(symbol => config.alphabet.toIndex(symbol));

  machine.insertRotors(settings.rotors);
  machine.setRotors(settings.setting);
  machine.setPlugboard(plugboard);
}

/**
 * Splits text into space-separated groups.
 */
export function formatGroups(
  text: string,
  size: number = DEFAULT_GROUP_SIZE
): string {
  const symbols = Array.from(text);
  const groups: string[] = [];
  for (let i = 0; i < symbols.length; i += size) {
    groups.push(symbols.slice(i, i + size).join(''));
  }
  return groups.join(' ');
}

/**
 * Removes whitespace; upper-cases when the alphabet has no lower-case symbols.
 */
export function normalizeMessage(
  message: string,
  config: MachineConfig
): string {
  const compact = message.replace(/\s+/g, '');
  const symbols = config.alphabet.symbols();
  return symbols === symbols.toUpperCase() ? compact.toUpperCase() : compact;
}

/**
 * Converts a single message with a fresh machine.
 */
export function runConversion(
  config: MachineConfig,
  request: ConversionRequest,
  options: MachineOptions = {}
): ConversionResult {
  const machine = createMachine(config, options);
  applySettings(machine, config, request);
  const output = machine.convert(normalizeMessage(request.message, config));

  return {
    output,
    grouped: formatGroups(output),
    finalSetting: machine.settings(),
  };
}

/**
 * Processes a whole transcript and returns the output text. A trailing
 * newline in the input is kept in the output.
 *
 * @throws {CipherError} INVALID_CONFIGURATION if a message precedes the first
 *   settings line, or any error from configuring or converting
 */
export function processTranscript(
  config: MachineConfig,
  input: string,
  options: MachineOptions = {}
): string {
  const lines = input.split(/\r?\n/);
  const trailingNewline = lines.length > 1 && lines[lines.length - 1] === '';
  if (trailingNewline) {
    lines.pop();
  }

  let machine: Machine | null = null;
  const output = lines.map((line, lineNumber) => {
    if (isSettingsLine(line)) {
      machine = createMachine(config, options);
      applySettings(machine, config, parseSettingsLine(line, config));
      return null;
    }

    const message = normalizeMessage(line, config);
    if (message.length === 0) {
      return '';
    }
    if (machine === null) {
      throw invalid('Message appears before any settings line', {
        line: lineNumber + 1,
      });
    }
    return formatGroups(machine.convert(message));
  });

  const text = output.filter((line): line is string => line !== null).join('\n');
  return trailingNewline ? `${text}\n` : text;
}
