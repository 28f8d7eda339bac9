#!/usr/bin/env node
/**
 * CLI entry point: converts a transcript with a catalog file.
 *
 *   rotor-cipher <catalog-file> [input-file] [output-file]
 *
 * Input defaults to stdin and output to stdout. Diagnostics go to stderr,
 * so piped output carries converted text only. Set ROTOR_TRACE=true to trace
 * every converted symbol.
 */

import * as fs from 'fs';
import { loadMachineConfig } from '../server/services/catalog.service';
import { processTranscript } from '../server/services/transcript.service';
import type { MachineOptions } from '../server/services/machine.service';
import { createConsoleTraceSink } from '../server/utils/trace';

const USAGE = 'Usage: rotor-cipher <catalog-file> [input-file] [output-file]';

const STDIN_FD = 0;

export interface CliIO {
  readFile(path: string | number): string;
  writeFile(path: string, text: string): void;
  stdout(text: string): void;
  stderr(line: string): void;
}

const nodeIO: CliIO = {
  readFile: path => fs.readFileSync(path, 'utf-8'),
  writeFile: (path, text) => fs.writeFileSync(path, text, 'utf-8'),
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: line => {
    console.error(line);
  },
};

/**
 * Runs the CLI and returns the exit status.
 *
 * @param args - Arguments after the script name
 * @param env - Environment (ROTOR_TRACE)
 * @param io - File and stream access
 */
export function runCli(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = nodeIO
): number {
  if (args.length < 1 || args.length > 3) {
    io.stderr(USAGE);
    return 1;
  }

  const [catalogPath, inputPath, outputPath] = args;
  try {
    const config = loadMachineConfig(catalogPath, io.stderr);
    const input = io.readFile(inputPath ?? STDIN_FD);
    const options: MachineOptions =
      env.ROTOR_TRACE === 'true' ? { trace: createConsoleTraceSink() } : {};
    const output = processTranscript(config, input, options);

    if (outputPath === undefined) {
      io.stdout(output);
    } else {
      io.writeFile(outputPath, output);
    }
    return 0;
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
