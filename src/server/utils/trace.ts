/**
 * Diagnostic trace sinks for the Machine.
 *
 * A sink is injected at Machine construction. The console sink writes one
 * line per converted symbol to stderr:
 *   [AXLE] H -> H -> Q -> Q
 * i.e. rotor settings, input, after plugboard, after rotors, output.
 */

import type { ConversionTrace, MachineTraceSink } from '../types/rotor.types';

export function formatTrace(trace: ConversionTrace): string {
  return (
    `[${trace.settings}] ${trace.input} -> ${trace.plugboardIn} -> ` +
    `${trace.rotorsOut} -> ${trace.output}`
  );
}

export function createConsoleTraceSink(): MachineTraceSink {
  return trace => {
    // eslint-disable-next-line no-console
    console.error(formatTrace(trace));
  };
}

/**
 * Collects traces in memory, for tests and for returning a trace with an
 * API response.
 */
export function createMemoryTraceSink(): {
  sink: MachineTraceSink;
  lines: string[];
} {
  const lines: string[] = [];
  return {
    sink: trace => {
      lines.push(formatTrace(trace));
    },
    lines,
  };
}
