import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createConsoleTraceSink,
  createMemoryTraceSink,
  formatTrace,
} from '../src/server/utils/trace';

describe('trace', () => {
  const trace = {
    settings: 'AXLF',
    input: 'H',
    plugboardIn: 'Z',
    rotorsOut: 'S',
    output: 'S',
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format one line per symbol', () => {
    expect(formatTrace(trace)).toBe('[AXLF] H -> Z -> S -> S');
  });

  it('should write console traces to stderr', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createConsoleTraceSink()(trace);

    expect(errorSpy).toHaveBeenCalledWith('[AXLF] H -> Z -> S -> S');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should collect memory traces in order', () => {
    const { sink, lines } = createMemoryTraceSink();
    sink(trace);
    sink({ ...trace, settings: 'AXLG', input: 'E', plugboardIn: 'E', rotorsOut: 'H', output: 'Z' });
    expect(lines).toEqual(['[AXLF] H -> Z -> S -> S', '[AXLG] E -> E -> H -> Z']);
  });
});
