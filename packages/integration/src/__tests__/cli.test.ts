import { describe, it, expect, vi, afterEach } from 'vitest';
import { runCli } from '../cli.js';

const ALMANAC = 'seeds: 3 5 40 2\n\nalpha-to-beta map:\n100 0 10\n20 30 15\n\nbeta-to-gamma map:\n0 100 5\n7 20 10\n';

describe('runCli', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs the requested day against the input file', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const paths: string[] = [];
    const code = runCli(['5', 'almanac.txt'], {
      readInput: path => {
        paths.push(path);
        return ALMANAC;
      },
    });
    expect(code).toBe(0);
    expect(paths).toEqual(['almanac.txt']);
    const lines = log.mock.calls.map(call => String(call[0]));
    expect(lines).toContain('[SolutionRunner] 5:1 Lowest location: 2');
    expect(lines).toContain('[SolutionRunner] 5:2 Lowest location across ranges: 3');
  });

  it('defaults the input path', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const paths: string[] = [];
    runCli(['5'], {
      readInput: path => {
        paths.push(path);
        return ALMANAC;
      },
    });
    expect(paths).toEqual(['in.txt']);
  });

  it('rejects unknown days', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(runCli(['12'], { readInput: () => ALMANAC })).toBe(1);
    expect(error).toHaveBeenCalledWith('[rangefold] Unknown day "12" (available: 5)');
  });

  it('rejects malformed datasets', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(runCli(['5', 'bad.txt'], { readInput: () => 'seeds: 1 2\n\na-to-b map:\n1 2' })).toBe(1);
    expect(error).toHaveBeenCalledWith(
      '[rangefold] Rejected bad.txt: Map a-to-b: Malformed stage line 1 ("1 2"): expected 3 numbers, found 2'
    );
  });

  it('rejects overlapping segments only with --strict', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const overlapping = 'seeds: 15 16\n\na-to-b map:\n500 10 3\n900 10 10';

    expect(runCli(['5', 'x.txt'], { readInput: () => overlapping })).toBe(0);
    expect(log).toHaveBeenCalledWith('[SolutionRunner] 5:1 Lowest location: 905');

    expect(runCli(['5', 'x.txt', '--strict'], { readInput: () => overlapping })).toBe(1);
    expect(error).toHaveBeenCalledWith(
      '[rangefold] Rejected x.txt: Stage a-to-b has overlapping segments: "500 10 3" / "900 10 10"'
    );
  });

  it('reports unreadable input', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const code = runCli(['5', 'missing.txt'], {
      readInput: () => {
        throw new Error('ENOENT');
      },
    });
    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith('[rangefold] Cannot read missing.txt:', 'ENOENT');
  });
});
