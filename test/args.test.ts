import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/args';
import { defaultConcurrency } from '../src/config';

describe('parseArgs', () => {
  it('should collect positional inputs with defaults', () => {
    const options = parseArgs(['photos', 'notes.txt']);

    expect(options).toEqual({
      inputs: ['photos', 'notes.txt'],
      concurrency: defaultConcurrency(),
      logLevel: 'warn',
      showProgress: false,
      help: false
    });
  });

  it('should show progress on a terminal unless quiet', () => {
    expect(parseArgs(['dir'], true).showProgress).toBe(true);
    expect(parseArgs(['--quiet', 'dir'], true).showProgress).toBe(false);
    expect(parseArgs(['-q', 'dir'], true).showProgress).toBe(false);
  });

  it('should read the worker count', () => {
    expect(parseArgs(['--workers', '6', 'dir']).concurrency).toBe(6);
    expect(parseArgs(['-w', '1', 'dir']).concurrency).toBe(1);
  });

  it('should reject invalid worker counts', () => {
    expect(() => parseArgs(['--workers', '0'])).toThrow('--workers expects a positive integer');
    expect(() => parseArgs(['-w', 'many'])).toThrow('-w expects a positive integer');
    expect(() => parseArgs(['--workers'])).toThrow('--workers expects a positive integer');
  });

  it('should switch to info logging when verbose', () => {
    expect(parseArgs(['-v', 'dir']).logLevel).toBe('info');
  });

  it('should flag help', () => {
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--fast', 'dir'])).toThrow('Unknown option: --fast');
  });
});
