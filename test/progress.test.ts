import { describe, it, expect, vi, afterEach } from 'vitest';
import { createProgressReporter } from '../src/progress';

describe('createProgressReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should always draw the final hashing update padded over the previous one', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const reporter = createProgressReporter(true);

    reporter.updateHashing(1, 3, '/data/first.txt');
    reporter.updateHashing(3, 3, '/data/last.txt');

    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenLastCalledWith('\rHashing: 3/3 (100.0%) - last.txt' + ' '.repeat(20));
  });

  it('should write nothing when disabled', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const reporter = createProgressReporter(false);

    reporter.startScanning();
    reporter.endScanning(2);
    reporter.startHashing(2, 2);
    reporter.updateHashing(2, 2, '/data/a.txt');
    reporter.endHashing({ total: 2, completed: 2, succeeded: 2, failed: 0, cancelled: false }, 0.5);

    expect(write).not.toHaveBeenCalled();
  });
});
