import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import crypto from 'crypto';
import { buildDuplicatesReport, formatReport, formatStats } from '../src/report';
import { silentLogger } from '../src/logger';
import {
  createTempDir,
  cleanupTempDir,
  createTestFile,
  createDuplicateStructure
} from './setup';
import path from 'path';

function md5(content: string): string {
  return crypto.createHash('md5').update(content).digest('hex');
}

describe('buildDuplicatesReport', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should identify duplicates correctly', async () => {
    const structure = await createDuplicateStructure(tempDir);

    const result = await buildDuplicatesReport([tempDir], { logger: silentLogger });

    for (const group of structure.duplicates) {
      for (const file of group.files) {
        expect(result.report).toContain(`- ${file}\n`);
      }
    }
    for (const uniqueFile of structure.unique) {
      expect(result.report).not.toContain(uniqueFile);
    }
    expect(result.stats).toEqual({
      filesCollected: 7,
      filesHashed: 7,
      hashErrors: 0,
      duplicateGroups: 2,
      duplicateFiles: 5,
      wastedBytes: 13 * 2 + 22
    });
    expect(result.errors).toEqual([]);
    expect(result.cancelled).toBe(false);
  });

  it('should render the exact report for a single group', async () => {
    const a = path.join(tempDir, 'a.txt');
    const b = path.join(tempDir, 'b.txt');
    const c = path.join(tempDir, 'c.txt');
    await createTestFile(a, 'same');
    await createTestFile(b, 'same');
    await createTestFile(c, 'other');

    const result = await buildDuplicatesReport([tempDir], { concurrency: 1, logger: silentLogger });

    expect(result.report).toBe(
      `Group 1 (2 files, 4 B each)\nHash: ${md5('same')}\n- ${a}\n- ${b}\n\n`
    );
  });

  it('should return empty report when no duplicates found', async () => {
    await createTestFile(path.join(tempDir, 'unique1.txt'), 'content1');
    await createTestFile(path.join(tempDir, 'unique2.txt'), 'content2');
    await createTestFile(path.join(tempDir, 'unique3.txt'), 'content3');

    const result = await buildDuplicatesReport([tempDir], { logger: silentLogger });

    expect(result.report).toBe('');
    expect(result.stats.duplicateGroups).toBe(0);
    expect(result.stats.filesHashed).toBe(3);
  });

  it('should handle empty directory', async () => {
    const result = await buildDuplicatesReport([tempDir], { logger: silentLogger });

    expect(result.report).toBe('');
    expect(result.stats.filesCollected).toBe(0);
    expect(result.cancelled).toBe(false);
  });

  it('should handle empty files as duplicates', async () => {
    await createTestFile(path.join(tempDir, 'empty1.txt'), '');
    await createTestFile(path.join(tempDir, 'empty2.txt'), '');
    await createTestFile(path.join(tempDir, 'empty3.txt'), '');

    const result = await buildDuplicatesReport([tempDir], { logger: silentLogger });

    const fileCount = (result.report.match(/^- /gm) || []).length;
    expect(fileCount).toBe(3);
    expect(result.report).toContain('Hash: d41d8cd98f00b204e9800998ecf8427e\n');
    expect(result.stats.wastedBytes).toBe(0);
  });

  it('should pass missing inputs through as warnings', async () => {
    const file1 = path.join(tempDir, 'file1.txt');
    const file2 = path.join(tempDir, 'file2.txt');
    const missing = path.join(tempDir, 'missing');
    await createTestFile(file1, 'duplicate');
    await createTestFile(file2, 'duplicate');

    const result = await buildDuplicatesReport([missing, file1, file2], { logger: silentLogger });

    expect(result.warnings.map((w) => w.input)).toEqual([missing]);
    expect(result.stats.duplicateGroups).toBe(1);
  });

  it('should handle large number of files', async () => {
    for (let i = 0; i < 25; i++) {
      await createTestFile(path.join(tempDir, `file${i}a.txt`), 'content type 1');
      await createTestFile(path.join(tempDir, `file${i}b.txt`), 'content type 2');
    }

    const result = await buildDuplicatesReport([tempDir], { concurrency: 8, logger: silentLogger });

    const hashCount = (result.report.match(/^Hash:/gm) || []).length;
    expect(hashCount).toBe(2);
    const fileCount = (result.report.match(/^- /gm) || []).length;
    expect(fileCount).toBe(50);
  });

  it('should stop early when the job is cancelled', async () => {
    for (let i = 0; i < 20; i++) {
      await createTestFile(path.join(tempDir, `file${i}.txt`), 'same content');
    }

    const result = await buildDuplicatesReport([tempDir], {
      concurrency: 2,
      logger: silentLogger,
      onJob: (job) => job.cancel()
    });

    expect(result.cancelled).toBe(true);
    expect(result.stats.filesCollected).toBe(20);
    expect(result.stats.filesHashed).toBe(0);
    expect(result.report).toBe('');
  });
});

describe('formatReport', () => {
  it('should sort paths within a group', () => {
    const report = formatReport(
      [
        {
          digest: 'abc',
          groupId: 4,
          paths: new Set(['/z.txt', '/m.txt']),
          label: 'Group 4'
        }
      ],
      () => 2048
    );

    expect(report).toBe('Group 4 (2 files, 2.00 KB each)\nHash: abc\n- /m.txt\n- /z.txt\n\n');
  });

  it('should return an empty string for no groups', () => {
    expect(formatReport([], () => undefined)).toBe('');
  });
});

describe('formatStats', () => {
  it('should list every statistic on its own line', () => {
    const text = formatStats({
      filesCollected: 10,
      filesHashed: 9,
      hashErrors: 1,
      duplicateGroups: 2,
      duplicateFiles: 5,
      wastedBytes: 3072
    });

    expect(text).toBe(
      [
        'Files collected: 10',
        'Files hashed: 9',
        'Hash errors: 1',
        'Duplicate groups: 2',
        'Duplicate files: 5',
        'Wasted space: 3.00 KB'
      ].join('\n')
    );
  });
});
