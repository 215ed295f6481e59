import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { runCli, USAGE } from '../src/runs/command.js';
import { createMemoryLogger, makeTmpDir, removeTmpDir, writeFiles } from './fixtures/helpers.js';

describe('runCli', () => {
  let tmpDir: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    tmpDir = makeTmpDir();
    writeFiles(tmpDir, {
      'runs.txt': `${tmpDir}/\nr1\n`,
      'r1.pcl': '<CLASS>RBC,WBC</CLASS>\n<CLASS>BACT</CLASS>\n',
      'r1.acl': '<CLASS>RBC,RBC</CLASS>\n<CLASS>BACT</CLASS>\n',
    });
  });

  afterEach(() => {
    removeTmpDir(tmpDir);
  });

  it('prints usage with --help', () => {
    const logger = createMemoryLogger();
    expect(runCli(['--help'], logger)).toBe(0);
    expect(logger.lines).toEqual([{ level: 'info', message: USAGE }]);
  });

  it('fails without a run list', () => {
    const logger = createMemoryLogger();
    expect(runCli(['--destination', tmpDir], logger)).toBe(1);
    expect(logger.lines[0]?.level).toBe('error');
    expect(logger.lines[0]?.message).toContain('runList: Required');
  });

  it('rejects unknown options', () => {
    const logger = createMemoryLogger();
    expect(runCli(['--bogus'], logger)).toBe(1);
    expect(logger.lines[0]?.level).toBe('error');
  });

  it('rejects a non-numeric subsample', () => {
    const logger = createMemoryLogger();
    const args = ['-r', join(tmpDir, 'runs.txt'), '-d', tmpDir, '-s', 'two'];
    expect(runCli(args, logger)).toBe(1);
    expect(logger.lines[0]?.message).toBe("--subsample must be a positive integer, got 'two'");
  });

  it('compares the runs given on the command line', () => {
    const logger = createMemoryLogger();
    const destination = join(tmpDir, 'out');
    expect(runCli(['-r', join(tmpDir, 'runs.txt'), '-d', destination, '-s', '2'], logger)).toBe(0);
    const lines = readFileSync(join(destination, 'ConfusionMatrix.txt'), 'utf-8').split('\n');
    expect(lines).toHaveLength(27);
    expect(lines[5]).toBe(`${'0\t'.repeat(5)}1\t${'0\t'.repeat(20)}`);
  });

  it('prints each matrix with --print', () => {
    const logger = createMemoryLogger();
    const args = ['-r', join(tmpDir, 'runs.txt'), '-d', tmpDir, '--print'];
    expect(runCli(args, logger)).toBe(0);
    const rendered = logger.lines.find((l) => l.message.startsWith('Confusion Matrix: r1'));
    expect(rendered?.message.split('\n')[0]).toBe('Confusion Matrix: r1 (subsample 1)');
  });

  it('reads a configuration file and lets flags override it', () => {
    writeFiles(tmpDir, { 'compare.yaml': 'runList: runs.txt\ndestination: out\nsubsample: 2\n' });
    const logger = createMemoryLogger();
    expect(runCli(['--config', join(tmpDir, 'compare.yaml'), '--subsample', '3'], logger)).toBe(1);
    expect(logger.lines.map((l) => l.level)).toEqual(['info', 'error', 'info']);
    expect(logger.lines[1]?.message).toMatch(/^Run 'r1' failed: Subsample 3 is out of range/);
  });

  it('exits with 1 when the run list cannot be read', () => {
    const logger = createMemoryLogger();
    expect(runCli(['-r', join(tmpDir, 'nope.txt'), '-d', tmpDir], logger)).toBe(1);
    expect(logger.lines[0]?.message).toMatch(/^Could not read run list/);
  });
});
