import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  isSnapshotProject,
  isSnapshotVersionOutput,
  lastNonEmptyLine,
} from '@/lib/version.js';
import { BuildExecutionError } from '@/runner/maven.js';
import { FsError } from '@/lib/fs.js';
import {
  RecordingRunner,
  buildFailure,
  evaluateResponder,
  makeTestDir,
  removeTestDir,
} from '../helpers/mocks.js';

describe('lastNonEmptyLine', () => {
  it('should skip trailing blank lines', () => {
    expect(lastNonEmptyLine(['a', 'b', '', '   '])).toBe('b');
  });

  it('should return null for empty output', () => {
    expect(lastNonEmptyLine([])).toBeNull();
    expect(lastNonEmptyLine(['', ' '])).toBeNull();
  });
});

describe('isSnapshotVersionOutput', () => {
  it('should match a snapshot on the last line', () => {
    expect(isSnapshotVersionOutput(['Apache Maven 3.9.6', '2.0-SNAPSHOT'])).toBe(true);
  });

  it('should ignore trailing whitespace and blank lines', () => {
    expect(isSnapshotVersionOutput(['2.0-SNAPSHOT  ', '', ''])).toBe(true);
  });

  it('should not match a release version', () => {
    expect(isSnapshotVersionOutput(['2.0'])).toBe(false);
  });

  it('should not match a marker in the middle of the line', () => {
    expect(isSnapshotVersionOutput(['2.0-SNAPSHOT-rc1'])).toBe(false);
  });

  it('should only look at the last non-empty line', () => {
    expect(isSnapshotVersionOutput(['1.0-SNAPSHOT', '1.0'])).toBe(false);
  });

  it('should be case sensitive', () => {
    expect(isSnapshotVersionOutput(['2.0-snapshot'])).toBe(false);
  });

  it('should return false for empty output', () => {
    expect(isSnapshotVersionOutput([''])).toBe(false);
  });
});

describe('isSnapshotProject', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTestDir('precompile-version');
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should evaluate project.version quietly into version.log', async () => {
    const runner = new RecordingRunner(evaluateResponder('2.0-SNAPSHOT'));

    expect(await isSnapshotProject(testDir, runner)).toBe(true);
    expect(runner.runs).toEqual([
      {
        options: { expression: 'project.version', forceStdout: 'true' },
        workingDir: testDir,
        logFile: join(testDir, 'version.log'),
        goals: ['-q', 'help:evaluate'],
      },
    ]);
  });

  it('should return false for a release version', async () => {
    const runner = new RecordingRunner(evaluateResponder('2.0'));

    expect(await isSnapshotProject(testDir, runner)).toBe(false);
  });

  it('should propagate build failures unchanged without retrying', async () => {
    let failure: BuildExecutionError | undefined;
    const runner = new RecordingRunner((run) => {
      failure = buildFailure(run);
      return failure;
    });

    const error = await isSnapshotProject(testDir, runner).catch((e: unknown) => e);

    expect(error).toBe(failure);
    expect(runner.runs).toHaveLength(1);
  });

  it('should raise FsError when the log cannot be read', async () => {
    const runner = {
      run: async () => {},
    };

    await expect(isSnapshotProject(join(testDir, 'missing'), runner)).rejects.toThrow(FsError);
  });
});
