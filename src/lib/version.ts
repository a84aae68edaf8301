/**
 * Release state of a multi-module project, as reported by Maven itself.
 *
 * The effective version may be inherited or interpolated, so it is evaluated
 * by the build tool rather than read from pom.xml.
 */

import { join } from 'node:path';
import type { BuildRunner } from '../runner/maven.js';
import { readLines } from './fs.js';

export const SNAPSHOT_SUFFIX = '-SNAPSHOT';

/** Log file capturing the evaluated project version */
export const VERSION_LOG_FILE = 'version.log';

/**
 * Returns the last line with visible content, or null when there is none.
 */
export function lastNonEmptyLine(lines: readonly string[]): string | null {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trimEnd();
    if (line.length > 0) {
      return line;
    }
  }
  return null;
}

/**
 * Checks whether captured `help:evaluate` output denotes a snapshot version.
 *
 * Only the last non-empty line is considered, and it must end with the
 * snapshot suffix.
 *
 * @example
 * ```typescript
 * isSnapshotVersionOutput(['[INFO] ...', '2.0-SNAPSHOT', '']) // true
 * isSnapshotVersionOutput(['2.0-SNAPSHOT-rc1']) // false
 * ```
 */
export function isSnapshotVersionOutput(lines: readonly string[]): boolean {
  const last = lastNonEmptyLine(lines);
  return last !== null && last.endsWith(SNAPSHOT_SUFFIX);
}

/**
 * Asks Maven for `project.version` in a directory and checks for a snapshot.
 *
 * @throws {BuildExecutionError} If the evaluation build fails
 * @throws {FsError} If the captured log cannot be read
 */
export async function isSnapshotProject(projectDir: string, runner: BuildRunner): Promise<boolean> {
  const log = join(projectDir, VERSION_LOG_FILE);
  await runner.run(
    { expression: 'project.version', forceStdout: 'true' },
    projectDir,
    log,
    ['-q', 'help:evaluate']
  );
  return isSnapshotVersionOutput(await readLines(log));
}
