/**
 * Resolves the Maven module coordinate used for a targeted (-pl) build.
 */

import { basename, dirname, join } from 'node:path';
import type { BuildRunner } from '../runner/maven.js';
import { readLines } from './fs.js';

/** Log file capturing the evaluated module list */
export const MODULES_LOG_FILE = 'modules.log';

const MODULE_ENTRY = /^<string>(.*)<\/string>$/;

/**
 * Extracts module names from `help:evaluate -Dexpression=project.modules` output.
 *
 * @example
 * ```typescript
 * parseModuleList(['<strings>', '  <string>plugin</string>', '</strings>'])
 * // Returns: ['plugin']
 * ```
 */
export function parseModuleList(lines: readonly string[]): string[] {
  const modules: string[] = [];
  for (const line of lines) {
    const match = MODULE_ENTRY.exec(line.trim());
    if (match && match[1].trim() !== '') {
      modules.push(match[1].trim());
    }
  }
  return modules;
}

/**
 * Finds the module of the parent project that builds the given plugin.
 *
 * A plugin whose directory carries its own name is its own module. Otherwise
 * the parent's module list is evaluated and the first entry containing the
 * directory name is taken.
 *
 * @returns The module, or null when none matches
 * @throws {BuildExecutionError} If the evaluation build fails
 */
export async function resolveMavenModule(
  componentName: string,
  componentDir: string,
  runner: BuildRunner
): Promise<string | null> {
  const directoryName = basename(componentDir);
  if (directoryName === componentName) {
    return componentName;
  }

  const parentDir = dirname(componentDir);
  const log = join(parentDir, MODULES_LOG_FILE);
  await runner.run(
    { expression: 'project.modules', forceStdout: 'true' },
    parentDir,
    log,
    ['-q', 'help:evaluate']
  );
  const modules = parseModuleList(await readLines(log));
  return modules.find((module) => module.includes(directoryName)) ?? null;
}
