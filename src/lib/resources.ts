/**
 * Working directory preparation before a build invocation.
 */

import { basename, dirname, join } from 'node:path';
import { copyFileReplacing, findFilesByName, removeDirectoryIfPresent } from './fs.js';

/** Generated frontend dependency folders removed before every compile */
export const NODE_FOLDERS = ['node', 'node_modules'] as const;

/** Log file written by the compile invocation */
export const COMPILE_LOG_FILE = 'compilePluginLog.log';

/** Auxiliary lint configuration staged from a local checkout */
export const ESLINTRC = '.eslintrc';

/**
 * Removes stale `node` and `node_modules` folders from a directory.
 *
 * @returns The folders that were removed
 * @throws {FsError} If an existing folder cannot be removed
 */
export async function removeNodeFolders(dir: string): Promise<string[]> {
  const removed: string[] = [];
  for (const name of NODE_FOLDERS) {
    const folder = join(dir, name);
    if (await removeDirectoryIfPresent(folder)) {
      removed.push(folder);
    }
  }
  return removed;
}

/**
 * Cleans a directory for a fresh build and returns the log file to use for it.
 */
export async function setupCompileResources(dir: string): Promise<string> {
  console.log('Cleaning up node modules if necessary');
  await removeNodeFolders(dir);
  console.log(`Plugin compilation log directory: ${dir}`);
  return join(dir, COMPILE_LOG_FILE);
}

/**
 * Directory searched for the auxiliary config of a local checkout.
 *
 * With several plugins under test the checkout itself holds every plugin and
 * the shared file sits at its top level; with one plugin the checkout is the
 * plugin and the file sits beside it.
 */
export function auxiliaryConfigRoot(localCheckoutDir: string, componentCount: number): string {
  return componentCount > 1 ? localCheckoutDir : dirname(localCheckoutDir);
}

/**
 * Copies `.eslintrc` from a local checkout next to the plugin's directory.
 *
 * @returns Source paths that were copied; empty when no file was found
 * @throws {FsError} If the search or the copy fails
 */
export async function stageAuxiliaryConfig(
  localCheckoutDir: string,
  componentCount: number,
  componentDir: string
): Promise<string[]> {
  const root = auxiliaryConfigRoot(localCheckoutDir, componentCount);
  const found = await findFilesByName(root, ESLINTRC, 1);
  const destination = join(dirname(componentDir), ESLINTRC);
  for (const source of found) {
    console.log(`Copying ${basename(source)} from ${root} to ${destination}`);
    await copyFileReplacing(source, destination);
  }
  return found;
}
