/**
 * Chooses and runs the compile goal sequence for a plugin.
 */

import { dirname } from 'node:path';
import type { BuildRunner } from '../runner/maven.js';
import type { CompileDecision } from '../types/context.js';
import { resolveMavenModule } from './module.js';
import { setupCompileResources } from './resources.js';
import { isNestedInParentFolder } from './topology.js';
import { isSnapshotProject } from './version.js';

/** Properties for the targeted multi-module install */
export const MULTI_PARENT_OPTIONS = {
  skipTests: 'true',
  'invoker.skip': 'true',
  'enforcer.skip': 'true',
  'maven.javadoc.skip': 'true',
} as const;

/** Properties for a standalone compile */
export const STANDALONE_OPTIONS = {
  'maven.javadoc.skip': 'true',
} as const;

export const STANDALONE_GOALS = ['clean', 'process-test-classes'] as const;

/**
 * Error thrown when a targeted build needs a module that cannot be resolved.
 */
export class ModuleResolutionError extends Error {
  constructor(
    public readonly componentName: string,
    public readonly componentDir: string
  ) {
    super(`Unable to retrieve the Maven module for plugin ${componentName} on ${componentDir}`);
    this.name = 'ModuleResolutionError';
  }
}

export interface CompileRequest {
  componentDir: string;
  localCheckoutDir: string | null | undefined;
  parentFolder: string | null | undefined;
  componentName: string;
}

/**
 * Goals for installing one module of a multi-module project with the siblings it needs.
 */
export function multiParentGoals(module: string): string[] {
  return ['clean', 'install', '-am', '-pl', module];
}

/**
 * Classifies the plugin and compiles it.
 *
 * A snapshot plugin nested in its multi-module parent is built from the parent
 * with `install -am -pl <module>`: `process-test-classes` on one module cannot
 * see sibling classes that are not installed yet. Everything else is compiled
 * in place.
 *
 * The version is only evaluated once the topology check has passed.
 *
 * @returns The decision the build was chosen from
 * @throws {ModuleResolutionError} If the multi-module target cannot be resolved
 * @throws {BuildExecutionError} If any build invocation fails
 */
export async function decideAndCompile(
  request: CompileRequest,
  runner: BuildRunner
): Promise<CompileDecision> {
  const { componentDir, localCheckoutDir, parentFolder, componentName } = request;

  const multiParent =
    !localCheckoutDir &&
    isNestedInParentFolder({ componentDir, parentFolder, hasLocalCheckout: false });
  const snapshot = multiParent && (await isSnapshotProject(dirname(componentDir), runner));

  if (multiParent && snapshot) {
    const module = await resolveMavenModule(componentName, componentDir, runner);
    if (!module || module.trim() === '') {
      throw new ModuleResolutionError(componentName, componentDir);
    }
    const parentDir = dirname(componentDir);
    await runner.run(
      MULTI_PARENT_OPTIONS,
      parentDir,
      await setupCompileResources(parentDir),
      multiParentGoals(module)
    );
  } else {
    await runner.run(
      STANDALONE_OPTIONS,
      componentDir,
      await setupCompileResources(componentDir),
      STANDALONE_GOALS
    );
  }

  return { multiParent, snapshot };
}
