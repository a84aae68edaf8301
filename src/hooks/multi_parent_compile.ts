/**
 * Compilation-stage hook for plugins that belong to a multi-module parent.
 */

import type { MavenConfig } from '../types/config.js';
import type { HookContext } from '../types/context.js';
import { isTopologyVoter, type Hook } from '../types/hooks.js';
import { decideAndCompile } from '../lib/strategy.js';
import { stageAuxiliaryConfig } from '../lib/resources.js';
import { ExternalMavenRunner, type BuildRunner } from '../runner/maven.js';
import type { HookRegistry } from './registry.js';

export type RunnerFactory = (config: MavenConfig) => BuildRunner;

export class MultiParentCompileHook implements Hook {
  readonly name = 'multi-parent-compile';
  readonly stage = 'compilation';

  constructor(
    private readonly registry: HookRegistry,
    private readonly createRunner: RunnerFactory = (config) => new ExternalMavenRunner(config)
  ) {}

  /**
   * Applies when any checkout-stage topology voter claims the component.
   */
  async check(context: HookContext): Promise<boolean> {
    for (const hook of this.registry.getHooksFromStage('checkout')) {
      if (isTopologyVoter(hook) && (await hook.check(context))) {
        return true;
      }
    }
    return false;
  }

  validate(): void {}

  async action(context: HookContext): Promise<HookContext> {
    console.log('Executing multi-parent compile hook');
    const { config, component } = context;
    console.log(`Plugin dir is ${component.dir}`);

    const localCheckoutDir = config.local_checkout_dir ?? null;
    if (localCheckoutDir) {
      await stageAuxiliaryConfig(localCheckoutDir, config.include_plugins.length, component.dir);
    }

    // Compile only once per run; later hooks rely on the flag.
    if (!context.ranCompile) {
      await decideAndCompile(
        {
          componentDir: component.dir,
          localCheckoutDir,
          parentFolder: component.parentFolder,
          componentName: component.name,
        },
        this.createRunner(config.maven)
      );
      context.ranCompile = true;
    }

    console.log('Executed multi-parent compile hook');
    return context;
  }
}
