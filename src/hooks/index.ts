/**
 * Hook exports and the default registry.
 */

import type { MultiParentConfig, PrecompileConfig } from '../types/config.js';
import { MultiParentCheckoutHook } from './multi_parent_checkout.js';
import { MultiParentCompileHook, type RunnerFactory } from './multi_parent_compile.js';
import { HookRegistry } from './registry.js';

export { HookRegistry, DuplicateHookError } from './registry.js';
export { MultiParentCheckoutHook } from './multi_parent_checkout.js';
export { MultiParentCompileHook } from './multi_parent_compile.js';
export type { RunnerFactory } from './multi_parent_compile.js';

/**
 * Folds multi-parent entries that share a parent folder into one family,
 * keeping the first-seen order of folders and patterns.
 */
export function mergeFamilies(families: readonly MultiParentConfig[]): MultiParentConfig[] {
  const merged = new Map<string, string[]>();
  for (const family of families) {
    const plugins = merged.get(family.parent_folder) ?? [];
    for (const pattern of family.plugins) {
      if (!plugins.includes(pattern)) {
        plugins.push(pattern);
      }
    }
    merged.set(family.parent_folder, plugins);
  }
  return [...merged].map(([parent_folder, plugins]) => ({ parent_folder, plugins }));
}

/**
 * Registers one checkout classifier per parent folder plus the compile hook.
 */
export function createDefaultRegistry(
  config: PrecompileConfig,
  createRunner?: RunnerFactory
): HookRegistry {
  const registry = new HookRegistry();
  registry.excludeHooks(config.exclude_hooks ?? []);
  for (const family of mergeFamilies(config.multi_parent)) {
    registry.register(new MultiParentCheckoutHook(family));
  }
  registry.register(new MultiParentCompileHook(registry, createRunner));
  return registry;
}
