/**
 * Registry of pipeline hooks, grouped by stage in registration order.
 */

import type { Hook, HookStage } from '../types/hooks.js';

export class DuplicateHookError extends Error {
  constructor(public readonly hookName: string) {
    super(`A hook named ${hookName} is already registered`);
    this.name = 'DuplicateHookError';
  }
}

export class HookRegistry {
  private readonly hooks: Hook[] = [];
  private readonly excluded = new Set<string>();

  /**
   * Registers a hook. Hooks whose names were excluded are ignored.
   *
   * @returns false when the hook was excluded
   * @throws {DuplicateHookError} If a hook with the same name is registered
   */
  register(hook: Hook): boolean {
    if (this.excluded.has(hook.name)) {
      console.log(`Hook ${hook.name} is excluded`);
      return false;
    }
    if (this.hooks.some((existing) => existing.name === hook.name)) {
      throw new DuplicateHookError(hook.name);
    }
    this.hooks.push(hook);
    return true;
  }

  /**
   * Excludes hooks by name, removing any already registered.
   */
  excludeHooks(names: Iterable<string>): void {
    for (const name of names) {
      this.excluded.add(name);
    }
    for (let i = this.hooks.length - 1; i >= 0; i--) {
      if (this.excluded.has(this.hooks[i].name)) {
        this.hooks.splice(i, 1);
      }
    }
  }

  getHooksFromStage(stage: HookStage): Hook[] {
    return this.hooks.filter((hook) => hook.stage === stage);
  }
}
