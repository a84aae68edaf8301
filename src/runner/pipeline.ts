/**
 * Runs the hooks of one pipeline stage against a component's context.
 */

import type { HookContext } from '../types/context.js';
import type { HookStage } from '../types/hooks.js';
import type { HookRegistry } from '../hooks/registry.js';

/**
 * Runs every applicable hook of a stage in registration order.
 *
 * Each hook sees the context returned by the previous one. A failing hook
 * aborts the stage for this component.
 */
export async function runStage(
  stage: HookStage,
  context: HookContext,
  registry: HookRegistry
): Promise<HookContext> {
  let current = context;
  for (const hook of registry.getHooksFromStage(stage)) {
    if (!(await hook.check(current))) {
      continue;
    }
    console.log(`Processing ${stage} hook ${hook.name}`);
    hook.validate(current);
    current = await hook.action(current);
  }
  return current;
}
