/**
 * Hook contracts for the staged compatibility pipeline.
 */

import type { HookContext } from './context.js';

/** Pipeline stages, in execution order. */
export const HOOK_STAGES = ['checkout', 'compilation', 'execution'] as const;

export type HookStage = (typeof HOOK_STAGES)[number];

/**
 * A unit of work attached to one pipeline stage.
 */
export interface Hook {
  /** Unique name, used for exclusion from config */
  readonly name: string;
  readonly stage: HookStage;
  /** Whether this hook applies to the component in the context */
  check(context: HookContext): boolean | Promise<boolean>;
  /** Throws when the context lacks something the action needs */
  validate(context: HookContext): void;
  action(context: HookContext): Promise<HookContext>;
}

/**
 * Checkout hooks that classify a component as part of a multi-module parent.
 *
 * Compilation hooks consult these votes instead of checking concrete hook classes.
 */
export interface TopologyVoter extends Hook {
  readonly votesOnTopology: true;
}

export function isTopologyVoter(hook: Hook): hook is TopologyVoter {
  return 'votesOnTopology' in hook && hook.votesOnTopology === true;
}
