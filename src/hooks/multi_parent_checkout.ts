/**
 * Checkout-stage classifier for plugins that live in a multi-module parent.
 */

import micromatch from 'micromatch';
import type { MultiParentConfig } from '../types/config.js';
import type { HookContext } from '../types/context.js';
import type { TopologyVoter } from '../types/hooks.js';

export class MultiParentCheckoutHook implements TopologyVoter {
  readonly stage = 'checkout';
  readonly votesOnTopology = true;
  readonly name: string;

  constructor(private readonly family: MultiParentConfig) {
    this.name = `multi-parent-checkout:${family.parent_folder}`;
  }

  check(context: HookContext): boolean {
    return micromatch.isMatch(context.component.name, this.family.plugins);
  }

  validate(): void {}

  /**
   * Records the parent folder on the component unless the harness already set one.
   */
  async action(context: HookContext): Promise<HookContext> {
    if (!context.component.parentFolder) {
      context.component.parentFolder = this.family.parent_folder;
    }
    return context;
  }
}
