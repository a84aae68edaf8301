/**
 * Per-component state that flows through the hook pipeline.
 */

import type { PrecompileConfig } from './config.js';

/**
 * Identifies one plugin under test. Supplied by the harness.
 */
export interface ComponentDescriptor {
  /** Absolute path to the plugin's project root */
  dir: string;
  /** Declared plugin name (artifact id) */
  name: string;
  /** Name of the enclosing multi-module parent folder, if any */
  parentFolder: string | null;
}

/**
 * Derived classification, computed once per compile and never persisted.
 */
export interface CompileDecision {
  multiParent: boolean;
  snapshot: boolean;
}

/**
 * Facts accumulated across pipeline stages for a single component.
 *
 * One context exists per component; no field is read by another component's chain.
 */
export interface HookContext {
  config: PrecompileConfig;
  component: ComponentDescriptor;
  /**
   * Set once the plugin has been compiled during this run.
   * Never reset to false afterwards.
   */
  ranCompile: boolean;
}
