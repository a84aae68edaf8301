/**
 * Precompile type definitions.
 */

export type { PrecompileConfig, MavenConfig, MultiParentConfig } from './config.js';
export type { ComponentDescriptor, CompileDecision, HookContext } from './context.js';
export type { Hook, HookStage, TopologyVoter } from './hooks.js';
export { HOOK_STAGES, isTopologyVoter } from './hooks.js';
