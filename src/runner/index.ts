/**
 * Runner module exports.
 */

export { ExternalMavenRunner, BuildExecutionError, buildMavenArgs } from './maven.js';
export type { BuildRunner, BuildOptions } from './maven.js';
export { runStage } from './pipeline.js';
