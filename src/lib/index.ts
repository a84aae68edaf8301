/**
 * Precompile library utilities.
 *
 * This module exports all public utilities for the precompile project.
 */

export {
  atomicReadJson,
  readLines,
  removeDirectoryIfPresent,
  copyFileReplacing,
  findFilesByName,
  FsError,
} from './fs.js';

export {
  loadConfig,
  findConfigFile,
  validateConfig,
  ConfigError,
  CONFIG_FILE_NAME,
} from './config.js';

export { validateWithSchema, CONFIG_SCHEMA } from './schema.js';
export type { ValidationResult } from './schema.js';

export {
  removeNodeFolders,
  setupCompileResources,
  stageAuxiliaryConfig,
  auxiliaryConfigRoot,
  NODE_FOLDERS,
  COMPILE_LOG_FILE,
  ESLINTRC,
} from './resources.js';

export {
  isSnapshotProject,
  isSnapshotVersionOutput,
  lastNonEmptyLine,
  SNAPSHOT_SUFFIX,
  VERSION_LOG_FILE,
} from './version.js';

export { isNestedInParentFolder } from './topology.js';
export type { TopologyInput } from './topology.js';

export { resolveMavenModule, parseModuleList, MODULES_LOG_FILE } from './module.js';

export {
  decideAndCompile,
  multiParentGoals,
  ModuleResolutionError,
  MULTI_PARENT_OPTIONS,
  STANDALONE_OPTIONS,
  STANDALONE_GOALS,
} from './strategy.js';
export type { CompileRequest } from './strategy.js';

export {
  ExternalMavenRunner,
  BuildExecutionError,
  buildMavenArgs,
  runStage,
} from '../runner/index.js';
export type { BuildRunner, BuildOptions } from '../runner/index.js';

export {
  HookRegistry,
  MultiParentCheckoutHook,
  MultiParentCompileHook,
  createDefaultRegistry,
} from '../hooks/index.js';

export * from '../types/index.js';
