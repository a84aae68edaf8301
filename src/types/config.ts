/**
 * TypeScript interfaces for precompile.config.json configuration.
 */

/**
 * Build tool invocation settings, passed through to the runner unchanged.
 */
export interface MavenConfig {
  /** Executable to spawn (e.g. "mvn" or an absolute path) */
  command: string;
  /** Optional settings.xml passed with -s */
  settings?: string | null;
  /** Extra arguments appended after the -D properties */
  args: string[];
}

/**
 * Declares a family of plugins that live inside one multi-module parent folder.
 */
export interface MultiParentConfig {
  /** Folder name of the multi-module parent checkout (e.g. "bom-parent") */
  parent_folder: string;
  /** Micromatch patterns selecting the plugin names that belong to it */
  plugins: string[];
}

/**
 * Complete configuration structure.
 */
export interface PrecompileConfig {
  /** Configuration format version */
  version: string;
  /** Build tool settings */
  maven: MavenConfig;
  /** Local source checkout used instead of fetched releases */
  local_checkout_dir?: string | null;
  /** Plugins under test from the local checkout */
  include_plugins: string[];
  /** Multi-module parent folder declarations */
  multi_parent: MultiParentConfig[];
  /** Hook names that must not be registered */
  exclude_hooks?: string[];
}
