/**
 * Checks whether a plugin sits inside its declared multi-module parent folder.
 */

import { basename, dirname, resolve } from 'node:path';

export interface TopologyInput {
  componentDir: string;
  parentFolder: string | null | undefined;
  /** True when the plugin comes from a local checkout override */
  hasLocalCheckout: boolean;
}

/**
 * Returns true when the plugin directory is a direct child of a folder named
 * `parentFolder`.
 *
 * Local checkouts are always treated as laid out as given. A declared parent
 * folder that does not match the path is logged and classified as standalone.
 */
export function isNestedInParentFolder(input: TopologyInput): boolean {
  const { componentDir, parentFolder, hasLocalCheckout } = input;
  if (hasLocalCheckout) {
    return false;
  }
  if (!parentFolder || parentFolder.trim() === '') {
    return false;
  }

  const absolutePath = resolve(componentDir);
  if (!absolutePath.includes(parentFolder)) {
    console.warn(`Parent folder ${parentFolder} not present in path ${absolutePath}`);
    return false;
  }
  if (basename(dirname(absolutePath)) !== parentFolder) {
    console.warn(`${parentFolder} is not the parent folder of ${absolutePath}`);
    return false;
  }
  return true;
}
