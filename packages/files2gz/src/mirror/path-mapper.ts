/**
 * Maps files in the source tree to their compressed location in the target tree.
 */

import * as path from 'node:path';
import { OutsideWatchedTreeError } from '../errors.js';
import type { MappedPaths, WatchConfig } from '../types.js';
import { GZIP_SUFFIX } from '../types.js';

/**
 * Whether `child` is `parent` itself or lies somewhere below it.
 * Both paths must be absolute.
 */
export function isSameOrDescendant(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  if (rel === '') return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`);
}

/**
 * Compute the target paths for a file inside the source tree.
 *
 * `reports/q1.csv` under the source root maps to `reports/q1.csv.gz`
 * under the target root. The suffix is appended literally, so files
 * without an extension get one (`data` → `data.gz`).
 *
 * @throws OutsideWatchedTreeError if the path is not strictly below sourceRoot
 */
export function mapTargetPaths(
  config: Pick<WatchConfig, 'sourceRoot' | 'targetRoot'>,
  absolutePath: string
): MappedPaths {
  const relativePath = path.relative(config.sourceRoot, absolutePath);

  if (relativePath === '' || !isSameOrDescendant(config.sourceRoot, absolutePath)) {
    throw new OutsideWatchedTreeError(absolutePath, config.sourceRoot);
  }

  const targetFilePath = path.join(config.targetRoot, relativePath) + GZIP_SUFFIX;

  return {
    relativePath,
    targetFilePath,
    targetParentDir: path.dirname(targetFilePath),
  };
}
