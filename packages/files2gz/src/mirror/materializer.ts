/**
 * Creates the directory structure needed for target files.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { DirectoryCreateError } from '../errors.js';

/**
 * Ensures target parent directories exist before a file is written.
 *
 * Creation is recursive and idempotent: an existing directory is not an
 * error, so concurrent handlers may target the same parent.
 */
export class DirectoryMaterializer {
  private readonly targetRoot: string;
  private readonly logger: Logger;

  constructor(targetRoot: string, logger: Logger) {
    this.targetRoot = targetRoot;
    this.logger = logger.child({ component: 'materializer' });
  }

  /**
   * Make sure `dir` and all of its ancestors exist.
   *
   * @returns true if at least one directory was created
   * @throws DirectoryCreateError when the directory cannot be created
   */
  async ensure(dir: string): Promise<boolean> {
    let firstCreated: string | undefined;
    try {
      firstCreated = await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      throw new DirectoryCreateError(dir, err);
    }

    if (firstCreated === undefined) {
      return false;
    }

    this.logger.info(
      { directory: path.relative(this.targetRoot, dir) || '.' },
      'Created directory in target'
    );
    return true;
  }
}
