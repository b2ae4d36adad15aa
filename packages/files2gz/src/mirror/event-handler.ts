/**
 * Per-event handler: map → materialize → compress.
 *
 * This is the failure boundary of the pipeline. Whatever goes wrong with
 * one file is logged here and reported in the returned outcome; nothing
 * propagates to the watch loop.
 */

import * as fs from 'node:fs/promises';
import type { Logger } from 'pino';
import {
  describeError,
  errorCode,
  hasPartialOutput,
  MirrorError,
  SourceUnreadableError,
} from '../errors.js';
import type { FileEvent, FileOutcome, WatchConfig } from '../types.js';
import { DirectoryMaterializer } from './materializer.js';
import { mapTargetPaths } from './path-mapper.js';
import { compressFile } from './transfer.js';
import type { TransferOptions } from './transfer.js';

export class CompressionHandler {
  private readonly config: WatchConfig;
  private readonly transferOptions: TransferOptions;
  private readonly materializer: DirectoryMaterializer;
  private readonly logger: Logger;

  constructor(config: WatchConfig, transferOptions: TransferOptions, logger: Logger) {
    this.config = config;
    this.transferOptions = transferOptions;
    this.logger = logger.child({ component: 'compression-handler' });
    this.materializer = new DirectoryMaterializer(config.targetRoot, logger);
  }

  /**
   * Compress one newly created file into the target tree.
   * Never rejects.
   */
  async handle(event: FileEvent): Promise<FileOutcome> {
    const sourcePath = event.absoluteSourcePath;
    let relativePath: string | undefined;
    let targetFilePath: string | undefined;

    try {
      const canonicalPath = await this.canonicalize(sourcePath);
      const mapped = mapTargetPaths(this.config, canonicalPath);
      relativePath = mapped.relativePath;
      targetFilePath = mapped.targetFilePath;

      await this.materializer.ensure(mapped.targetParentDir);
      const result = await compressFile(canonicalPath, mapped.targetFilePath, this.transferOptions);

      this.logger.info(
        {
          relativePath,
          bytesRead: result.bytesRead,
          bytesWritten: result.bytesWritten,
        },
        'Compressed file'
      );

      return { sourcePath, relativePath, success: true, ...result };
    } catch (err) {
      this.logFailure(sourcePath, targetFilePath, err);
      return {
        sourcePath,
        relativePath,
        success: false,
        error: describeError(err),
        bytesRead: 0,
        bytesWritten: 0,
      };
    }
  }

  /** Resolve symlinks so the path compares against the canonical source root. */
  private async canonicalize(sourcePath: string): Promise<string> {
    try {
      return await fs.realpath(sourcePath);
    } catch (err) {
      throw new SourceUnreadableError(sourcePath, err);
    }
  }

  private logFailure(sourcePath: string, targetFilePath: string | undefined, err: unknown): void {
    const failedPath = err instanceof MirrorError ? err.path : sourcePath;
    const cause = err instanceof Error && err.cause !== undefined ? err.cause : err;

    this.logger.error(
      {
        path: failedPath,
        sourcePath,
        code: errorCode(cause),
        error: err instanceof Error ? err.name : 'Error',
      },
      `Unable to compress file: ${describeError(err)}`
    );

    if (hasPartialOutput(err) && targetFilePath !== undefined) {
      this.logger.warn({ path: targetFilePath }, 'Partial output file left in target');
    }
  }
}
