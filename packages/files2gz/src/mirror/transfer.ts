/**
 * Stream copy of a source file into a gzip-compressed destination file.
 *
 * Data flows through Node streams with a bounded chunk size, so the size
 * of the source file does not affect memory use.
 */

import * as fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import * as zlib from 'node:zlib';
import { DestinationWriteError, errorCode, SourceUnreadableError } from '../errors.js';
import type { TransferResult } from '../types.js';

export interface TransferOptions {
  /** gzip compression level (1-9) */
  compressionLevel: number;
  /** Read/write chunk size in bytes */
  chunkSize: number;
}

async function openSource(sourcePath: string): Promise<FileHandle> {
  // Checked before open: opening a FIFO for reading blocks until a writer appears
  await assertRegularFile(sourcePath);

  let handle: FileHandle;
  try {
    handle = await fs.open(sourcePath, 'r');
  } catch (err) {
    throw new SourceUnreadableError(sourcePath, err);
  }

  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      throw new SourceUnreadableError(sourcePath, new Error('Not a regular file'));
    }
  } catch (err) {
    await handle.close();
    throw err instanceof SourceUnreadableError ? err : new SourceUnreadableError(sourcePath, err);
  }

  return handle;
}

async function assertRegularFile(sourcePath: string): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await fs.stat(sourcePath)).isFile();
  } catch (err) {
    throw new SourceUnreadableError(sourcePath, err);
  }
  if (!isFile) {
    throw new SourceUnreadableError(sourcePath, new Error('Not a regular file'));
  }
}

async function openDestination(destinationPath: string): Promise<FileHandle> {
  try {
    return await fs.open(destinationPath, 'w');
  } catch (err) {
    throw new DestinationWriteError(destinationPath, err);
  }
}

/**
 * Pipe source → gzip → destination and fsync the destination.
 * Any error from here on leaves a partial destination file.
 */
async function copyCompressed(
  source: FileHandle,
  destination: FileHandle,
  sourcePath: string,
  destinationPath: string,
  options: TransferOptions
): Promise<TransferResult> {
  const reader = source.createReadStream({
    start: 0,
    highWaterMark: options.chunkSize,
    autoClose: false,
  });
  const gzip = zlib.createGzip({ level: options.compressionLevel, chunkSize: options.chunkSize });
  const writer = destination.createWriteStream({ autoClose: false });

  let sourceFailed = false;
  reader.on('error', () => {
    sourceFailed = true;
  });

  try {
    await pipeline(reader, gzip, writer);
  } catch (err) {
    if (sourceFailed) {
      throw new SourceUnreadableError(sourcePath, err, true);
    }
    throw new DestinationWriteError(destinationPath, err, true);
  }

  try {
    await destination.sync();
  } catch (err) {
    throw new DestinationWriteError(destinationPath, err, true);
  }

  return { bytesRead: reader.bytesRead, bytesWritten: writer.bytesWritten };
}

/** Errors from directory fsync on file systems that do not support it */
const UNSUPPORTED_DIR_SYNC = new Set(['EINVAL', 'ENOTSUP', 'EISDIR']);

/**
 * fsync a directory so a newly created entry in it is durable.
 * File systems that cannot fsync directories are skipped.
 *
 * @throws DestinationWriteError if the directory cannot be opened or synced
 */
export async function syncDirectory(directory: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await fs.open(directory, 'r');
  } catch (err) {
    throw new DestinationWriteError(directory, err, true);
  }

  try {
    await handle.sync();
  } catch (err) {
    const code = errorCode(err);
    if (code === undefined || !UNSUPPORTED_DIR_SYNC.has(code)) {
      throw new DestinationWriteError(directory, err, true);
    }
  } finally {
    await handle.close();
  }
}

/**
 * Write a gzip-compressed copy of `sourcePath` to `destinationPath`,
 * creating or truncating the destination. The parent directory must exist.
 *
 * On failure after the destination was opened, the partial file is left in
 * place and the thrown error has `partialOutput` set.
 *
 * @throws SourceUnreadableError if the source is missing, unreadable or not a regular file
 * @throws DestinationWriteError if the destination cannot be written
 */
export async function compressFile(
  sourcePath: string,
  destinationPath: string,
  options: TransferOptions
): Promise<TransferResult> {
  const source = await openSource(sourcePath);

  try {
    const destination = await openDestination(destinationPath);
    let result: TransferResult;
    try {
      result = await copyCompressed(source, destination, sourcePath, destinationPath, options);
    } catch (err) {
      await destination.close();
      throw err;
    }

    try {
      await destination.close();
    } catch (err) {
      throw new DestinationWriteError(destinationPath, err, true);
    }
    await syncDirectory(path.dirname(destinationPath));
    return result;
  } finally {
    await source.close();
  }
}
