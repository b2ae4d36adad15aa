import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as zlib from 'node:zlib';
import { CompressionHandler } from '../mirror/event-handler.js';
import type { WatchConfig } from '../types.js';
import { createMockLogger, listTree, makeTempDir } from './helpers.js';
import type { MockLogger } from './helpers.js';

describe('CompressionHandler', () => {
  let tmpDir: string;
  let config: WatchConfig;
  let mock: MockLogger;
  let handler: CompressionHandler;

  function writeSource(relativePath: string, content: string): string {
    const file = path.join(config.sourceRoot, relativePath);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    tmpDir = makeTempDir('files2gz-handler-test-');
    config = {
      sourceRoot: path.join(tmpDir, 'src'),
      targetRoot: path.join(tmpDir, 'dst'),
    };
    fs.mkdirSync(config.sourceRoot);
    fs.mkdirSync(config.targetRoot);

    const created = createMockLogger();
    mock = created.mock;
    handler = new CompressionHandler(
      config,
      { compressionLevel: 6, chunkSize: 16 * 1024 },
      created.logger
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should compress a file into the mirrored location', async () => {
    const source = writeSource(path.join('reports', 'q1.csv'), 'a,b\n1,2\n');

    const outcome = await handler.handle({ absoluteSourcePath: source });

    expect(outcome.success).toBe(true);
    expect(outcome.relativePath).toBe(path.join('reports', 'q1.csv'));
    expect(outcome.bytesRead).toBe(8);

    const gz = fs.readFileSync(path.join(config.targetRoot, 'reports', 'q1.csv.gz'));
    expect(zlib.gunzipSync(gz).toString('utf-8')).toBe('a,b\n1,2\n');
  });

  it('should log the compressed relative path', async () => {
    const source = writeSource(path.join('reports', 'q1.csv'), 'a,b\n1,2\n');

    await handler.handle({ absoluteSourcePath: source });

    expect(mock.info).toHaveBeenCalledWith(
      expect.objectContaining({ relativePath: path.join('reports', 'q1.csv') }),
      'Compressed file'
    );
    expect(mock.info).toHaveBeenCalledWith(
      { directory: 'reports' },
      'Created directory in target'
    );
    expect(mock.error).not.toHaveBeenCalled();
  });

  it('should mirror the directory structure and nothing else', async () => {
    const first = writeSource(path.join('a', 'b', 'c.txt'), 'c');
    const second = writeSource(path.join('a', 'd.txt'), 'd');

    await handler.handle({ absoluteSourcePath: first });
    await handler.handle({ absoluteSourcePath: second });

    expect(listTree(config.targetRoot)).toEqual([
      'a',
      path.join('a', 'b'),
      path.join('a', 'b', 'c.txt.gz'),
      path.join('a', 'd.txt.gz'),
    ]);
  });

  it('should handle concurrent events for files in the same directory', async () => {
    const files = ['one', 'two', 'three', 'four'].map((name) =>
      writeSource(path.join('batch', `${name}.log`), `${name}\n`)
    );

    const outcomes = await Promise.all(
      files.map((file) => handler.handle({ absoluteSourcePath: file }))
    );

    expect(outcomes.every((o) => o.success)).toBe(true);
    expect(listTree(path.join(config.targetRoot, 'batch'))).toEqual([
      'four.log.gz',
      'one.log.gz',
      'three.log.gz',
      'two.log.gz',
    ]);
  });

  it('should overwrite the output when the same file is created again', async () => {
    const source = writeSource('note.txt', 'first');
    await handler.handle({ absoluteSourcePath: source });

    fs.writeFileSync(source, 'second');
    await handler.handle({ absoluteSourcePath: source });

    const gz = fs.readFileSync(path.join(config.targetRoot, 'note.txt.gz'));
    expect(zlib.gunzipSync(gz).toString('utf-8')).toBe('second');
  });

  it('should report a vanished source without throwing', async () => {
    const missing = path.join(config.sourceRoot, 'gone.txt');

    const outcome = await handler.handle({ absoluteSourcePath: missing });

    expect(outcome.success).toBe(false);
    expect(outcome.relativePath).toBeUndefined();
    expect(mock.error).toHaveBeenCalledWith(
      expect.objectContaining({ path: missing, code: 'ENOENT', error: 'SourceUnreadableError' }),
      expect.stringContaining('Unable to compress file')
    );
  });

  it('should report files outside the watched tree', async () => {
    const outside = path.join(tmpDir, 'elsewhere.txt');
    fs.writeFileSync(outside, 'x');

    const outcome = await handler.handle({ absoluteSourcePath: outside });

    expect(outcome.success).toBe(false);
    expect(mock.error).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'OutsideWatchedTreeError' }),
      expect.stringContaining('not inside the watched directory')
    );
    expect(fs.existsSync(path.join(tmpDir, 'elsewhere.txt.gz'))).toBe(false);
  });

  it('should keep working after a failed file', async () => {
    // A regular file where a directory is needed
    fs.writeFileSync(path.join(config.targetRoot, 'blocked'), 'in the way');
    const bad = writeSource(path.join('blocked', 'x.txt'), 'x');
    const good = writeSource('y.txt', 'y');

    const failed = await handler.handle({ absoluteSourcePath: bad });
    const succeeded = await handler.handle({ absoluteSourcePath: good });

    expect(failed.success).toBe(false);
    expect(failed.relativePath).toBe(path.join('blocked', 'x.txt'));
    expect(mock.error).toHaveBeenCalledWith(
      expect.objectContaining({
        path: path.join(config.targetRoot, 'blocked'),
        error: 'DirectoryCreateError',
      }),
      expect.any(String)
    );

    expect(succeeded.success).toBe(true);
    const gz = fs.readFileSync(path.join(config.targetRoot, 'y.txt.gz'));
    expect(zlib.gunzipSync(gz).toString('utf-8')).toBe('y');
  });

  it('should follow symlinks to files inside the tree', async () => {
    const real = writeSource('real.txt', 'linked content');
    const link = path.join(config.sourceRoot, 'link.txt');
    fs.symlinkSync(real, link);

    const outcome = await handler.handle({ absoluteSourcePath: link });

    expect(outcome.success).toBe(true);
    expect(outcome.relativePath).toBe('real.txt');
  });

  it.skipIf(!fs.existsSync('/dev/full'))(
    'should warn about the partial file left after a failed write',
    async () => {
      const source = writeSource('big.log', 'line of text\n'.repeat(10_000));
      const targetFile = path.join(config.targetRoot, 'big.log.gz');
      fs.symlinkSync('/dev/full', targetFile);

      const outcome = await handler.handle({ absoluteSourcePath: source });

      expect(outcome.success).toBe(false);
      expect(mock.error).toHaveBeenCalledWith(
        expect.objectContaining({ code: 'ENOSPC', error: 'DestinationWriteError' }),
        expect.stringContaining('Unable to compress file')
      );
      expect(mock.warn).toHaveBeenCalledWith(
        { path: targetFile },
        'Partial output file left in target'
      );
    }
  );

  it('should not warn about partial output when the source is missing', async () => {
    const outcome = await handler.handle({
      absoluteSourcePath: path.join(config.sourceRoot, 'vanished.txt'),
    });

    expect(outcome.success).toBe(false);
    expect(mock.warn).not.toHaveBeenCalled();
  });
});
