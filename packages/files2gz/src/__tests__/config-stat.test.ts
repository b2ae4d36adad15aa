import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { resolveWatchConfig } from '../config.js';
import { EX_IOERR, StartupError } from '../errors.js';
import { DEFAULT_WATCH_OPTIONS } from '../types.js';
import { makeTempDir } from './helpers.js';

// Keep the real fs/promises, but let each test decide what stat() does
vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, stat: vi.fn() };
});

import { stat } from 'node:fs/promises';

const mockStat = vi.mocked(stat);

describe('resolveWatchConfig when the source cannot be stat-ed', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir('files2gz-config-stat-test-');
    fs.mkdirSync(path.join(tmpDir, 'src'));
    mockStat.mockReset();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should fail with EX_IOERR after realpath succeeded', async () => {
    const sourceDir = path.join(tmpDir, 'src');
    const denied = Object.assign(new Error('permission denied'), { code: 'EACCES' });
    mockStat.mockRejectedValue(denied);

    const caught = await resolveWatchConfig({
      ...DEFAULT_WATCH_OPTIONS,
      sourceDir,
      targetDir: path.join(tmpDir, 'dst'),
    }).catch((err: unknown) => err);

    expect(caught).toBeInstanceOf(StartupError);
    expect(caught).toMatchObject({
      exitCode: EX_IOERR,
      message: `Unable to access directory "${sourceDir}": permission denied`,
      cause: denied,
    });
    expect(fs.existsSync(path.join(tmpDir, 'dst'))).toBe(false);
  });
});
