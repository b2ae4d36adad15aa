import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { vi } from 'vitest';
import type { Logger } from 'pino';

export interface MockLogger {
  info: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
  child: ReturnType<typeof vi.fn>;
}

/**
 * Logger whose children are the same object, so calls made by any
 * component land on one set of mocks.
 */
export function createMockLogger(): { mock: MockLogger; logger: Logger } {
  const mock: MockLogger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  mock.child.mockReturnValue(mock);
  return { mock, logger: mock as unknown as Logger };
}

/** Temp directory with symlinks resolved (macOS /var → /private/var). */
export function makeTempDir(prefix: string): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 8000,
  intervalMs = 20
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await sleep(intervalMs);
  }
}

/** All entries below `dir`, relative, sorted. */
export function listTree(dir: string): string[] {
  return fs.readdirSync(dir, { recursive: true, encoding: 'utf-8' }).sort();
}
