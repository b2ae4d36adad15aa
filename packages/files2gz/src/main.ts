/**
 * Process entry logic shared by the CLI: build options, run the daemon,
 * map failures to exit codes.
 */

import chalk from 'chalk';
import { buildWatchOptions } from './config.js';
import { MirrorDaemon } from './daemon/mirror-daemon.js';
import type { MirrorDaemonDependencies } from './daemon/mirror-daemon.js';
import { describeError, StartupError } from './errors.js';
import type { WatchOptions } from './types.js';

/**
 * Run the daemon until it is told to stop.
 * Startup problems are printed to stderr; the returned value is the exit status.
 */
export async function runDaemon(
  overrides?: Partial<WatchOptions>,
  deps?: MirrorDaemonDependencies
): Promise<number> {
  const options = buildWatchOptions(overrides);
  const daemon = new MirrorDaemon(options, deps);

  try {
    return await daemon.run();
  } catch (error) {
    if (error instanceof StartupError) {
      console.error(chalk.red('Error:'), error.message);
      return error.exitCode;
    }
    console.error(chalk.red('files2gz failed:'), describeError(error));
    return 1;
  }
}
