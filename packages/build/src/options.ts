/**
 * Option validation performed before anything is composed or executed
 */

import { BuildError, BuildErrorCode, BuildOptions, Platform, Verbosity } from './types.js';
import { DEFAULT_CONFIG, PACK_GENERATORS } from './config.js';
import { assertInstallMode } from './targets.js';

/**
 * --verbose forces full verbosity
 */
export function effectiveVerbosity(options: BuildOptions): Verbosity {
  if (options.verbose) {
    return 'full';
  }
  return options.verbosityLevel ?? DEFAULT_CONFIG.VERBOSITY;
}

function assertPositive(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new BuildError(BuildErrorCode.InvalidOption, `--${name} should be greater than zero: ${value}`);
  }
}

/**
 * Validate a complete option set for a host platform
 */
export function validateOptions(options: BuildOptions, platform: Platform): void {
  assertInstallMode(options);

  if (options.verbose && options.verbosityLevel !== undefined) {
    throw new BuildError(BuildErrorCode.InvalidOption, '--verbose cannot be combined with --verbosity-level');
  }

  if ((options.framework || options.frameworkDevice) && platform !== Platform.Darwin) {
    throw new BuildError(BuildErrorCode.UnsupportedOnPlatform, 'Framework creation is only available on macOS');
  }

  assertPositive('jobs', options.jobs);
  assertPositive('timeout', options.timeout);
  assertPositive('discard', options.discard);
  assertPositive('tail', options.tail);

  if (typeof options.pack === 'string' && !PACK_GENERATORS.some(generator => generator === options.pack)) {
    throw new BuildError(
      BuildErrorCode.InvalidOption,
      `Unknown pack generator ${options.pack}, expected one of ${PACK_GENERATORS.join(', ')}`
    );
  }

  // Entries reach cmake as -D{entry} unchanged; only an empty one is meaningless
  if ((options.fwd ?? []).some(definition => definition.trim() === '')) {
    throw new BuildError(BuildErrorCode.InvalidOption, '--fwd entries must not be empty');
  }
}
