/**
 * Build target selection for `cmake --build`
 */

import { BuildError, BuildErrorCode, BuildOptions, ToolchainDescriptor } from './types.js';

export const INSTALL_TARGET = 'install';
export const INSTALL_STRIP_TARGET = 'install/strip';

/**
 * Ordered set of build targets; adding a name twice keeps the first position
 */
export class TargetSet {
  private readonly names: string[] = [];

  /**
   * Add a target when the condition holds
   */
  add(condition: unknown, name: string | undefined): this {
    if (!condition || !name || this.names.includes(name)) {
      return this;
    }
    this.names.push(name);
    return this;
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  toArray(): string[] {
    return [...this.names];
  }

  get size(): number {
    return this.names.length;
  }

  /**
   * Arguments for `cmake --build`
   */
  args(): string[] {
    return this.names.length > 0 ? ['--target', ...this.names] : [];
  }
}

/**
 * Whether the run installs into the local install directory
 */
export function isLocalInstall(options: BuildOptions): boolean {
  return Boolean(
    options.install || options.strip || options.framework || options.frameworkDevice || options.archive
  );
}

/**
 * Reject --install together with --strip
 */
export function assertInstallMode(options: BuildOptions): void {
  if (options.install && options.strip) {
    throw new BuildError(BuildErrorCode.ConflictingInstallMode, 'Both --install and --strip specified');
  }
}

/**
 * Compose the target list: install (or install/strip) first, then --target
 */
export function selectTargets(options: BuildOptions, descriptor: ToolchainDescriptor): TargetSet {
  assertInstallMode(options);

  const localInstall = isLocalInstall(options);
  const installTarget = options.strip ? INSTALL_STRIP_TARGET : INSTALL_TARGET;

  const targets = new TargetSet()
    .add(localInstall, installTarget)
    .add(options.target, options.target);

  if (options.strip && !descriptor.isMake) {
    throw new BuildError(
      BuildErrorCode.UnsupportedStripTarget,
      `install/strip is only available for Makefile generators, ${descriptor.name} uses ${descriptor.generator || 'the default generator'}`
    );
  }

  return targets;
}
