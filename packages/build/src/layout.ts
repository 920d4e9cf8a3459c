/**
 * Directory layout for build, install, framework and archive trees
 */

import { accessSync, constants, statSync } from 'fs';
import { join, resolve } from 'path';
import { BuildError, BuildErrorCode, BuildLayout, ToolchainDescriptor } from './types.js';
import { PATHS } from './config.js';

/**
 * Directory partition key. Multi-config generators share one configure step
 * across configurations, so their tag never carries the config.
 */
export function buildTagFor(descriptor: ToolchainDescriptor, config?: string): string {
  if (config && !descriptor.multiconfig) {
    return `${descriptor.name}-${config}`;
  }
  return descriptor.name;
}

/**
 * Computes collision-free paths keyed by toolchain name and build tag
 */
export class LayoutPlanner {
  constructor(private readonly cwd: string = process.cwd()) {}

  plan(rootDir: string | undefined, descriptor: ToolchainDescriptor, config?: string): BuildLayout {
    const root = rootDir === undefined ? this.cwd : this.validateRoot(rootDir);
    const buildTag = buildTagFor(descriptor, config);

    return {
      root,
      buildTag,
      buildDir: join(root, PATHS.BUILDS, buildTag),
      installDir: join(root, PATHS.INSTALL, descriptor.name),
      frameworkDir: join(root, PATHS.FRAMEWORK, descriptor.name),
      archivesDir: join(root, PATHS.ARCHIVES, descriptor.name),
      logFile: join(root, PATHS.LOGS, buildTag, PATHS.LOG_FILE)
    };
  }

  private validateRoot(rootDir: string): string {
    const root = resolve(this.cwd, rootDir);

    let isDirectory = false;
    try {
      isDirectory = statSync(root).isDirectory();
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.InvalidRoot,
        `Specified build directory does not exist: ${root}`,
        { cause: error instanceof Error ? error : undefined }
      );
    }
    if (!isDirectory) {
      throw new BuildError(BuildErrorCode.InvalidRoot, `Specified build directory is not a directory: ${root}`);
    }

    try {
      accessSync(root, constants.W_OK);
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.InvalidRoot,
        `Specified build directory is not writable: ${root}`,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    return root;
  }
}
