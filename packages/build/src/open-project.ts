/**
 * Opens the generated IDE project
 */

import { readdirSync } from 'fs';
import { join } from 'path';
import { BuildError, BuildErrorCode, BuildStage, ToolchainDescriptor } from './types.js';
import { ProcessRunner } from './utils/process.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('open');

export class ProjectOpener {
  constructor(private readonly runner: ProcessRunner) {}

  /**
   * Open the .xcodeproj or .sln in the build directory; resolves to false
   * when the generator produces no IDE project
   */
  async open(descriptor: ToolchainDescriptor, buildDir: string, env: NodeJS.ProcessEnv): Promise<boolean> {
    const argv = this.openCommand(descriptor, buildDir);
    if (!argv) {
      return false;
    }

    const exitCode = await this.runner.run({ argv, env, cwd: buildDir });
    if (exitCode !== 0) {
      throw new BuildError(BuildErrorCode.ExternalToolFailed, `${argv.join(' ')} exited with ${exitCode}`, {
        stage: BuildStage.Open,
        exitCode
      });
    }
    return true;
  }

  private openCommand(descriptor: ToolchainDescriptor, buildDir: string): string[] | null {
    if (descriptor.isXcode) {
      const project = this.find(buildDir, '.xcodeproj');
      return project ? ['open', project] : null;
    }

    if (descriptor.isMsvc) {
      const solution = this.find(buildDir, '.sln');
      return solution ? ['cmd', '/c', 'start', '', solution] : null;
    }

    logger.warn(`Toolchain ${descriptor.name} does not generate an IDE project`);
    return null;
  }

  private find(buildDir: string, extension: string): string | null {
    const entry = readdirSync(buildDir)
      .filter(name => name.endsWith(extension))
      .sort()[0];

    if (!entry) {
      logger.warn(`No ${extension} found in ${buildDir}`);
      return null;
    }
    return join(buildDir, entry);
  }
}
