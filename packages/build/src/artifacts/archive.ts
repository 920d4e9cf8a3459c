/**
 * Archive of locally installed files
 */

import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { join } from 'path';
import { BuildError, BuildErrorCode, BuildStage } from '../types.js';
import { ProcessRunner } from '../utils/process.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('archive');

export interface ArchiveRequest {
  installDir: string;
  archivesDir: string;
  /** Base name given with --archive */
  name: string;
  toolchain: string;
  config?: string;
  env: NodeJS.ProcessEnv;
}

/**
 * {name}-{toolchain}[-{config}].tar.gz
 */
export function archiveFileName(name: string, toolchain: string, config?: string): string {
  const suffix = config ? `-${config}` : '';
  return `${name}-${toolchain}${suffix}.tar.gz`;
}

/**
 * Packs the install tree with `cmake -E tar`
 */
export class ArchiveAssembler {
  constructor(private readonly runner: ProcessRunner) {}

  async create(request: ArchiveRequest): Promise<string> {
    if (!existsSync(request.installDir)) {
      throw new BuildError(
        BuildErrorCode.ArtifactAssemblyFailed,
        `Install directory does not exist: ${request.installDir}`,
        { stage: BuildStage.Archive }
      );
    }

    await mkdir(request.archivesDir, { recursive: true });
    const archivePath = join(
      request.archivesDir,
      archiveFileName(request.name, request.toolchain, request.config)
    );

    logger.step(`Creating archive ${archivePath}`);
    const exitCode = await this.runner.run({
      argv: ['cmake', '-E', 'tar', 'cfz', archivePath, '.'],
      env: request.env,
      cwd: request.installDir
    });

    if (exitCode !== 0) {
      throw new BuildError(BuildErrorCode.ExternalToolFailed, `cmake -E tar exited with ${exitCode}`, {
        stage: BuildStage.Archive,
        exitCode
      });
    }

    return archivePath;
  }
}
