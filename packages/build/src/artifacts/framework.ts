/**
 * Apple framework bundle assembly from an install tree
 */

import { existsSync, readdirSync } from 'fs';
import { copyFile, cp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { BuildError, BuildErrorCode, BuildStage } from '../types.js';
import { PATHS, SIMULATOR_ARCHS, getAssetPath } from '../config.js';
import { ProcessRunner } from '../utils/process.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('framework');

export interface FrameworkRequest {
  installDir: string;
  frameworkDir: string;
  /** Framework (and binary) name */
  name: string;
  /** Minimum OS version written to Info.plist */
  minimumOsVersion?: string;
  /** Exclude simulator architectures */
  deviceOnly: boolean;
  /** User supplied Info.plist */
  plist?: string;
  /** Code signing identity */
  identity?: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Fill the Info.plist template; @NAME@ and @MINIMUM_OS_VERSION@ are replaced
 */
export function renderInfoPlist(template: string, name: string, minimumOsVersion?: string): string {
  return template
    .replace(/@NAME@/g, name)
    .replace(/@MINIMUM_OS_VERSION@/g, minimumOsVersion ?? '');
}

/**
 * Builds {frameworkDir}/{name}.framework with libtool, lipo and codesign
 */
export class FrameworkAssembler {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly templatePath: string = getAssetPath(PATHS.INFO_PLIST_TEMPLATE)
  ) {}

  async create(request: FrameworkRequest): Promise<string> {
    const libraries = this.findLibraries(request.installDir);
    const bundle = join(request.frameworkDir, `${request.name}.framework`);
    const binary = join(bundle, request.name);

    logger.step(`Creating framework ${bundle}`);
    await rm(bundle, { recursive: true, force: true });
    await mkdir(join(bundle, 'Headers'), { recursive: true });

    await this.exec(['libtool', '-static', '-o', binary, ...libraries], request);

    if (request.deviceOnly) {
      await this.removeSimulatorSlices(binary, request);
    }

    const headers = join(request.installDir, 'include');
    if (existsSync(headers)) {
      await cp(headers, join(bundle, 'Headers'), { recursive: true });
    }

    const plistPath = join(bundle, 'Info.plist');
    if (request.plist) {
      await copyFile(request.plist, plistPath);
    } else {
      const template = await readFile(this.templatePath, 'utf8');
      await writeFile(plistPath, renderInfoPlist(template, request.name, request.minimumOsVersion));
    }

    if (request.identity) {
      await this.exec(['codesign', '--force', '--sign', request.identity, binary], request);
    }

    logger.success(`Framework created: ${bundle}`);
    return bundle;
  }

  private findLibraries(installDir: string): string[] {
    const libDir = join(installDir, 'lib');
    const libraries = existsSync(libDir)
      ? readdirSync(libDir)
          .filter(entry => entry.endsWith('.a'))
          .sort()
          .map(entry => join(libDir, entry))
      : [];

    if (libraries.length === 0) {
      throw new BuildError(
        BuildErrorCode.ArtifactAssemblyFailed,
        `No static libraries found in ${libDir}`,
        { stage: BuildStage.Framework }
      );
    }

    return libraries;
  }

  private async removeSimulatorSlices(binary: string, request: FrameworkRequest): Promise<void> {
    const result = await this.runner.capture({
      argv: ['lipo', '-archs', binary],
      env: request.env,
      cwd: request.frameworkDir
    });

    if (result.exitCode !== 0) {
      throw new BuildError(BuildErrorCode.ExternalToolFailed, `lipo -archs exited with ${result.exitCode}`, {
        stage: BuildStage.Framework,
        exitCode: result.exitCode
      });
    }

    const present = result.stdout.trim().split(/\s+/);
    const simulator = SIMULATOR_ARCHS.filter(arch => present.includes(arch));
    if (simulator.length === 0) {
      return;
    }

    logger.info(`Removing simulator architectures: ${simulator.join(' ')}`);
    await this.exec(
      ['lipo', binary, ...simulator.flatMap(arch => ['-remove', arch]), '-output', binary],
      request
    );
  }

  private async exec(argv: string[], request: FrameworkRequest): Promise<void> {
    const exitCode = await this.runner.run({ argv, env: request.env, cwd: request.frameworkDir });
    if (exitCode !== 0) {
      throw new BuildError(BuildErrorCode.ExternalToolFailed, `${argv[0]} exited with ${exitCode}`, {
        stage: BuildStage.Framework,
        exitCode
      });
    }
  }
}
