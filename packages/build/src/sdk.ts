/**
 * SDK root and vendor build-environment lookups
 */

import { existsSync, statSync } from 'fs';
import { join } from 'path';
import { Architecture, BuildError, BuildErrorCode, BuildStage } from './types.js';
import { ProcessRunner } from './utils/process.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('sdk');

export type SdkKind = 'ios' | 'osx';

/**
 * Finds the developer root of a specific Apple SDK version
 */
export interface SdkLocator {
  /** Resolves to null when no specific root is configured */
  developerRoot(kind: SdkKind, version: string, env: NodeJS.ProcessEnv): Promise<string | null>;
}

/**
 * Produces the complete shell environment a compiler version requires
 */
export interface VendorEnvironmentProvider {
  snapshot(
    vsVersion: number,
    arch: Architecture | undefined,
    env: NodeJS.ProcessEnv
  ): Promise<Record<string, string>>;
}

/**
 * Environment variable naming a developer root, e.g. IOS_12_1_DEVELOPER_DIR
 */
export function developerDirVariable(kind: SdkKind, version: string): string {
  return `${kind.toUpperCase()}_${version.replace(/\./g, '_')}_DEVELOPER_DIR`;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Reads developer roots from {IOS,OSX}_{version}_DEVELOPER_DIR
 */
export class EnvironmentSdkLocator implements SdkLocator {
  async developerRoot(kind: SdkKind, version: string, env: NodeJS.ProcessEnv): Promise<string | null> {
    const variable = developerDirVariable(kind, version);
    const root = env[variable];

    if (!root) {
      logger.debug(`${variable} not set, using system developer root`);
      return null;
    }

    if (!isDirectory(root)) {
      throw new BuildError(BuildErrorCode.InvalidSdkRoot, `${variable} points to a missing directory: ${root}`);
    }

    return root;
  }
}

/** vcvarsall.bat argument for each architecture */
const VCVARS_ARCH: Record<Architecture, string> = {
  [Architecture.X86]: 'x86',
  [Architecture.AMD64]: 'amd64',
  [Architecture.ARM]: 'x86_arm'
};

/**
 * vcvarsall.bat location relative to the VS{v}0COMNTOOLS directory;
 * Visual Studio 2017 moved it under VC/Auxiliary/Build
 */
export function vcvarsallPath(toolsDir: string, vsVersion: number): string {
  const vcDir = join(toolsDir, '..', '..', 'VC');
  return vsVersion >= 15 ? join(vcDir, 'Auxiliary', 'Build', 'vcvarsall.bat') : join(vcDir, 'vcvarsall.bat');
}

/**
 * Parse `set` output (NAME=value per line) into a variable map
 */
export function parseSetOutput(stdout: string): Record<string, string> {
  const variables: Record<string, string> = {};

  for (const line of stdout.split(/\r?\n/)) {
    const separator = line.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    variables[line.slice(0, separator)] = line.slice(separator + 1);
  }

  return variables;
}

/**
 * Captures the environment produced by Visual Studio's vcvarsall.bat
 */
export class VcVarsEnvironmentProvider implements VendorEnvironmentProvider {
  constructor(private readonly runner: ProcessRunner) {}

  async snapshot(
    vsVersion: number,
    arch: Architecture | undefined,
    env: NodeJS.ProcessEnv
  ): Promise<Record<string, string>> {
    const toolsVariable = `VS${vsVersion}0COMNTOOLS`;
    const tools = env[toolsVariable];
    if (!tools) {
      throw new BuildError(BuildErrorCode.MissingRequiredEnvVar, `${toolsVariable} is not set`);
    }

    const vcvarsall = vcvarsallPath(tools, vsVersion);
    if (!existsSync(vcvarsall)) {
      throw new BuildError(
        BuildErrorCode.MissingRequiredEnvVar,
        `${toolsVariable} does not lead to vcvarsall.bat: ${vcvarsall}`
      );
    }

    const vcvarsArch = VCVARS_ARCH[arch ?? Architecture.X86];
    logger.debug(`Capturing environment from ${vcvarsall} ${vcvarsArch}`);

    const result = await this.runner.capture({
      argv: ['cmd', '/c', `call "${vcvarsall}" ${vcvarsArch} && set`],
      env,
      cwd: process.cwd(),
      verbatim: true
    });

    if (result.exitCode !== 0) {
      throw new BuildError(
        BuildErrorCode.ExternalToolFailed,
        `vcvarsall.bat exited with ${result.exitCode}: ${result.stderr.trim()}`,
        { stage: BuildStage.Preflight, exitCode: result.exitCode }
      );
    }

    return parseSetOutput(result.stdout);
  }
}
