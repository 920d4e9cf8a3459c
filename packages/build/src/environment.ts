/**
 * Environment overlay derivation for a resolved toolchain
 */

import { statSync } from 'fs';
import { delimiter } from 'path';
import {
  BuildError,
  BuildErrorCode,
  EnvironmentOverlay,
  ToolchainDescriptor
} from './types.js';
import { ENV_VARS, PATHS, getAssetPath } from './config.js';
import { SdkLocator, SdkKind, VendorEnvironmentProvider } from './sdk.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('environment');

export interface EnvironmentComposerOptions {
  sdkLocator: SdkLocator;
  vendorEnvironment: VendorEnvironmentProvider;
  /** xcconfig disabling code signing */
  noCodeSignConfig?: string;
}

/** Mutable draft the rules write into before it is frozen */
interface OverlayDraft {
  replaceInherited: boolean;
  variables: Record<string, string>;
  pathPrefixes: string[];
}

/**
 * Composes the environment overlay for a toolchain. Rules run in declaration
 * order; only PATH prefixes depend on that order.
 */
export class EnvironmentComposer {
  private readonly noCodeSignConfig: string;

  constructor(private readonly options: EnvironmentComposerOptions) {
    this.noCodeSignConfig = options.noCodeSignConfig ?? getAssetPath(PATHS.NO_CODE_SIGN_XCCONFIG);
  }

  async compose(
    descriptor: ToolchainDescriptor,
    sourceEnv: NodeJS.ProcessEnv = process.env
  ): Promise<EnvironmentOverlay> {
    const draft: OverlayDraft = { replaceInherited: false, variables: {}, pathPrefixes: [] };

    this.applyCrossCompilerRoot(draft, descriptor, sourceEnv);
    await this.applyVendorEnvironment(draft, descriptor, sourceEnv);
    await this.applyDeveloperRoot(draft, 'ios', descriptor.iosVersion, sourceEnv);
    this.applyNoCodeSign(draft, descriptor);
    await this.applyDeveloperRoot(draft, 'osx', descriptor.osxVersion, sourceEnv);

    return Object.freeze({
      replaceInherited: draft.replaceInherited,
      variables: Object.freeze({ ...draft.variables }),
      pathPrefixes: Object.freeze([...draft.pathPrefixes])
    });
  }

  private applyCrossCompilerRoot(
    draft: OverlayDraft,
    descriptor: ToolchainDescriptor,
    sourceEnv: NodeJS.ProcessEnv
  ): void {
    const variable = descriptor.rootEnvVar;
    if (!variable) {
      return;
    }

    const root = sourceEnv[variable];
    if (!root) {
      throw new BuildError(
        BuildErrorCode.MissingRequiredEnvVar,
        `${variable} must be set for toolchain ${descriptor.name}`
      );
    }

    let isDirectory = false;
    try {
      isDirectory = statSync(root).isDirectory();
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.MissingRequiredEnvVar,
        `${variable} points to a missing path: ${root}`,
        { cause: error instanceof Error ? error : undefined }
      );
    }
    if (!isDirectory) {
      throw new BuildError(BuildErrorCode.MissingRequiredEnvVar, `${variable} is not a directory: ${root}`);
    }

    logger.debug(`Prefixing PATH with ${root}`);
    draft.pathPrefixes.push(root);
  }

  private async applyVendorEnvironment(
    draft: OverlayDraft,
    descriptor: ToolchainDescriptor,
    sourceEnv: NodeJS.ProcessEnv
  ): Promise<void> {
    const vsNinja = descriptor.isNinja && descriptor.vsVersion !== undefined;
    if (!descriptor.isNMake && !vsNinja) {
      return;
    }

    if (descriptor.vsVersion === undefined) {
      throw new BuildError(
        BuildErrorCode.InvalidToolchainTable,
        `NMake toolchain ${descriptor.name} has no vsVersion`
      );
    }

    const snapshot = await this.options.vendorEnvironment.snapshot(
      descriptor.vsVersion,
      descriptor.arch,
      sourceEnv
    );

    logger.debug(`Replacing environment with Visual Studio ${descriptor.vsVersion} snapshot`);
    draft.replaceInherited = true;
    draft.variables = { ...snapshot, ...draft.variables };
  }

  private async applyDeveloperRoot(
    draft: OverlayDraft,
    kind: SdkKind,
    version: string | undefined,
    sourceEnv: NodeJS.ProcessEnv
  ): Promise<void> {
    if (!version) {
      return;
    }

    const root = await this.options.sdkLocator.developerRoot(kind, version, sourceEnv);
    if (root) {
      logger.info(`Set environment ${ENV_VARS.DEVELOPER_DIR} to ${root}`);
      draft.variables[ENV_VARS.DEVELOPER_DIR] = root;
    }
  }

  private applyNoCodeSign(draft: OverlayDraft, descriptor: ToolchainDescriptor): void {
    if (!descriptor.noCodeSign) {
      return;
    }

    logger.info(`Set environment ${ENV_VARS.XCODE_XCCONFIG_FILE} to ${this.noCodeSignConfig}`);
    draft.variables[ENV_VARS.XCODE_XCCONFIG_FILE] = this.noCodeSignConfig;
  }
}

/**
 * Apply an overlay to an inherited environment, producing the environment of
 * one child process. The inherited environment is not modified.
 */
export function applyOverlay(
  overlay: EnvironmentOverlay,
  inherited: NodeJS.ProcessEnv = process.env,
  pathDelimiter: string = delimiter
): Record<string, string> {
  const env: Record<string, string> = {};

  if (!overlay.replaceInherited) {
    for (const [key, value] of Object.entries(inherited)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }
  }

  Object.assign(env, overlay.variables);

  if (overlay.pathPrefixes.length > 0) {
    const pathKey = Object.keys(env).find(key => key.toUpperCase() === ENV_VARS.PATH) ?? ENV_VARS.PATH;
    const existing = env[pathKey];
    const entries = existing ? [...overlay.pathPrefixes, existing] : [...overlay.pathPrefixes];
    env[pathKey] = entries.join(pathDelimiter);
  }

  return env;
}
