/**
 * Argument vectors for the configure, build, test and pack invocations
 */

import { existsSync } from 'fs';
import { join } from 'path';
import {
  BuildError,
  BuildErrorCode,
  BuildLayout,
  BuildOptions,
  CommandPlan,
  Platform,
  ToolchainDescriptor
} from './types.js';
import {
  CMAKE_FLAGS,
  DEFAULT_CONFIG,
  MIN_MAXCPUCOUNT_VS_VERSION,
  NATIVE_ARGS_SEPARATOR,
  defaultPackGenerator
} from './config.js';
import { effectiveVerbosity } from './options.js';
import { TargetSet, isLocalInstall, selectTargets } from './targets.js';

export interface CommandComposerOptions {
  /** Directory holding {toolchain}.cmake files */
  toolchainRoot: string;
  fileExists?: (path: string) => boolean;
}

/** What the composers read from the resolved context */
export interface CompositionContext {
  toolchain: ToolchainDescriptor;
  layout: BuildLayout;
}

/**
 * Native parallelism flags for `cmake --build ... --`. Drivers without a
 * known spelling get none.
 */
export function jobsArgs(descriptor: ToolchainDescriptor, jobs: number | undefined): string[] {
  if (!jobs) {
    return [];
  }
  if (descriptor.isXcode) {
    return ['-jobs', `${jobs}`];
  }
  if (descriptor.isMake && !descriptor.isNMake) {
    return ['-j', `${jobs}`];
  }
  if (descriptor.isMsvc && (descriptor.vsVersion ?? 0) >= MIN_MAXCPUCOUNT_VS_VERSION) {
    return [`/maxcpucount:${jobs}`];
  }
  return [];
}

/**
 * Resolve --pack to a generator name; `true` picks the platform default
 */
export function resolvePackGenerator(options: BuildOptions, platform: Platform): string | undefined {
  if (typeof options.pack === 'string') {
    return options.pack;
  }
  return options.pack ? defaultPackGenerator(platform) : undefined;
}

/**
 * Builds ordered token lists; token order is reproduced exactly as composed
 */
export class CommandComposer {
  private readonly fileExists: (path: string) => boolean;

  constructor(private readonly options: CommandComposerOptions) {
    this.fileExists = options.fileExists ?? existsSync;
  }

  /**
   * Location of the toolchain description file
   */
  toolchainFile(descriptor: ToolchainDescriptor): string {
    return join(this.options.toolchainRoot, `${descriptor.name}.cmake`);
  }

  composeConfigure(context: CompositionContext, options: BuildOptions, platform: Platform): string[] {
    const { toolchain, layout } = context;

    const toolchainFile = this.toolchainFile(toolchain);
    if (!this.fileExists(toolchainFile)) {
      throw new BuildError(BuildErrorCode.ToolchainFileNotFound, toolchainFile);
    }

    const command = ['cmake', `-H${options.home ?? DEFAULT_CONFIG.HOME}`, `-B${layout.buildDir}`];

    if (options.config && !toolchain.multiconfig) {
      command.push(`-DCMAKE_BUILD_TYPE=${options.config}`);
    }

    if (toolchain.generator) {
      command.push(`-G${toolchain.generator}`);
    }

    if (toolchain.xp && toolchain.vsVersion !== undefined) {
      command.push(`-Tv${toolchain.vsVersion}0_xp`);
    }

    command.push(`-DCMAKE_TOOLCHAIN_FILE=${toolchainFile}`);

    if (effectiveVerbosity(options) === 'full') {
      command.push(...CMAKE_FLAGS.VERBOSE);
    }

    if (options.iosMultiarch) {
      command.push(CMAKE_FLAGS.IOS_MULTIARCH);
    }

    if (options.iosCombined) {
      command.push(CMAKE_FLAGS.IOS_COMBINED);
    }

    if (isLocalInstall(options)) {
      command.push(`-DCMAKE_INSTALL_PREFIX=${layout.installDir}`);
    }

    const packGenerator = resolvePackGenerator(options, platform);
    if (packGenerator) {
      command.push(`-DCPACK_GENERATOR=${packGenerator}`);
    }

    // Duplicate keys are forwarded as given; cmake applies the last one
    for (const definition of options.fwd ?? []) {
      command.push(`-D${definition}`);
    }

    return command;
  }

  composeBuild(context: CompositionContext, options: BuildOptions, targets: TargetSet): string[] {
    const command = ['cmake', '--build', context.layout.buildDir];

    if (options.config) {
      command.push('--config', options.config);
    }

    command.push(...targets.args());

    // Everything after the separator goes to the native build tool
    command.push(NATIVE_ARGS_SEPARATOR);

    if (options.iossim) {
      command.push('-arch', 'i386', '-sdk', 'iphonesimulator');
    }

    command.push(...jobsArgs(context.toolchain, options.jobs));

    return command;
  }

  composeTest(context: CompositionContext, options: BuildOptions): string[] {
    const command = ['ctest'];

    if (options.config) {
      command.push('-C', options.config);
    }

    if (effectiveVerbosity(options) === 'full') {
      command.push('-VV');
    }

    if (options.timeout) {
      command.push('--timeout', `${options.timeout}`);
    }

    if (options.testXml) {
      command.push('-T', 'Test', '--no-compress-output');
    }

    return command;
  }

  composePack(context: CompositionContext, options: BuildOptions, platform: Platform): string[] {
    const command = ['cpack'];

    if (options.config) {
      command.push('-C', options.config);
    }

    const generator = resolvePackGenerator(options, platform);
    if (generator) {
      command.push('-G', generator);
    }

    if (effectiveVerbosity(options) === 'full') {
      command.push('--verbose');
    }

    return command;
  }

  /**
   * Compose every command the options call for
   */
  plan(context: CompositionContext, options: BuildOptions, platform: Platform): CommandPlan {
    const targets = selectTargets(options, context.toolchain);

    const plan: CommandPlan = {
      configure: this.composeConfigure(context, options, platform),
      build: this.composeBuild(context, options, targets)
    };

    if (options.test || options.testXml) {
      plan.test = this.composeTest(context, options);
    }

    if (options.pack) {
      plan.pack = this.composePack(context, options, platform);
    }

    return plan;
  }
}
