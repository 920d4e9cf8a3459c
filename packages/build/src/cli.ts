#!/usr/bin/env node
/**
 * CLI interface for buildpilot
 */

import { Command, InvalidArgumentError, Option, OptionValues } from 'commander';
import { BuildOptions, Verbosity, isBuildError } from './types.js';
import { PACK_GENERATORS, VERSION, loadEnvironmentConfig } from './config.js';
import { ToolchainTable, formatToolchainList, getBuiltinToolchainTable } from './toolchains/table.js';
import { BuildPipeline } from './pipeline.js';
import { configureLogger, createLogger } from './utils/logger.js';

const logger = createLogger('cli');

const VERBOSITY_LEVELS: Verbosity[] = ['silent', 'normal', 'full'];

/**
 * Parser for options that take a positive integer
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Should be greater than zero: ${value}`);
  }
  return parsed;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function asFlag(value: unknown): boolean {
  return value === true;
}

function asVerbosity(value: unknown): Verbosity | undefined {
  return VERBOSITY_LEVELS.find(level => level === value);
}

/**
 * Map commander's option values onto typed build options
 */
export function toBuildOptions(values: OptionValues): BuildOptions {
  const pack: unknown = values.pack;
  const fwd: unknown = values.fwd;

  return {
    toolchain: asString(values.toolchain),
    config: asString(values.config),
    home: asString(values.home),
    output: asString(values.output),
    toolchainRoot: asString(values.toolchainRoot),
    test: asFlag(values.test),
    testXml: asString(values.testXml),
    timeout: asNumber(values.timeout),
    pack: typeof pack === 'string' || pack === true ? pack : undefined,
    archive: asString(values.archive),
    nobuild: asFlag(values.nobuild),
    open: asFlag(values.open),
    verbosityLevel: asVerbosity(values.verbosityLevel),
    verbose: asFlag(values.verbose),
    install: asFlag(values.install),
    strip: asFlag(values.strip),
    iosMultiarch: asFlag(values.iosMultiarch),
    iosCombined: asFlag(values.iosCombined),
    framework: asFlag(values.framework),
    frameworkDevice: asFlag(values.frameworkDevice),
    identity: asString(values.identity),
    plist: asString(values.plist),
    clear: asFlag(values.clear),
    reconfig: asFlag(values.reconfig),
    fwd: Array.isArray(fwd) ? fwd.filter((entry): entry is string => typeof entry === 'string') : undefined,
    iossim: asFlag(values.iossim),
    jobs: asNumber(values.jobs),
    target: asString(values.target),
    discard: asNumber(values.discard),
    tail: asNumber(values.tail)
  };
}

/**
 * Build the command line program; `action` receives the parsed options
 */
export function createProgram(
  table: ToolchainTable,
  action: (options: BuildOptions) => Promise<void>
): Command {
  const program = new Command();

  program
    .name('buildpilot')
    .description(
      `Configure, build, test and pack a CMake project.\n\nAvailable toolchains:\n${formatToolchainList(table)}`
    )
    .version(VERSION)
    .addOption(new Option('--toolchain <name>', 'CMake generator/toolchain').choices(table.names()))
    .option('--config <name>', 'CMake build type (Release, Debug, ...)')
    .option('--home <dir>', 'Project home directory (directory with CMakeLists.txt)')
    .option('--output <dir>', 'Root directory for _builds, _install, _framework and _archives')
    .option('--toolchain-root <dir>', 'Directory holding <toolchain>.cmake files')
    .option('--test', 'Run ctest after build')
    .option('--test-xml <path>', 'Save ctest output to xml')
    .addOption(new Option('--pack [generator]', 'Run cpack after build').choices([...PACK_GENERATORS]))
    .option('--archive <name>', 'Create an archive of locally installed files')
    .option('--nobuild', 'Do not build (only generate)')
    .option('--open', 'Open generated project (for IDE)')
    .addOption(
      new Option('--verbosity-level <level>', 'Verbosity level')
        .choices(VERBOSITY_LEVELS)
        .conflicts('verbose')
    )
    .option('--verbose', 'Full verbose output')
    .option('--install', 'Run install (local directory)')
    .option('--strip', 'Run strip/install cmake targets')
    .option('--ios-multiarch', 'Build multi-architecture binary (CMAKE_XCODE_ATTRIBUTE_ONLY_ACTIVE_ARCH=NO)')
    .option('--ios-combined', 'Combine iOS simulator and device libraries on install (CMAKE_IOS_INSTALL_COMBINED=YES)')
    .option('--framework', 'Create framework')
    .option('--framework-device', 'Create framework for device (exclude simulator architectures)')
    .option('--identity <name>', 'Code signing identity for --framework')
    .option('--plist <path>', 'User specified Info.plist file for --framework')
    .option('--clear', 'Remove build and install dirs before build')
    .option('--reconfig', 'Run configure even if CMakeCache.txt exists')
    .option('--fwd <definitions...>', "Arguments to cmake without '-D', like BOOST_ROOT=/some/path")
    .option('--iossim', 'Build for ios i386 simulator')
    .option('--jobs <n>', 'Number of concurrent build operations', parsePositiveInt)
    .option('--target <name>', "Target to build for the 'cmake --build' command")
    .option('--discard <n>', 'Echo only every Nth line of tool output (full log is kept)', parsePositiveInt)
    .option('--tail <n>', 'Print last N lines if build failed', parsePositiveInt)
    .option('--timeout <n>', 'Timeout for CTest', parsePositiveInt)
    .action(async () => {
      await action(toBuildOptions(program.opts()));
    });

  return program;
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const envConfig = loadEnvironmentConfig();
  configureLogger({
    level: envConfig.logLevel,
    colors: envConfig.colors && Boolean(process.stdout.isTTY)
  });

  const table = getBuiltinToolchainTable();
  const program = createProgram(table, async options => {
    const pipeline = new BuildPipeline({ table, toolchainRoot: envConfig.toolchainRoot });
    await pipeline.run({ ...options, toolchain: options.toolchain ?? envConfig.toolchain });
  });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (isBuildError(error)) {
      logger.failure(error.message);
    } else {
      logger.failure(error instanceof Error ? error.stack ?? error.message : String(error));
    }
    return 1;
  }
}

if (require.main === module) {
  void main().then(code => {
    process.exitCode = code;
  });
}
