/**
 * Orchestrator configuration and constants
 */

import { join, resolve } from 'path';
import { Platform, LogLevel, Verbosity } from './types.js';

/** Orchestrator version reported by --version */
export const VERSION = '0.1.0';

const DEFAULT_VERBOSITY: Verbosity = 'normal';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  /** Console verbosity for tool output */
  VERBOSITY: DEFAULT_VERBOSITY,

  /** Default log level */
  LOG_LEVEL: LogLevel.Info,

  /** Project home when --home is not given */
  HOME: '.',

  /** Directory holding {toolchain}.cmake files, relative to the working directory */
  TOOLCHAIN_ROOT: 'toolchains'
};

/** Directory names under the output root */
export const PATHS = {
  BUILDS: '_builds',
  INSTALL: '_install',
  FRAMEWORK: '_framework',
  ARCHIVES: '_archives',
  LOGS: '_logs',
  LOG_FILE: 'log.txt',

  /** CMake cache marking a configured build directory */
  CMAKE_CACHE: 'CMakeCache.txt',

  /** Bundled assets, relative to the package root */
  ASSETS: 'assets',
  NO_CODE_SIGN_XCCONFIG: 'NoCodeSign.xcconfig',
  INFO_PLIST_TEMPLATE: 'Info.plist.in'
};

/** Environment variable names */
export const ENV_VARS = {
  /** Toolchain used when --toolchain is absent */
  TOOLCHAIN: 'BUILDPILOT_TOOLCHAIN',

  /** Directory of toolchain files */
  TOOLCHAIN_ROOT: 'BUILDPILOT_TOOLCHAIN_ROOT',

  /** Log level */
  LOG_LEVEL: 'BUILDPILOT_LOG_LEVEL',

  /** Disables ANSI colours */
  NO_COLOR: 'NO_COLOR',

  /** Apple developer root consumed by xcodebuild */
  DEVELOPER_DIR: 'DEVELOPER_DIR',

  /** xcconfig overriding Xcode build settings */
  XCODE_XCCONFIG_FILE: 'XCODE_XCCONFIG_FILE',

  PATH: 'PATH'
};

/** CMake definitions emitted by the configure command */
export const CMAKE_FLAGS = {
  VERBOSE: [
    '-DCMAKE_VERBOSE_MAKEFILE=ON',
    '-DTOOLCHAIN_STATUS_DEBUG=ON',
    '-DHUNTER_STATUS_DEBUG=ON'
  ],
  IOS_MULTIARCH: '-DCMAKE_XCODE_ATTRIBUTE_ONLY_ACTIVE_ARCH=NO',
  IOS_COMBINED: '-DCMAKE_IOS_INSTALL_COMBINED=YES'
};

/** Separator after which `cmake --build` forwards arguments to the native tool */
export const NATIVE_ARGS_SEPARATOR = '--';

/** Oldest Visual Studio whose msbuild takes /maxcpucount */
export const MIN_MAXCPUCOUNT_VS_VERSION = 12;

/** Simulator architectures removed from device-only frameworks */
export const SIMULATOR_ARCHS = ['i386', 'x86_64'];

/** CPack generators accepted by --pack */
export const PACK_GENERATORS = [
  '7Z',
  'TBZ2',
  'TGZ',
  'TXZ',
  'TZ',
  'ZIP',
  'STGZ',
  'DEB',
  'RPM',
  'NSIS',
  'WIX',
  'DragNDrop',
  'Bundle',
  'productbuild'
] as const;

export type PackGenerator = (typeof PACK_GENERATORS)[number];

/** Validation patterns */
export const VALIDATION = {
  /** Toolchain names double as path components */
  TOOLCHAIN_NAME_PATTERN: /^[A-Za-z0-9._-]+$/
};

/** Settings read from the process environment */
export interface EnvironmentConfig {
  toolchain?: string;
  toolchainRoot: string;
  logLevel: LogLevel;
  colors: boolean;
}

/**
 * Get current platform information
 */
export function getCurrentPlatform(): Platform {
  switch (process.platform) {
    case 'darwin':
      return Platform.Darwin;
    case 'win32':
      return Platform.Win32;
    case 'linux':
      return Platform.Linux;
    default:
      return Platform.Other;
  }
}

/**
 * Default CPack generator for a platform
 */
export function defaultPackGenerator(platform: Platform): PackGenerator {
  switch (platform) {
    case Platform.Win32:
      return 'ZIP';
    case Platform.Darwin:
      return 'DragNDrop';
    default:
      return 'TGZ';
  }
}

/**
 * Root of the installed package (holds assets/)
 */
export function getPackageRoot(): string {
  return resolve(__dirname, '..');
}

/**
 * Path of a bundled asset
 */
export function getAssetPath(name: string): string {
  return join(getPackageRoot(), PATHS.ASSETS, name);
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').toLowerCase();
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? DEFAULT_CONFIG.LOG_LEVEL;
}

/**
 * Read orchestrator settings from an environment
 */
export function loadEnvironmentConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): EnvironmentConfig {
  const toolchain = env[ENV_VARS.TOOLCHAIN];
  const toolchainRoot = env[ENV_VARS.TOOLCHAIN_ROOT];

  return {
    toolchain: toolchain ? toolchain : undefined,
    toolchainRoot: resolve(cwd, toolchainRoot ? toolchainRoot : DEFAULT_CONFIG.TOOLCHAIN_ROOT),
    logLevel: parseLogLevel(env[ENV_VARS.LOG_LEVEL]),
    colors: !env[ENV_VARS.NO_COLOR]
  };
}
