/**
 * Core type definitions for the buildpilot orchestrator
 */

/** Host platforms a toolchain can be used from */
export enum Platform {
  Win32 = 'win32',
  Darwin = 'darwin',
  Linux = 'linux',
  Other = 'other'
}

/** Target architectures used by vendor environment snapshots */
export enum Architecture {
  X86 = 'x86',
  AMD64 = 'amd64',
  ARM = 'arm'
}

/** Log levels for the orchestrator's own messages */
export enum LogLevel {
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace'
}

/** Console verbosity for external tool output */
export type Verbosity = 'silent' | 'normal' | 'full';

/**
 * Immutable description of one toolchain. Behaviour differences are carried
 * by the trait flags; composers consult them instead of dispatching on type.
 */
export interface ToolchainDescriptor {
  /** Unique, filesystem-safe identifier */
  readonly name: string;
  /** CMake generator string, empty when the default generator is used */
  readonly generator: string;
  /** Configuration is selected at build time rather than configure time */
  readonly multiconfig: boolean;
  readonly isMake: boolean;
  readonly isNMake: boolean;
  readonly isNinja: boolean;
  readonly isXcode: boolean;
  readonly isMsvc: boolean;
  /** Visual Studio major version (10, 11, 12, 14, 15...) */
  readonly vsVersion?: number;
  readonly arch?: Architecture;
  /** iOS SDK version marker, e.g. "12.1" */
  readonly iosVersion?: string;
  /** macOS SDK version marker, e.g. "10.14" */
  readonly osxVersion?: string;
  /** Legacy XP toolset (-Tv{vs}0_xp) */
  readonly xp: boolean;
  readonly noCodeSign: boolean;
  /** Hosts able to use this toolchain; absent means every host */
  readonly platforms?: readonly Platform[];
  /** Hosts for which this toolchain is the default selection */
  readonly defaultFor?: readonly Platform[];
  /** Environment variable naming the external root of a cross-compiler family */
  readonly rootEnvVar?: string;
}

/** Environment additions applied on top of an inherited environment */
export interface EnvironmentOverlay {
  /** Start from `variables` alone instead of the inherited environment */
  readonly replaceInherited: boolean;
  readonly variables: Readonly<Record<string, string>>;
  /** Directories prefixed onto PATH, earliest first */
  readonly pathPrefixes: readonly string[];
}

/** Directory layout for one (toolchain, config) pair */
export interface BuildLayout {
  /** Root all other paths are derived from */
  root: string;
  /** Directory partition key */
  buildTag: string;
  buildDir: string;
  installDir: string;
  frameworkDir: string;
  archivesDir: string;
  /** Plain-text execution log */
  logFile: string;
}

/** Ordered argument vectors for each external tool invocation */
export interface CommandPlan {
  configure: string[];
  build: string[];
  test?: string[];
  pack?: string[];
}

/** Per-invocation context derived from the table and the user's options */
export interface ResolvedBuildContext {
  readonly toolchain: ToolchainDescriptor;
  readonly layout: BuildLayout;
  readonly environment: EnvironmentOverlay;
  readonly commands: CommandPlan;
}

/** Pipeline stages that invoke an external tool */
export enum BuildStage {
  Preflight = 'preflight',
  Configure = 'configure',
  Build = 'build',
  Archive = 'archive',
  Framework = 'framework',
  Test = 'test',
  Pack = 'pack',
  Open = 'open'
}

/** User options, as parsed from the command line */
export interface BuildOptions {
  toolchain?: string;
  config?: string;
  /** Project home directory (directory with CMakeLists.txt) */
  home?: string;
  /** Root directory for _builds, _install... */
  output?: string;
  toolchainRoot?: string;
  test?: boolean;
  testXml?: string;
  timeout?: number;
  /** Pack generator; `true` selects the platform default */
  pack?: string | boolean;
  archive?: string;
  nobuild?: boolean;
  open?: boolean;
  verbosityLevel?: Verbosity;
  verbose?: boolean;
  install?: boolean;
  strip?: boolean;
  iosMultiarch?: boolean;
  iosCombined?: boolean;
  framework?: boolean;
  frameworkDevice?: boolean;
  identity?: string;
  plist?: string;
  clear?: boolean;
  reconfig?: boolean;
  fwd?: string[];
  iossim?: boolean;
  jobs?: number;
  target?: string;
  discard?: number;
  tail?: number;
}

/** Build error codes, grouped by range */
export enum BuildErrorCode {
  // Toolchain and configuration errors (1000-1099)
  UnknownToolchain = 1000,
  UnsupportedOnPlatform = 1001,
  NoDefaultForPlatform = 1002,
  InvalidToolchainTable = 1003,
  InvalidOption = 1004,

  // Environment errors (2000-2099)
  MissingRequiredEnvVar = 2000,
  InvalidSdkRoot = 2001,

  // Layout and filesystem errors (3000-3099)
  InvalidRoot = 3000,
  RemoveFailed = 3001,

  // Command composition errors (4000-4099)
  ToolchainFileNotFound = 4000,
  ConflictingInstallMode = 4001,
  UnsupportedStripTarget = 4002,

  // External process errors (5000-5099)
  ExternalToolFailed = 5000,
  ProcessSpawnFailed = 5001,
  ArtifactAssemblyFailed = 5002
}

/** Build error class */
export class BuildError extends Error {
  public readonly stage?: BuildStage;
  public readonly exitCode?: number;

  constructor(
    public readonly code: BuildErrorCode,
    public readonly details: string,
    options: {
      stage?: BuildStage;
      exitCode?: number;
      cause?: Error;
    } = {}
  ) {
    super(`${BuildError.getMessageForCode(code)}: ${details}`);
    this.name = 'BuildError';
    this.stage = options.stage;
    this.exitCode = options.exitCode;
    if (options.cause) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, BuildError.prototype);
  }

  static getMessageForCode(code: BuildErrorCode): string {
    const messages: Record<BuildErrorCode, string> = {
      [BuildErrorCode.UnknownToolchain]: 'Unknown toolchain',
      [BuildErrorCode.UnsupportedOnPlatform]: 'Not supported on this platform',
      [BuildErrorCode.NoDefaultForPlatform]: 'No default toolchain for platform',
      [BuildErrorCode.InvalidToolchainTable]: 'Invalid toolchain table',
      [BuildErrorCode.InvalidOption]: 'Invalid option',
      [BuildErrorCode.MissingRequiredEnvVar]: 'Missing required environment variable',
      [BuildErrorCode.InvalidSdkRoot]: 'Invalid SDK root',
      [BuildErrorCode.InvalidRoot]: 'Invalid root directory',
      [BuildErrorCode.RemoveFailed]: 'Failed to remove directory',
      [BuildErrorCode.ToolchainFileNotFound]: 'Toolchain file not found',
      [BuildErrorCode.ConflictingInstallMode]: 'Conflicting install mode',
      [BuildErrorCode.UnsupportedStripTarget]: 'Strip target not supported',
      [BuildErrorCode.ExternalToolFailed]: 'External tool failed',
      [BuildErrorCode.ProcessSpawnFailed]: 'Failed to start process',
      [BuildErrorCode.ArtifactAssemblyFailed]: 'Artifact assembly failed'
    };

    return messages[code];
  }

  toJSON(): object {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      stage: this.stage,
      exitCode: this.exitCode,
      stack: this.stack
    };
  }
}

/** Type guard for build errors */
export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}
