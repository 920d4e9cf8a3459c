/**
 * Build orchestration: resolve, compose, then run each stage in order
 */

import { existsSync, readFileSync } from 'fs';
import { copyFile, mkdir } from 'fs/promises';
import { basename, join, resolve } from 'path';
import {
  BuildError,
  BuildErrorCode,
  BuildOptions,
  BuildStage,
  Platform,
  ResolvedBuildContext,
  isBuildError
} from './types.js';
import { DEFAULT_CONFIG, PATHS, getCurrentPlatform } from './config.js';
import { ToolchainTable, getBuiltinToolchainTable } from './toolchains/table.js';
import { ToolchainResolver } from './toolchains/resolver.js';
import { EnvironmentComposer, applyOverlay } from './environment.js';
import { LayoutPlanner } from './layout.js';
import { CommandComposer } from './commands.js';
import { effectiveVerbosity, validateOptions } from './options.js';
import {
  EnvironmentSdkLocator,
  SdkLocator,
  VcVarsEnvironmentProvider,
  VendorEnvironmentProvider
} from './sdk.js';
import { ArchiveAssembler } from './artifacts/archive.js';
import { FrameworkAssembler } from './artifacts/framework.js';
import { ProjectOpener } from './open-project.js';
import { ExecutionLog } from './utils/execution-log.js';
import { LogOutput, createLogger } from './utils/logger.js';
import { ProcessRunner, SpawnProcessRunner } from './utils/process.js';
import { StageTimer, StageTiming } from './utils/timer.js';
import { removeTree } from './utils/fs.js';

const logger = createLogger('pipeline');

/** Collaborators and host facts the pipeline depends on */
export interface PipelineDependencies {
  table: ToolchainTable;
  platform: Platform;
  /** Inherited environment */
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Directory of {toolchain}.cmake files */
  toolchainRoot: string;
  sdkLocator: SdkLocator;
  vendorEnvironment: VendorEnvironmentProvider;
  /** Runner for the build stages, writing to the execution log */
  createRunner: (log: ExecutionLog) => ProcessRunner;
  removeTree: (path: string) => Promise<boolean>;
  /** Console sink for tool output and the summary */
  console: LogOutput;
  now: () => number;
}

/** Outcome of a successful run */
export interface BuildReport {
  context: ResolvedBuildContext;
  logFile: string;
  timings: StageTiming[];
  /** Configure skipped because the build directory was already configured */
  configureSkipped: boolean;
  archivePath?: string;
  frameworkPath?: string;
}

/**
 * Default dependencies for the current host
 */
export function createDefaultDependencies(
  overrides: Partial<PipelineDependencies> = {}
): PipelineDependencies {
  const cwd = overrides.cwd ?? process.cwd();

  return {
    table: getBuiltinToolchainTable(),
    platform: getCurrentPlatform(),
    env: process.env,
    cwd,
    toolchainRoot: resolve(cwd, DEFAULT_CONFIG.TOOLCHAIN_ROOT),
    sdkLocator: new EnvironmentSdkLocator(),
    vendorEnvironment: new VcVarsEnvironmentProvider(new SpawnProcessRunner()),
    createRunner: log => new SpawnProcessRunner(log),
    removeTree,
    console: process.stdout,
    now: Date.now,
    ...overrides
  };
}

/**
 * Locate Test.xml written by `ctest -T Test` (Testing/TAG names the run)
 */
export function findTestXml(buildDir: string): string {
  const tagFile = join(buildDir, 'Testing', 'TAG');
  if (!existsSync(tagFile)) {
    throw new BuildError(BuildErrorCode.ArtifactAssemblyFailed, `ctest did not write ${tagFile}`, {
      stage: BuildStage.Test
    });
  }

  const tag = readFileSync(tagFile, 'utf8').split(/\r?\n/)[0].trim();
  const xml = join(buildDir, 'Testing', tag, 'Test.xml');
  if (!tag || !existsSync(xml)) {
    throw new BuildError(BuildErrorCode.ArtifactAssemblyFailed, `Test results not found: ${xml}`, {
      stage: BuildStage.Test
    });
  }
  return xml;
}

/**
 * Sequential build pipeline. Every validation happens in prepare(), before
 * any build stage starts; any non-zero exit afterwards aborts the run.
 */
export class BuildPipeline {
  private readonly deps: PipelineDependencies;

  constructor(deps: Partial<PipelineDependencies> = {}) {
    this.deps = createDefaultDependencies(deps);
  }

  /**
   * Resolve the toolchain and compose layout, commands and environment
   */
  async prepare(options: BuildOptions): Promise<ResolvedBuildContext> {
    const { platform, table, cwd } = this.deps;

    validateOptions(options, platform);

    const toolchain = new ToolchainResolver(table).resolve(options.toolchain, platform);
    logger.info(`Toolchain: ${toolchain.name}`);

    const layout = new LayoutPlanner(cwd).plan(options.output, toolchain, options.config);
    logger.info(`Build dir: ${layout.buildDir}`);

    const composer = new CommandComposer({
      toolchainRoot: options.toolchainRoot ? resolve(cwd, options.toolchainRoot) : this.deps.toolchainRoot
    });
    const commands = composer.plan({ toolchain, layout }, options, platform);

    const environment = await new EnvironmentComposer({
      sdkLocator: this.deps.sdkLocator,
      vendorEnvironment: this.deps.vendorEnvironment
    }).compose(toolchain, this.deps.env);

    return Object.freeze({ toolchain, layout, environment, commands });
  }

  async run(options: BuildOptions): Promise<BuildReport> {
    const context = await this.prepare(options);
    const { toolchain, layout, commands } = context;
    const { cwd } = this.deps;

    if (options.clear) {
      for (const dir of [layout.buildDir, layout.installDir, layout.frameworkDir]) {
        await this.deps.removeTree(dir);
      }
    }

    const log = new ExecutionLog({
      logFile: layout.logFile,
      verbosity: effectiveVerbosity(options),
      discard: options.discard,
      tail: options.tail,
      console: this.deps.console
    });
    log.open();
    await mkdir(layout.buildDir, { recursive: true });

    const runner = this.deps.createRunner(log);
    const env = applyOverlay(context.environment, this.deps.env);
    const timer = new StageTimer(this.deps.now);

    const exec = async (stage: BuildStage, argv: string[], workingDir: string): Promise<void> => {
      const exitCode = await runner.run({ argv, env, cwd: workingDir });
      if (exitCode !== 0) {
        log.printTail();
        throw new BuildError(
          BuildErrorCode.ExternalToolFailed,
          `${stage} exited with ${exitCode}, see ${log.path}`,
          { stage, exitCode }
        );
      }
    };

    // Assemblers run their own tools; a failed tool still gets the tail printed
    const assemble = async <T>(work: () => Promise<T>): Promise<T> => {
      try {
        return await work();
      } catch (error) {
        if (isBuildError(error) && error.code === BuildErrorCode.ExternalToolFailed) {
          log.printTail();
        }
        throw error;
      }
    };

    const report: BuildReport = {
      context,
      logFile: log.path,
      timings: [],
      configureSkipped: false
    };

    await exec(BuildStage.Preflight, this.deps.platform === Platform.Win32 ? ['where', 'cmake'] : ['which', 'cmake'], cwd);
    await exec(BuildStage.Preflight, ['cmake', '--version'], cwd);

    const configured = existsSync(join(layout.buildDir, PATHS.CMAKE_CACHE));
    if (configured && !options.reconfig) {
      logger.info(`${PATHS.CMAKE_CACHE} exists, skipping configure (use --reconfig to force)`);
      report.configureSkipped = true;
    } else {
      await timer.time('Configure', () => exec(BuildStage.Configure, commands.configure, cwd));
    }

    if (!options.nobuild) {
      await timer.time('Build', () => exec(BuildStage.Build, commands.build, cwd));

      if (options.archive) {
        const archive = options.archive;
        report.archivePath = await timer.time('Archive', () =>
          assemble(() => new ArchiveAssembler(runner).create({
            installDir: layout.installDir,
            archivesDir: layout.archivesDir,
            name: archive,
            toolchain: toolchain.name,
            config: options.config,
            env
          }))
        );
      }

      if (options.framework || options.frameworkDevice) {
        report.frameworkPath = await timer.time('Framework', () =>
          assemble(() => new FrameworkAssembler(runner).create({
            installDir: layout.installDir,
            frameworkDir: layout.frameworkDir,
            name: basename(resolve(cwd, options.home ?? DEFAULT_CONFIG.HOME)),
            minimumOsVersion: toolchain.iosVersion,
            deviceOnly: Boolean(options.frameworkDevice),
            plist: options.plist ? resolve(cwd, options.plist) : undefined,
            identity: options.identity,
            env
          }))
        );
      }

      const testCommand = commands.test;
      if (testCommand) {
        await timer.time('Test', async () => {
          await exec(BuildStage.Test, testCommand, layout.buildDir);
          if (options.testXml) {
            await copyFile(findTestXml(layout.buildDir), resolve(cwd, options.testXml));
          }
        });
      }

      const packCommand = commands.pack;
      if (packCommand) {
        await timer.time('Pack', () => exec(BuildStage.Pack, packCommand, layout.buildDir));
      }
    }

    if (options.open) {
      await assemble(() => new ProjectOpener(runner).open(toolchain, layout.buildDir, env));
    }

    report.timings = timer.results();
    this.printSummary(report, timer);
    return report;
  }

  private printSummary(report: BuildReport, timer: StageTimer): void {
    const out = this.deps.console;
    out.write('-\n');
    out.write(`Log saved: ${report.logFile}\n`);
    out.write('-\n');
    for (const line of timer.format()) {
      out.write(`${line}\n`);
    }
    out.write('-\n');
    out.write('SUCCESS\n');
  }
}
