/**
 * @fileoverview CMake build orchestration
 *
 * Resolves a named toolchain, plans the output layout, composes the
 * configure/build/test/pack command lines and the child environment,
 * then runs them in order with a persistent execution log.
 */

export * from './types.js';
export * from './config.js';

export * from './toolchains/table.js';
export * from './toolchains/resolver.js';

export { buildTagFor, LayoutPlanner } from './layout.js';
export { EnvironmentComposer, type EnvironmentComposerOptions, applyOverlay } from './environment.js';
export * from './sdk.js';
export * from './targets.js';
export { effectiveVerbosity, validateOptions } from './options.js';
export * from './commands.js';

export * from './artifacts/archive.js';
export * from './artifacts/framework.js';
export { ProjectOpener } from './open-project.js';
export * from './pipeline.js';

export { Logger, type LogOutput, type LoggerConfig, logger, configureLogger, createLogger } from './utils/logger.js';
export * from './utils/execution-log.js';
export * from './utils/process.js';
export * from './utils/timer.js';
export { removeTree } from './utils/fs.js';
