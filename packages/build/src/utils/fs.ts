/**
 * Filesystem helpers
 */

import { existsSync, promises as fsPromises } from 'fs';
import { BuildError, BuildErrorCode } from '../types.js';
import { createLogger } from './logger.js';

const logger = createLogger('fs');

/**
 * Recursively remove a directory. A missing directory is a no-op; any other
 * failure is fatal. Resolves to whether something was removed.
 */
export async function removeTree(path: string): Promise<boolean> {
  if (!existsSync(path)) {
    logger.debug(`Nothing to remove at ${path}`);
    return false;
  }

  logger.info(`Removing ${path}`);
  try {
    await fsPromises.rm(path, { recursive: true });
  } catch (error) {
    throw new BuildError(
      BuildErrorCode.RemoveFailed,
      `${path}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  return true;
}
