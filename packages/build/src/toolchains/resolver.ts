/**
 * Toolchain selection against the registry
 */

import { BuildError, BuildErrorCode, Platform, ToolchainDescriptor } from '../types.js';
import { ToolchainTable } from './table.js';

/**
 * Resolves a requested toolchain name, or the platform default, to a descriptor
 */
export class ToolchainResolver {
  constructor(private readonly table: ToolchainTable) {}

  resolve(requestedName: string | undefined, platform: Platform): ToolchainDescriptor {
    if (requestedName === undefined || requestedName === '') {
      return this.resolveDefault(platform);
    }

    const descriptor = this.table.lookup(requestedName);
    if (!descriptor) {
      throw new BuildError(
        BuildErrorCode.UnknownToolchain,
        `${requestedName} (run with --help to list available toolchains)`
      );
    }

    if (!isAvailableOn(descriptor, platform)) {
      throw new BuildError(
        BuildErrorCode.UnsupportedOnPlatform,
        `Toolchain ${descriptor.name} requires ${(descriptor.platforms ?? []).join(' or ')}, host is ${platform}`
      );
    }

    return descriptor;
  }

  private resolveDefault(platform: Platform): ToolchainDescriptor {
    const descriptor = this.table.defaultFor(platform);
    if (!descriptor) {
      throw new BuildError(
        BuildErrorCode.NoDefaultForPlatform,
        `${platform}; pass --toolchain explicitly`
      );
    }
    return descriptor;
  }
}

/**
 * Whether a toolchain can be used from a host platform
 */
export function isAvailableOn(descriptor: ToolchainDescriptor, platform: Platform): boolean {
  return descriptor.platforms === undefined || descriptor.platforms.includes(platform);
}
