/**
 * Static toolchain registry
 */

import { z } from 'zod';
import {
  Architecture,
  BuildError,
  BuildErrorCode,
  Platform,
  ToolchainDescriptor
} from '../types.js';
import { VALIDATION } from '../config.js';
import toolchainData from './toolchains.json';

const platformList = z.array(z.nativeEnum(Platform)).nonempty();

/** Schema for one entry of toolchains.json; absent traits default to false */
export const toolchainDescriptorSchema = z
  .object({
    name: z.string().regex(VALIDATION.TOOLCHAIN_NAME_PATTERN, 'must be a filesystem-safe name'),
    generator: z.string().default(''),
    multiconfig: z.boolean().default(false),
    isMake: z.boolean().default(false),
    isNMake: z.boolean().default(false),
    isNinja: z.boolean().default(false),
    isXcode: z.boolean().default(false),
    isMsvc: z.boolean().default(false),
    vsVersion: z.number().int().positive().optional(),
    arch: z.nativeEnum(Architecture).optional(),
    iosVersion: z.string().min(1).optional(),
    osxVersion: z.string().min(1).optional(),
    xp: z.boolean().default(false),
    noCodeSign: z.boolean().default(false),
    platforms: platformList.optional(),
    defaultFor: platformList.optional(),
    rootEnvVar: z.string().min(1).optional()
  })
  .strict()
  .refine(entry => !entry.xp || entry.vsVersion !== undefined, {
    message: 'xp toolset requires vsVersion',
    path: ['xp']
  });

export const toolchainTableSchema = z.array(toolchainDescriptorSchema);

/**
 * Ordered, immutable registry of toolchain descriptors.
 * Duplicate names and competing platform defaults are rejected on construction.
 */
export class ToolchainTable {
  private readonly entries: ToolchainDescriptor[] = [];
  private readonly byName = new Map<string, ToolchainDescriptor>();
  private readonly defaults = new Map<Platform, ToolchainDescriptor>();

  constructor(descriptors: Iterable<ToolchainDescriptor>) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Get descriptor by name
   */
  lookup(name: string): ToolchainDescriptor | null {
    return this.byName.get(name) ?? null;
  }

  /**
   * All descriptors in registration order
   */
  all(): readonly ToolchainDescriptor[] {
    return this.entries;
  }

  names(): string[] {
    return this.entries.map(entry => entry.name);
  }

  /**
   * Descriptor marked as the default for a platform
   */
  defaultFor(platform: Platform): ToolchainDescriptor | null {
    return this.defaults.get(platform) ?? null;
  }

  get size(): number {
    return this.entries.length;
  }

  private register(descriptor: ToolchainDescriptor): void {
    if (this.byName.has(descriptor.name)) {
      throw new BuildError(
        BuildErrorCode.InvalidToolchainTable,
        `Duplicate toolchain name: ${descriptor.name}`
      );
    }

    for (const platform of descriptor.defaultFor ?? []) {
      const existing = this.defaults.get(platform);
      if (existing) {
        throw new BuildError(
          BuildErrorCode.InvalidToolchainTable,
          `Both ${existing.name} and ${descriptor.name} are marked default for ${platform}`
        );
      }
    }

    const frozen = Object.freeze({ ...descriptor });
    this.entries.push(frozen);
    this.byName.set(frozen.name, frozen);
    for (const platform of frozen.defaultFor ?? []) {
      this.defaults.set(platform, frozen);
    }
  }
}

/**
 * Validate raw table data and build a registry from it
 */
export function parseToolchainTable(data: unknown): ToolchainTable {
  const result = toolchainTableSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new BuildError(BuildErrorCode.InvalidToolchainTable, issues);
  }

  return new ToolchainTable(result.data);
}

let builtinTable: ToolchainTable | undefined;

/**
 * The registry shipped with the package
 */
export function getBuiltinToolchainTable(): ToolchainTable {
  if (!builtinTable) {
    builtinTable = parseToolchainTable(toolchainData);
  }
  return builtinTable;
}

/**
 * Help text listing every toolchain, one per line
 */
export function formatToolchainList(table: ToolchainTable): string {
  return table
    .all()
    .map(entry => {
      const generator = entry.generator ? ` (${entry.generator})` : '';
      return `  ${entry.name}${generator}`;
    })
    .join('\n');
}
