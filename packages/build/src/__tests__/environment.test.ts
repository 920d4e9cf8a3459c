/**
 * @fileoverview Tests for EnvironmentComposer and applyOverlay
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { rmSync } from 'fs';
import { join } from 'path';
import { Architecture, BuildErrorCode, EnvironmentOverlay, ToolchainDescriptor } from '../types.js';
import { getBuiltinToolchainTable } from '../toolchains/table.js';
import { EnvironmentComposer, applyOverlay } from '../environment.js';
import { SdkKind, SdkLocator, VendorEnvironmentProvider } from '../sdk.js';
import { makeTempDir } from './test-utils.js';

function toolchain(name: string): ToolchainDescriptor {
  const descriptor = getBuiltinToolchainTable().lookup(name);
  if (!descriptor) {
    throw new Error(`missing toolchain ${name}`);
  }
  return descriptor;
}

class StaticSdkLocator implements SdkLocator {
  readonly requests: Array<[SdkKind, string]> = [];

  constructor(private readonly root: string | null) {}

  async developerRoot(kind: SdkKind, version: string): Promise<string | null> {
    this.requests.push([kind, version]);
    return this.root;
  }
}

class StaticVendorEnvironment implements VendorEnvironmentProvider {
  readonly requests: Array<[number, Architecture | undefined]> = [];

  constructor(private readonly variables: Record<string, string>) {}

  async snapshot(vsVersion: number, arch: Architecture | undefined): Promise<Record<string, string>> {
    this.requests.push([vsVersion, arch]);
    return { ...this.variables };
  }
}

describe('EnvironmentComposer', () => {
  let sdkLocator: StaticSdkLocator;
  let vendorEnvironment: StaticVendorEnvironment;
  let composer: EnvironmentComposer;
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
    sdkLocator = new StaticSdkLocator('/Applications/Xcode-10.1.app/Contents/Developer');
    vendorEnvironment = new StaticVendorEnvironment({ INCLUDE: 'C:\\VC\\include', Path: 'C:\\VC\\bin' });
    composer = new EnvironmentComposer({
      sdkLocator,
      vendorEnvironment,
      noCodeSignConfig: '/assets/NoCodeSign.xcconfig'
    });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('produces an empty overlay for plain toolchains', async () => {
    const overlay = await composer.compose(toolchain('gcc'), { PATH: '/usr/bin' });

    expect(overlay).toEqual({ replaceInherited: false, variables: {}, pathPrefixes: [] });
    expect(Object.isFrozen(overlay)).toBe(true);
    expect(Object.isFrozen(overlay.variables)).toBe(true);
    expect(vendorEnvironment.requests).toEqual([]);
    expect(sdkLocator.requests).toEqual([]);
  });

  describe('cross-compiler root', () => {
    it('prefixes PATH with the root directory', async () => {
      const overlay = await composer.compose(toolchain('mingw'), { MINGW_PATH: tempDir });
      expect(overlay.pathPrefixes).toEqual([tempDir]);
      expect(overlay.replaceInherited).toBe(false);
    });

    it('requires the variable to be set', async () => {
      await expect(composer.compose(toolchain('msys'), {})).rejects.toMatchObject({
        code: BuildErrorCode.MissingRequiredEnvVar,
        details: 'MSYS_PATH must be set for toolchain msys'
      });
    });

    it('requires the variable to name an existing directory', async () => {
      await expect(
        composer.compose(toolchain('mingw'), { MINGW_PATH: join(tempDir, 'absent') })
      ).rejects.toMatchObject({ code: BuildErrorCode.MissingRequiredEnvVar });
    });
  });

  describe('vendor environment', () => {
    it('replaces the inherited environment for NMake toolchains', async () => {
      const overlay = await composer.compose(toolchain('nmake-vs-15-2017-win64'), {});

      expect(vendorEnvironment.requests).toEqual([[15, Architecture.AMD64]]);
      expect(overlay.replaceInherited).toBe(true);
      expect(overlay.variables).toEqual({ INCLUDE: 'C:\\VC\\include', Path: 'C:\\VC\\bin' });
    });

    it('applies to Ninja toolchains bound to a Visual Studio version', async () => {
      const overlay = await composer.compose(toolchain('ninja-vs-12-2013-win64'), {});

      expect(vendorEnvironment.requests).toEqual([[12, Architecture.AMD64]]);
      expect(overlay.replaceInherited).toBe(true);
    });

    it('does not apply to plain Ninja', async () => {
      const overlay = await composer.compose(toolchain('ninja'), {});

      expect(vendorEnvironment.requests).toEqual([]);
      expect(overlay.replaceInherited).toBe(false);
    });
  });

  describe('Apple SDKs', () => {
    it('sets the developer root and the no-codesign xcconfig', async () => {
      const overlay = await composer.compose(toolchain('ios-nocodesign-12-1'), {});

      expect(sdkLocator.requests).toEqual([['ios', '12.1']]);
      expect(overlay.variables).toEqual({
        DEVELOPER_DIR: '/Applications/Xcode-10.1.app/Contents/Developer',
        XCODE_XCCONFIG_FILE: '/assets/NoCodeSign.xcconfig'
      });
    });

    it('looks up macOS developer roots', async () => {
      await composer.compose(toolchain('osx-10-14'), {});
      expect(sdkLocator.requests).toEqual([['osx', '10.14']]);
    });

    it('leaves DEVELOPER_DIR alone when no root is configured', async () => {
      const unset = new EnvironmentComposer({
        sdkLocator: new StaticSdkLocator(null),
        vendorEnvironment,
        noCodeSignConfig: '/assets/NoCodeSign.xcconfig'
      });

      const overlay = await unset.compose(toolchain('ios-12-1'), {});
      expect(overlay.variables).toEqual({});
    });
  });
});

describe('applyOverlay', () => {
  const overlay = (partial: Partial<EnvironmentOverlay>): EnvironmentOverlay => ({
    replaceInherited: false,
    variables: {},
    pathPrefixes: [],
    ...partial
  });

  it('layers variables and PATH prefixes over the inherited environment', () => {
    const inherited = { PATH: '/usr/bin', HOME: '/home/dev' };

    const env = applyOverlay(
      overlay({ variables: { CC: 'gcc' }, pathPrefixes: ['/opt/cross/bin'] }),
      inherited,
      ':'
    );

    expect(env).toEqual({ PATH: '/opt/cross/bin:/usr/bin', HOME: '/home/dev', CC: 'gcc' });
    expect(inherited).toEqual({ PATH: '/usr/bin', HOME: '/home/dev' });
  });

  it('starts from the overlay variables alone when replacing', () => {
    const env = applyOverlay(
      overlay({ replaceInherited: true, variables: { INCLUDE: 'C:\\inc' } }),
      { PATH: '/usr/bin' },
      ';'
    );

    expect(env).toEqual({ INCLUDE: 'C:\\inc' });
  });

  it('matches the PATH key case-insensitively', () => {
    const env = applyOverlay(overlay({ pathPrefixes: ['C:\\mingw\\bin'] }), { Path: 'C:\\Windows' }, ';');
    expect(env).toEqual({ Path: 'C:\\mingw\\bin;C:\\Windows' });
  });

  it('creates PATH when none is inherited', () => {
    const env = applyOverlay(overlay({ pathPrefixes: ['/a', '/b'] }), {}, ':');
    expect(env).toEqual({ PATH: '/a:/b' });
  });

  it('drops undefined inherited values', () => {
    const env = applyOverlay(overlay({}), { KEEP: '1', DROP: undefined }, ':');
    expect(env).toEqual({ KEEP: '1' });
  });
});
