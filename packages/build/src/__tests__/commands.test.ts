/**
 * @fileoverview Tests for CommandComposer
 */

import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { BuildErrorCode, Platform, ToolchainDescriptor } from '../types.js';
import { getBuiltinToolchainTable } from '../toolchains/table.js';
import { LayoutPlanner } from '../layout.js';
import { CommandComposer, CompositionContext, jobsArgs, resolvePackGenerator } from '../commands.js';

const TOOLCHAIN_ROOT = '/opt/toolchains';

function toolchain(name: string): ToolchainDescriptor {
  const descriptor = getBuiltinToolchainTable().lookup(name);
  if (!descriptor) {
    throw new Error(`missing toolchain ${name}`);
  }
  return descriptor;
}

function context(name: string, config?: string): CompositionContext {
  const descriptor = toolchain(name);
  return { toolchain: descriptor, layout: new LayoutPlanner('/tmp/proj').plan(undefined, descriptor, config) };
}

const composer = new CommandComposer({ toolchainRoot: TOOLCHAIN_ROOT, fileExists: () => true });

describe('CommandComposer', () => {
  describe('composeConfigure', () => {
    it('composes a single-config Ninja configure', () => {
      const command = composer.composeConfigure(context('ninja', 'Release'), { config: 'Release' }, Platform.Linux);

      expect(command).toEqual([
        'cmake',
        '-H.',
        `-B${join('/tmp/proj', '_builds', 'ninja-Release')}`,
        '-DCMAKE_BUILD_TYPE=Release',
        '-GNinja',
        `-DCMAKE_TOOLCHAIN_FILE=${join(TOOLCHAIN_ROOT, 'ninja.cmake')}`
      ]);
    });

    it('omits the build type for multi-config generators', () => {
      const command = composer.composeConfigure(context('xcode', 'Release'), { config: 'Release' }, Platform.Darwin);

      expect(command).toContain('-GXcode');
      expect(command.some(token => token.startsWith('-DCMAKE_BUILD_TYPE'))).toBe(false);
    });

    it('omits the generator when the toolchain uses the default one', () => {
      const command = composer.composeConfigure(context('default'), {}, Platform.Linux);
      expect(command.some(token => token.startsWith('-G'))).toBe(false);
    });

    it('selects the XP toolset after the generator', () => {
      const command = composer.composeConfigure(context('vs-12-2013-xp'), {}, Platform.Win32);
      const generator = command.indexOf('-GVisual Studio 12 2013');

      expect(generator).toBeGreaterThan(0);
      expect(command[generator + 1]).toBe('-Tv120_xp');
    });

    it('emits optional definitions in a fixed order', () => {
      const ctx = context('gcc', 'Debug');
      const command = composer.composeConfigure(
        ctx,
        {
          config: 'Debug',
          home: 'src',
          verbose: true,
          iosMultiarch: true,
          iosCombined: true,
          install: true,
          pack: true,
          fwd: ['BUILD_SHARED_LIBS=ON', 'OPT=1', 'OPT=2', 'NOVALUE']
        },
        Platform.Linux
      );

      expect(command).toEqual([
        'cmake',
        '-Hsrc',
        `-B${ctx.layout.buildDir}`,
        '-DCMAKE_BUILD_TYPE=Debug',
        '-GUnix Makefiles',
        `-DCMAKE_TOOLCHAIN_FILE=${join(TOOLCHAIN_ROOT, 'gcc.cmake')}`,
        '-DCMAKE_VERBOSE_MAKEFILE=ON',
        '-DTOOLCHAIN_STATUS_DEBUG=ON',
        '-DHUNTER_STATUS_DEBUG=ON',
        '-DCMAKE_XCODE_ATTRIBUTE_ONLY_ACTIVE_ARCH=NO',
        '-DCMAKE_IOS_INSTALL_COMBINED=YES',
        `-DCMAKE_INSTALL_PREFIX=${join('/tmp/proj', '_install', 'gcc')}`,
        '-DCPACK_GENERATOR=TGZ',
        '-DBUILD_SHARED_LIBS=ON',
        '-DOPT=1',
        '-DOPT=2',
        '-DNOVALUE'
      ]);
    });

    it('fails when the toolchain file is missing', () => {
      const strict = new CommandComposer({ toolchainRoot: TOOLCHAIN_ROOT, fileExists: () => false });

      expect(() => strict.composeConfigure(context('gcc'), {}, Platform.Linux)).toThrow(
        expect.objectContaining({
          code: BuildErrorCode.ToolchainFileNotFound,
          details: join(TOOLCHAIN_ROOT, 'gcc.cmake')
        })
      );
    });
  });

  describe('composeBuild', () => {
    it('passes targets and the native tool separator', () => {
      const ctx = context('ninja', 'Release');
      const plan = composer.plan(ctx, { config: 'Release', install: true, target: 'docs', jobs: 8 }, Platform.Linux);

      expect(plan.build).toEqual([
        'cmake',
        '--build',
        ctx.layout.buildDir,
        '--config',
        'Release',
        '--target',
        'install',
        'docs',
        '--'
      ]);
    });

    it('passes -jobs to Xcode', () => {
      const plan = composer.plan(context('xcode'), { jobs: 4 }, Platform.Darwin);
      expect(plan.build.slice(-3)).toEqual(['--', '-jobs', '4']);
    });

    it('selects the simulator before the jobs flag', () => {
      const plan = composer.plan(context('ios'), { iossim: true, jobs: 2 }, Platform.Darwin);
      expect(plan.build.slice(-7)).toEqual(['--', '-arch', 'i386', '-sdk', 'iphonesimulator', '-jobs', '2']);
    });
  });

  describe('composeTest', () => {
    it('adds config, verbosity, timeout and XML output', () => {
      const command = composer.composeTest(context('gcc', 'Release'), {
        config: 'Release',
        verbose: true,
        timeout: 30,
        testXml: 'results.xml'
      });

      expect(command).toEqual(['ctest', '-C', 'Release', '-VV', '--timeout', '30', '-T', 'Test', '--no-compress-output']);
    });

    it('is plain ctest by default', () => {
      expect(composer.composeTest(context('gcc'), {})).toEqual(['ctest']);
    });
  });

  describe('composePack', () => {
    it('uses the requested generator', () => {
      const command = composer.composePack(
        context('gcc', 'Release'),
        { config: 'Release', pack: 'TXZ', verbose: true },
        Platform.Linux
      );
      expect(command).toEqual(['cpack', '-C', 'Release', '-G', 'TXZ', '--verbose']);
    });

    it('falls back to the platform default generator', () => {
      expect(composer.composePack(context('vs-15-2017-win64'), { pack: true }, Platform.Win32)).toEqual([
        'cpack',
        '-G',
        'ZIP'
      ]);
    });
  });

  describe('plan', () => {
    it('includes test and pack only when requested', () => {
      const bare = composer.plan(context('gcc'), {}, Platform.Linux);
      expect(bare.test).toBeUndefined();
      expect(bare.pack).toBeUndefined();

      const full = composer.plan(context('gcc'), { testXml: 'out.xml', pack: 'TGZ' }, Platform.Linux);
      expect(full.test).toEqual(['ctest', '-T', 'Test', '--no-compress-output']);
      expect(full.pack).toEqual(['cpack', '-G', 'TGZ']);
    });

    it('rejects strip for non-Makefile generators', () => {
      expect(() => composer.plan(context('ninja'), { strip: true }, Platform.Linux)).toThrow(
        expect.objectContaining({ code: BuildErrorCode.UnsupportedStripTarget })
      );
    });
  });
});

describe('jobsArgs', () => {
  it('maps the job count per build driver', () => {
    expect(jobsArgs(toolchain('gcc'), 3)).toEqual(['-j', '3']);
    expect(jobsArgs(toolchain('xcode'), 3)).toEqual(['-jobs', '3']);
    expect(jobsArgs(toolchain('vs-12-2013'), 3)).toEqual(['/maxcpucount:3']);
    expect(jobsArgs(toolchain('vs-15-2017-win64'), 3)).toEqual(['/maxcpucount:3']);
  });

  it('adds nothing for drivers without a known flag', () => {
    expect(jobsArgs(toolchain('vs-11-2012'), 3)).toEqual([]);
    expect(jobsArgs(toolchain('nmake-vs-12-2013'), 3)).toEqual([]);
    expect(jobsArgs(toolchain('ninja'), 3)).toEqual([]);
  });

  it('adds nothing without a job count', () => {
    expect(jobsArgs(toolchain('gcc'), undefined)).toEqual([]);
  });
});

describe('resolvePackGenerator', () => {
  it('picks a default per platform', () => {
    expect(resolvePackGenerator({ pack: true }, Platform.Linux)).toBe('TGZ');
    expect(resolvePackGenerator({ pack: true }, Platform.Darwin)).toBe('DragNDrop');
    expect(resolvePackGenerator({ pack: true }, Platform.Win32)).toBe('ZIP');
  });

  it('keeps an explicit generator', () => {
    expect(resolvePackGenerator({ pack: '7Z' }, Platform.Linux)).toBe('7Z');
  });

  it('is undefined without --pack', () => {
    expect(resolvePackGenerator({}, Platform.Linux)).toBeUndefined();
  });
});
