/**
 * @fileoverview Tests for FrameworkAssembler
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { BuildErrorCode } from '../../types.js';
import { FrameworkAssembler, renderInfoPlist } from '../framework.js';
import { FakeProcessRunner, makeTempDir, touch } from '../../__tests__/test-utils.js';

const TEMPLATE = '<key>CFBundleName</key><string>@NAME@</string>\n<key>MinimumOSVersion</key><string>@MINIMUM_OS_VERSION@</string>\n';

describe('renderInfoPlist', () => {
  it('fills the placeholders', () => {
    expect(renderInfoPlist(TEMPLATE, 'demo', '12.1')).toBe(
      '<key>CFBundleName</key><string>demo</string>\n<key>MinimumOSVersion</key><string>12.1</string>\n'
    );
  });

  it('leaves the version empty when unknown', () => {
    expect(renderInfoPlist('@MINIMUM_OS_VERSION@|@NAME@', 'demo')).toBe('|demo');
  });
});

describe('FrameworkAssembler', () => {
  let tempDir: string;
  let installDir: string;
  let frameworkDir: string;
  let templatePath: string;

  beforeEach(() => {
    tempDir = makeTempDir();
    installDir = join(tempDir, '_install', 'ios');
    frameworkDir = join(tempDir, '_framework', 'ios');
    templatePath = touch(join(tempDir, 'Info.plist.in'), TEMPLATE);
    touch(join(installDir, 'lib', 'libdemo_util.a'));
    touch(join(installDir, 'lib', 'libdemo.a'));
    touch(join(installDir, 'include', 'demo', 'demo.h'), '#pragma once\n');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('combines libraries, strips simulator slices and signs', async () => {
    const runner = new FakeProcessRunner(undefined, () => ({
      exitCode: 0,
      stdout: 'i386 x86_64 armv7 arm64\n',
      stderr: ''
    }));
    const assembler = new FrameworkAssembler(runner, templatePath);

    const bundle = await assembler.create({
      installDir,
      frameworkDir,
      name: 'demo',
      minimumOsVersion: '12.1',
      deviceOnly: true,
      identity: 'Test Identity',
      env: {}
    });

    const binary = join(bundle, 'demo');
    expect(bundle).toBe(join(frameworkDir, 'demo.framework'));
    expect(runner.commands()).toEqual([
      ['libtool', '-static', '-o', binary, join(installDir, 'lib', 'libdemo.a'), join(installDir, 'lib', 'libdemo_util.a')],
      ['lipo', '-archs', binary],
      ['lipo', binary, '-remove', 'i386', '-remove', 'x86_64', '-output', binary],
      ['codesign', '--force', '--sign', 'Test Identity', binary]
    ]);
    expect(readFileSync(join(bundle, 'Headers', 'demo', 'demo.h'), 'utf8')).toBe('#pragma once\n');
    expect(readFileSync(join(bundle, 'Info.plist'), 'utf8')).toBe(renderInfoPlist(TEMPLATE, 'demo', '12.1'));
  });

  it('keeps every slice and skips signing for a universal framework', async () => {
    const runner = new FakeProcessRunner();
    const bundle = await new FrameworkAssembler(runner, templatePath).create({
      installDir,
      frameworkDir,
      name: 'demo',
      deviceOnly: false,
      env: {}
    });

    expect(runner.commands().map(argv => argv[0])).toEqual(['libtool']);
    expect(existsSync(join(bundle, 'Info.plist'))).toBe(true);
  });

  it('copies a user supplied Info.plist', async () => {
    const plist = touch(join(tempDir, 'Custom.plist'), '<plist>custom</plist>\n');

    const bundle = await new FrameworkAssembler(new FakeProcessRunner(), templatePath).create({
      installDir,
      frameworkDir,
      name: 'demo',
      deviceOnly: false,
      plist,
      env: {}
    });

    expect(readFileSync(join(bundle, 'Info.plist'), 'utf8')).toBe('<plist>custom</plist>\n');
  });

  it('requires static libraries in the install tree', async () => {
    rmSync(join(installDir, 'lib'), { recursive: true });

    await expect(
      new FrameworkAssembler(new FakeProcessRunner(), templatePath).create({
        installDir,
        frameworkDir,
        name: 'demo',
        deviceOnly: false,
        env: {}
      })
    ).rejects.toMatchObject({ code: BuildErrorCode.ArtifactAssemblyFailed });
  });
});
