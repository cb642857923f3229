/**
 * Unit tests for the build pipeline
 */

import fs from 'fs-extra';
import path from 'path';
import * as tar from 'tar-stream';
import { gunzipSync } from 'zlib';
import {
  AssemblyIOError,
  HookError,
  MissingCommandError,
  StagePlanError,
  UnsupportedFormatVersionError,
  ValidationFailedError,
} from '@plugpack/errors';
import { BUNDLE_MTIME } from '../../src/assembly/bundle';
import { MANIFEST_FILE, parseManifest } from '../../src/manifest/integrity';
import { build, BuildOptions } from '../../src/pipeline/build';
import { PLUGIN_INSTALL_DIR } from '../../src/templates/rpm-spec';
import type { Result } from '../../src/types/result';
import { FakeIndexer, FakePackager, RecordingHookRunner } from '../helpers/fake-backends';
import { buildDeb } from '../helpers/os-packages';
import { createPlugin, listFiles, makeTempDir, metadataFor, tasksFor } from '../helpers/plugin-tree';

interface TarEntry {
  name: string;
  type: string;
  mode: number;
  mtime: number;
}

async function tarEntries(file: string): Promise<TarEntry[]> {
  const extract = tar.extract();
  const entries: TarEntry[] = [];
  const done = new Promise<void>((resolve, reject) => {
    extract.on('entry', (header, stream, next) => {
      entries.push({
        name: header.name,
        type: header.type ?? 'file',
        mode: (header.mode ?? 0) & 0o777,
        mtime: header.mtime?.getTime() ?? 0,
      });
      stream.on('end', () => next());
      stream.resume();
    });
    extract.on('finish', () => resolve());
    extract.on('error', reject);
  });
  extract.end(gunzipSync(await fs.readFile(file)));
  await done;
  return entries;
}

function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function failure<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('expected the build to fail');
  }
  return result.error;
}

async function outputDir(): Promise<string> {
  return path.join(await makeTempDir(), 'out');
}

function nativeOptions(packager = new FakePackager(), indexer = new FakeIndexer()): BuildOptions {
  return { nativePackager: packager, repositoryIndexer: indexer, checkCommands: false };
}

describe('build', () => {
  describe('legacy bundles (1.0.0)', () => {
    it('writes the bundle and its manifest', async () => {
      const root = await createPlugin('1.0.0');
      const out = await outputDir();

      const artifact = unwrap(await build(root, out));

      expect(await listFiles(out)).toEqual([MANIFEST_FILE, 'demo_plugin-1.0.0.fp']);
      expect(artifact.packagePath).toBe(path.join(out, 'demo_plugin-1.0.0.fp'));
      expect(artifact.layout).toBe('legacy-bundle');
      expect(artifact.files).toEqual([
        'deployment_scripts/deploy.sh',
        'environment_config.yaml',
        'metadata.yaml',
        'tasks.yaml',
      ]);
      expect(artifact.plan.map((step) => step.task.id)).toEqual(['task-1', 'task-0']);
      expect(artifact.warnings).toEqual([]);
    });

    it('packs sorted entries under one top-level directory with a fixed timestamp', async () => {
      const root = await createPlugin('1.0.0');
      const out = await outputDir();

      const artifact = unwrap(await build(root, out));
      const entries = await tarEntries(artifact.packagePath);

      expect(entries[0]).toEqual({
        name: 'demo_plugin-1.0.0/',
        type: 'directory',
        mode: 0o755,
        mtime: BUNDLE_MTIME.getTime(),
      });
      expect(entries.filter((entry) => entry.type === 'file').map((entry) => entry.name)).toEqual([
        'demo_plugin-1.0.0/checksums.sha256',
        'demo_plugin-1.0.0/deployment_scripts/deploy.sh',
        'demo_plugin-1.0.0/environment_config.yaml',
        'demo_plugin-1.0.0/metadata.yaml',
        'demo_plugin-1.0.0/tasks.yaml',
      ]);
      expect(entries.every((entry) => entry.mtime === BUNDLE_MTIME.getTime())).toBe(true);
    });

    it('rebuilds to identical bytes', async () => {
      const root = await createPlugin('1.0.0');
      const out = await outputDir();

      unwrap(await build(root, out));
      const firstBundle = await fs.readFile(path.join(out, 'demo_plugin-1.0.0.fp'));
      const firstManifest = await fs.readFile(path.join(out, MANIFEST_FILE), 'utf-8');

      unwrap(await build(root, out));

      expect(await listFiles(out)).toEqual([MANIFEST_FILE, 'demo_plugin-1.0.0.fp']);
      expect((await fs.readFile(path.join(out, 'demo_plugin-1.0.0.fp'))).equals(firstBundle)).toBe(true);
      expect(await fs.readFile(path.join(out, MANIFEST_FILE), 'utf-8')).toBe(firstManifest);
      expect(await listFiles(path.dirname(out))).toEqual(['out']);
    });

    it('replaces earlier packages of the plugin and keeps unrelated files', async () => {
      const root = await createPlugin('1.0.0');
      const out = await outputDir();
      await fs.ensureDir(out);
      await fs.writeFile(path.join(out, 'keep-me.txt'), 'not ours');
      await fs.writeFile(path.join(out, 'other_plugin-1.0.0.fp'), 'not ours either');
      await fs.writeFile(path.join(out, 'demo_plugin-0.9.0.fp'), 'old bundle');
      await fs.writeFile(path.join(out, MANIFEST_FILE), 'old manifest');

      unwrap(await build(root, out));

      expect(await listFiles(out)).toEqual([
        MANIFEST_FILE,
        'demo_plugin-1.0.0.fp',
        'keep-me.txt',
        'other_plugin-1.0.0.fp',
      ]);
      expect(await fs.readFile(path.join(out, 'keep-me.txt'), 'utf-8')).toBe('not ours');
      expect(await fs.readFile(path.join(out, MANIFEST_FILE), 'utf-8')).not.toBe('old manifest');
    });

    it('writes the same manifest into the output and the bundle', async () => {
      const root = await createPlugin('1.0.0');
      const out = await outputDir();

      const artifact = unwrap(await build(root, out));
      const manifest = parseManifest(await fs.readFile(artifact.manifestPath, 'utf-8'));

      expect(manifest).toEqual(artifact.manifest);
      expect(manifest.entries.map((entry) => entry.path)).toEqual(artifact.files);
    });

    it('leaves an output directory inside the plugin out of the package', async () => {
      const root = await createPlugin('1.0.0');
      const out = path.join(root, 'dist');

      unwrap(await build(root, out));
      const artifact = unwrap(await build(root, out));

      expect(artifact.files.filter((file) => file.startsWith('dist/') || file.startsWith('.dist'))).toEqual([]);
      expect(await listFiles(out)).toEqual([MANIFEST_FILE, 'demo_plugin-1.0.0.fp']);
    });

    it('refuses an output directory that contains the plugin', async () => {
      const root = await createPlugin('1.0.0');

      const error = failure(await build(root, path.dirname(root)));

      expect(error).toBeInstanceOf(AssemblyIOError);
      expect(error.message).toBe(`Output directory ${path.dirname(root)} must not contain the plugin directory ${root}`);
    });
  });

  describe('native packages', () => {
    it('builds an rpm around the staged tree with indexed repositories', async () => {
      const root = await createPlugin('2.0.0');
      const out = await outputDir();
      const packager = new FakePackager();
      const indexer = new FakeIndexer();

      const artifact = unwrap(await build(root, out, nativeOptions(packager, indexer)));

      expect(await listFiles(out)).toEqual([MANIFEST_FILE, 'demo_plugin-1.0-1.0.0-1.noarch.rpm']);
      expect(artifact.layout).toBe('native-package');
      expect(artifact.files).toEqual([
        'deployment_scripts/deploy.sh',
        'environment_config.yaml',
        'metadata.yaml',
        'repositories/centos/repodata/repomd.xml',
        'repositories/ubuntu/Packages',
        'repositories/ubuntu/Packages.gz',
        'repositories/ubuntu/Release',
        'tasks.yaml',
      ]);
      expect(packager.requests).toHaveLength(1);
      expect(packager.requests[0].packageFileName).toBe('demo_plugin-1.0-1.0.0-1.noarch.rpm');
      expect(indexer.indexed).toHaveLength(1);
      expect(indexer.indexed[0].endsWith(path.join('repositories', 'centos'))).toBe(true);
    });

    it('renders the rpm spec from the metadata', async () => {
      const root = await createPlugin('2.0.0');
      const packager = new FakePackager();

      unwrap(await build(root, await outputDir(), nativeOptions(packager)));
      const lines = packager.specs[0].split('\n');

      expect(lines).toContain('%define name demo_plugin-1.0');
      expect(lines).toContain('%define version 1.0.0');
      expect(lines).toContain('Summary: Demo plugin');
      expect(lines).toContain('License: Apache License Version 2.0');
      expect(lines).toContain('Vendor: Test Author');
      expect(lines).toContain('Source0: demo_plugin-1.0.fp');
      expect(lines).toContain(`${PLUGIN_INSTALL_DIR}/demo_plugin-1.0`);
      expect(packager.specs[0]).not.toMatch(/^%pre$/m);
    });

    it('plans reboot tasks as reboot steps', async () => {
      const root = await createPlugin('2.0.0');

      const artifact = unwrap(await build(root, await outputDir(), nativeOptions()));

      expect(artifact.plan.map((step) => [step.kind, step.task.id])).toEqual([
        ['task', 'prepare'],
        ['reboot', 'restart'],
        ['task', 'configure'],
        ['task', 'report'],
      ]);
    });

    it('adds install hooks to the spec from 3.0.0', async () => {
      const root = await createPlugin('3.0.0', { files: { 'pre_install.sh': '#!/bin/sh\necho pre\n' } });
      const packager = new FakePackager();

      unwrap(await build(root, await outputDir(), nativeOptions(packager)));

      expect(packager.specs[0]).toContain('\n%pre\n#!/bin/sh\necho pre\n');
      expect(packager.specs[0]).not.toContain('%post');
    });

    it('ignores install hooks before 3.0.0', async () => {
      const root = await createPlugin('2.0.0', { files: { 'pre_install.sh': '#!/bin/sh\necho pre\n' } });
      const packager = new FakePackager();

      unwrap(await build(root, await outputDir(), nativeOptions(packager)));

      expect(packager.specs[0]).not.toMatch(/^%pre$/m);
    });

    it('names the backend commands that are not installed', async () => {
      const root = await createPlugin('2.0.0');
      const packager = new FakePackager();

      const error = failure(
        await build(root, await outputDir(), { ...nativeOptions(packager), checkCommands: true, env: { PATH: '' } })
      );

      expect(error).toBeInstanceOf(MissingCommandError);
      expect(error instanceof MissingCommandError && error.commands).toEqual(['fake-rpmbuild', 'fake-createrepo']);
      expect(packager.requests).toEqual([]);
    });

    it('keeps the previous output when a rebuild fails', async () => {
      const root = await createPlugin('2.0.0');
      const out = await outputDir();

      unwrap(await build(root, out, nativeOptions()));
      const before = await fs.readFile(path.join(out, MANIFEST_FILE), 'utf-8');

      const error = failure(await build(root, out, nativeOptions(new FakePackager(), new FakeIndexer(false))));

      expect(error).toBeInstanceOf(AssemblyIOError);
      expect(await listFiles(out)).toEqual([MANIFEST_FILE, 'demo_plugin-1.0-1.0.0-1.noarch.rpm']);
      expect(await fs.readFile(path.join(out, MANIFEST_FILE), 'utf-8')).toBe(before);
      expect(await listFiles(path.dirname(out))).toEqual(['out']);
    });
  });

  describe('failures before assembly', () => {
    it('rejects an unsupported format version without running the hook', async () => {
      const root = await createPlugin('2.0.0', {
        metadata: metadataFor('2.0.0', { package_format_version: '9.9.9' }),
        files: { pre_build_hook: '#!/bin/sh\nexit 0\n' },
      });
      await fs.chmod(path.join(root, 'pre_build_hook'), 0o755);
      const hookRunner = new RecordingHookRunner();
      const out = await outputDir();

      const error = failure(await build(root, out, { ...nativeOptions(), hookRunner }));

      expect(error).toBeInstanceOf(UnsupportedFormatVersionError);
      expect(hookRunner.calls).toEqual([]);
      expect(await fs.pathExists(out)).toBe(false);
    });

    it('reports every violation and writes nothing', async () => {
      const metadata = metadataFor('2.0.0');
      delete metadata.authors;
      const root = await createPlugin('2.0.0', { metadata });
      const packager = new FakePackager();
      const out = await outputDir();

      const error = failure(await build(root, out, nativeOptions(packager)));

      expect(error).toBeInstanceOf(ValidationFailedError);
      expect(error instanceof ValidationFailedError && error.violations.map((v) => v.ruleId)).toEqual(['required-field']);
      expect(packager.requests).toEqual([]);
      expect(await fs.pathExists(out)).toBe(false);
    });

    it('returns unreadable documents as violations', async () => {
      const root = await createPlugin('2.0.0');
      await fs.remove(path.join(root, 'tasks.yaml'));
      await fs.ensureDir(path.join(root, 'tasks.yaml'));
      const out = await outputDir();

      const error = failure(await build(root, out, nativeOptions()));

      expect(error).toBeInstanceOf(ValidationFailedError);
      expect(error instanceof ValidationFailedError && error.violations.map((v) => v.ruleId)).toEqual(['document-read']);
      expect(await fs.pathExists(out)).toBe(false);
    });

    it('reports a corrupted repository package at its location', async () => {
      const deb = await buildDeb({ name: 'broken', version: '1.0.0' });
      const root = await createPlugin('2.0.0', {
        files: { 'repositories/ubuntu/broken_1.0.0_all.deb': deb.subarray(0, deb.length - 10) },
      });
      const packager = new FakePackager();

      const error = failure(await build(root, await outputDir(), nativeOptions(packager)));
      const violations = error instanceof ValidationFailedError ? error.violations : [];

      expect(violations).toHaveLength(1);
      expect(violations[0].ruleId).toBe('repository-corruption');
      expect(violations[0].location).toEqual({ document: 'repositories/ubuntu', path: 'broken_1.0.0_all.deb' });
      expect(packager.requests).toEqual([]);
    });

    it('can refuse tasks that share stage and priority', async () => {
      const tasks = tasksFor('2.0.0');
      tasks.push({ id: 'notify', role: '*', stage: 'post_deployment', type: 'shell', parameters: { cmd: 'true', timeout: 5 } });
      const root = await createPlugin('2.0.0', { tasks });

      const lenient = unwrap(await build(root, await outputDir(), nativeOptions()));
      const strict = failure(await build(root, await outputDir(), { ...nativeOptions(), ties: 'error' }));

      expect(lenient.plan.map((step) => step.task.id).slice(-2)).toEqual(['report', 'notify']);
      expect(strict).toBeInstanceOf(StagePlanError);
      expect(strict.message).toBe('Tasks "report" and "notify" share stage post_deployment/0');
    });
  });

  describe('pre-build hook', () => {
    it('runs the hook in the plugin root and packs what it generates', async () => {
      const root = await createPlugin('1.0.0', { files: { pre_build_hook: '#!/bin/sh\n' } });
      await fs.chmod(path.join(root, 'pre_build_hook'), 0o755);
      const hookRunner = new RecordingHookRunner((cwd) => fs.writeFile(path.join(cwd, 'generated.txt'), 'made by hook'));

      const artifact = unwrap(await build(root, await outputDir(), { hookRunner }));

      expect(hookRunner.calls).toEqual([{ hookPath: path.join(root, 'pre_build_hook'), cwd: root }]);
      expect(artifact.files).toContain('generated.txt');
      expect(artifact.files).toContain('pre_build_hook');
    });

    it('skips a hook that is not executable', async () => {
      const root = await createPlugin('1.0.0', { files: { pre_build_hook: '#!/bin/sh\n' } });
      await fs.chmod(path.join(root, 'pre_build_hook'), 0o644);
      const hookRunner = new RecordingHookRunner();

      unwrap(await build(root, await outputDir(), { hookRunner }));

      expect(hookRunner.calls).toEqual([]);
    });

    it('stops the build when the hook fails', async () => {
      const root = await createPlugin('1.0.0', { files: { pre_build_hook: '#!/bin/sh\nexit 3\n' } });
      await fs.chmod(path.join(root, 'pre_build_hook'), 0o755);
      const hookPath = path.join(root, 'pre_build_hook');
      const hookRunner = new RecordingHookRunner(async () => {
        throw new HookError(hookPath, 3, 'boom');
      });
      const out = await outputDir();

      const error = failure(await build(root, out, { hookRunner }));

      expect(error).toBeInstanceOf(HookError);
      expect(error.message).toBe(`Pre-build hook ${hookPath} failed with exit code 3`);
      expect(await fs.pathExists(out)).toBe(false);
    });
  });
});
