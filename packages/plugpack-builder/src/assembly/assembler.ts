/**
 * Package Assembler
 *
 * Stages the plugin tree, regenerates repository indexes, writes the
 * integrity manifest and packs the result in the layout of the format
 * version. Everything happens in a temporary directory beside the output;
 * the output directory is only touched once the package is complete.
 */

import fs from 'fs-extra';
import path from 'path';
import { AssemblyIOError, isAppError } from '@plugpack/errors';
import type { Logger } from '@plugpack/logger';
import { generateManifest, IntegrityManifest, MANIFEST_FILE, serializeManifest } from '../manifest/integrity';
import type { OutputLayout } from '../schema/types';
import type { FormatVersion, OsKind, PluginDescriptor } from '../types/plugin';
import type { ValidatedPlugin } from '../validation/validator';
import { renderRpmSpec } from '../templates/rpm-spec';
import { writeAptIndex } from './apt-index';
import type { NativePackager, RepositoryIndexer } from './backends/types';
import { writeBundle } from './bundle';
import { isPathInside, stagePluginTree } from './staging';
import { writeYumIndex } from './yum-index';

export const INSTALL_HOOK_FILES = {
  preInstallHook: 'pre_install.sh',
  postInstallHook: 'post_install.sh',
  uninstallHook: 'uninstall.sh',
} as const;

const RPM_RELEASE = '1';
const RPM_SPEC_FILE = 'plugin_rpm.spec';

export interface AssembleOptions {
  logger: Logger;
  /** Required for the native-package layout */
  packager?: NativePackager;
  /** Required when a native package has centos releases */
  indexer?: RepositoryIndexer;
}

export interface AssembledPackage {
  formatVersion: FormatVersion;
  layout: OutputLayout;
  outputPath: string;
  packagePath: string;
  /** Staged files, relative to the plugin root */
  files: string[];
  manifest: IntegrityManifest;
  manifestPath: string;
}

/**
 * `1.2.3` → `1.2`
 */
export function majorMinor(version: string): string {
  return version.split('.').slice(0, 2).join('.');
}

/**
 * True for a package a previous build of the same plugin left behind
 */
export function isPackageArtifact(fileName: string, descriptor: PluginDescriptor, layout: OutputLayout): boolean {
  const suffix = layout === 'legacy-bundle' ? '.fp' : '.noarch.rpm';
  return fileName.startsWith(`${descriptor.name}-`) && fileName.endsWith(suffix);
}

export function packageFileName(descriptor: PluginDescriptor, layout: OutputLayout): string {
  if (layout === 'legacy-bundle') {
    return `${descriptor.name}-${descriptor.version}.fp`;
  }
  return `${descriptor.name}-${majorMinor(descriptor.version)}-${descriptor.version}-${RPM_RELEASE}.noarch.rpm`;
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  return (await fs.pathExists(filePath)) ? fs.readFile(filePath, 'utf-8') : undefined;
}

/**
 * Distinct repository directories per OS, in release order
 */
function repositoriesByOs(descriptor: PluginDescriptor): Record<OsKind, string[]> {
  const found: Record<OsKind, string[]> = { ubuntu: [], centos: [] };
  for (const release of descriptor.releases) {
    const normalized = path.normalize(release.repository_path);
    if (!found[release.os].includes(normalized)) {
      found[release.os].push(normalized);
    }
  }
  return found;
}

/**
 * @throws AssemblyIOError when the output directory is the plugin directory or contains it
 */
export function assertOutputLocation(pluginRoot: string, outputDir: string): void {
  if (isPathInside(pluginRoot, outputDir)) {
    throw new AssemblyIOError(`Output directory ${outputDir} must not contain the plugin directory ${pluginRoot}`, {
      pluginRoot,
      outputDir,
    });
  }
}

class Assembly {
  private readonly descriptor: PluginDescriptor;
  private readonly layout: OutputLayout;

  constructor(
    private readonly plugin: ValidatedPlugin,
    private readonly outputDir: string,
    private readonly tempDir: string,
    private readonly options: AssembleOptions
  ) {
    this.descriptor = plugin.descriptor;
    this.layout = plugin.schema.layout;
  }

  private get stagingDir(): string {
    return path.join(this.tempDir, 'src');
  }

  private get finishedDir(): string {
    return path.join(this.tempDir, 'out');
  }

  async run(): Promise<AssembledPackage> {
    const { logger } = this.options;

    await stagePluginTree(this.plugin.root, this.stagingDir, {
      excludeDirs: [this.outputDir, this.tempDir],
    });
    logger.debug('Staged plugin tree', { stagingDir: this.stagingDir });

    if (this.layout === 'native-package') {
      await this.buildRepositories();
    }

    const manifest = await generateManifest(this.stagingDir, undefined, { exclude: [MANIFEST_FILE] });
    const manifestText = serializeManifest(manifest);
    await fs.writeFile(path.join(this.stagingDir, MANIFEST_FILE), manifestText, 'utf-8');
    logger.debug('Wrote integrity manifest', { files: manifest.entries.length });

    await fs.ensureDir(this.finishedDir);
    const fileName = packageFileName(this.descriptor, this.layout);
    const packageFile = path.join(this.finishedDir, fileName);

    if (this.layout === 'legacy-bundle') {
      await writeBundle(this.stagingDir, `${this.descriptor.name}-${this.descriptor.version}`, packageFile);
    } else {
      const produced = await this.buildNativePackage(fileName);
      await fs.copy(produced, packageFile);
    }
    await fs.writeFile(path.join(this.finishedDir, MANIFEST_FILE), manifestText, 'utf-8');

    await this.commit();

    return {
      formatVersion: this.plugin.schema.formatVersion,
      layout: this.layout,
      outputPath: this.outputDir,
      packagePath: path.join(this.outputDir, fileName),
      files: manifest.entries.map((entry) => entry.path),
      manifest,
      manifestPath: path.join(this.outputDir, MANIFEST_FILE),
    };
  }

  private async buildRepositories(): Promise<void> {
    const { logger } = this.options;
    const repositories = repositoriesByOs(this.descriptor);

    for (const repository of repositories.ubuntu) {
      const result = await writeAptIndex(path.join(this.stagingDir, repository), {
        origin: this.descriptor.name,
        version: majorMinor(this.descriptor.version),
      });
      logger.info('Indexed apt repository', { repository, packages: result.packages });
    }

    if (repositories.centos.length > 0) {
      const indexer = this.options.indexer;
      if (!indexer) {
        throw new AssemblyIOError('No repository indexer configured for centos repositories', {
          repositories: repositories.centos,
        });
      }
      for (const repository of repositories.centos) {
        const count = await writeYumIndex(path.join(this.stagingDir, repository), indexer);
        logger.info('Indexed yum repository', { repository, packages: count, indexer: indexer.name });
      }
    }
  }

  private async buildNativePackage(fileName: string): Promise<string> {
    const packager = this.options.packager;
    if (!packager) {
      throw new AssemblyIOError('No native packager configured', { layout: this.layout });
    }

    const fullName = `${this.descriptor.name}-${majorMinor(this.descriptor.version)}`;
    const buildRoot = path.join(this.tempDir, 'rpm');
    const source = `${fullName}.fp`;
    await writeBundle(this.stagingDir, fullName, path.join(buildRoot, 'SOURCES', source));

    const hooks = this.plugin.schema.installHooks
      ? {
          preInstallHook: await readIfExists(path.join(this.plugin.root, INSTALL_HOOK_FILES.preInstallHook)),
          postInstallHook: await readIfExists(path.join(this.plugin.root, INSTALL_HOOK_FILES.postInstallHook)),
          uninstallHook: await readIfExists(path.join(this.plugin.root, INSTALL_HOOK_FILES.uninstallHook)),
        }
      : {};

    const specFile = path.join(buildRoot, RPM_SPEC_FILE);
    await fs.writeFile(
      specFile,
      renderRpmSpec({
        name: fullName,
        version: this.descriptor.version,
        release: RPM_RELEASE,
        summary: this.descriptor.title,
        description: this.descriptor.description,
        license: (this.descriptor.licenses ?? []).join(' and '),
        homepage: this.descriptor.homepage ?? '',
        vendor: (this.descriptor.authors ?? []).join(', '),
        source,
        ...hooks,
      }),
      'utf-8'
    );

    this.options.logger.info('Building native package', { packager: packager.name, file: fileName });
    return packager.buildPackage({ buildRoot, specFile, packageFileName: fileName });
  }

  /** Delete-then-write: previous artifacts go away only now, other files stay */
  private async commit(): Promise<void> {
    await fs.ensureDir(this.outputDir);
    for (const entry of await fs.readdir(this.outputDir)) {
      if (entry === MANIFEST_FILE || isPackageArtifact(entry, this.descriptor, this.layout)) {
        await fs.remove(path.join(this.outputDir, entry));
      }
    }
    for (const entry of await fs.readdir(this.finishedDir)) {
      await fs.move(path.join(this.finishedDir, entry), path.join(this.outputDir, entry), { overwrite: true });
    }
  }
}

/**
 * Assembles a validated plugin into `outputDir`. On failure the previous
 * content of `outputDir` is left as it was.
 *
 * Builds writing to the same output directory must not run concurrently.
 *
 * @throws AssemblyIOError
 */
export async function assemble(
  plugin: ValidatedPlugin,
  outputDir: string,
  options: AssembleOptions
): Promise<AssembledPackage> {
  const output = path.resolve(outputDir);
  assertOutputLocation(plugin.root, output);

  let tempDir: string;
  try {
    await fs.ensureDir(path.dirname(output));
    tempDir = await fs.mkdtemp(path.join(path.dirname(output), `.${path.basename(output)}.staging-`));
  } catch (error) {
    throw new AssemblyIOError(`Cannot create a staging directory next to ${output}`, { outputDir: output }, error);
  }

  try {
    return await new Assembly(plugin, output, tempDir, options).run();
  } catch (error) {
    if (isAppError(error)) {
      throw error;
    }
    throw new AssemblyIOError(
      `Assembling ${plugin.descriptor.name} failed: ${error instanceof Error ? error.message : String(error)}`,
      { outputDir: output },
      error
    );
  } finally {
    await fs.remove(tempDir);
  }
}
