/**
 * Pluggable writers for OS-native package formats and repository indexes.
 * The defaults shell out to the platform tools.
 */

export interface NativePackageRequest {
  /** rpm `_topdir`; the source tarball is already in `SOURCES/` */
  buildRoot: string;
  specFile: string;
  /** File name the backend must produce, e.g. `demo-1.0-1.0.0-1.noarch.rpm` */
  packageFileName: string;
}

export interface NativePackager {
  readonly name: string;
  /** Executables that must be on PATH */
  readonly requiredCommands: readonly string[];
  /** @returns absolute path of the produced package */
  buildPackage(request: NativePackageRequest): Promise<string>;
}

export interface RepositoryIndexer {
  readonly name: string;
  readonly requiredCommands: readonly string[];
  /** Regenerates `repodata/` inside the repository directory */
  index(repositoryDir: string): Promise<void>;
}
