export type { NativePackageRequest, NativePackager, RepositoryIndexer } from './types';
export { RpmbuildPackager } from './rpmbuild';
export { CreaterepoIndexer } from './createrepo';
export { findExecutable, findMissingCommands } from './commands';
