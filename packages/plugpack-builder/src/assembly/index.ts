export { assemble, assertOutputLocation, majorMinor, packageFileName, INSTALL_HOOK_FILES } from './assembler';
export type { AssembledPackage, AssembleOptions } from './assembler';
export { writeAptIndex, verifyAptIndex } from './apt-index';
export { writeYumIndex, verifyYumIndex } from './yum-index';
export { writeBundle } from './bundle';
export * from './backends';
