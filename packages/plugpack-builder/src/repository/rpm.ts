/**
 * Structural checks of RPM packages: lead, signature header and main
 * header must be intact and lie inside the file.
 */

export class RpmFormatError extends Error {}

export interface RpmPackageInfo {
  name: string;
  version: string;
  release: string;
  arch: string;
}

const LEAD_SIZE = 96;
const LEAD_MAGIC = 0xedabeedb;
const HEADER_MAGIC = 0x8eade8;
const HEADER_INTRO_SIZE = 16;
const INDEX_ENTRY_SIZE = 16;
const MAX_INDEX_ENTRIES = 0xffff;
const MAX_HEADER_DATA = 256 * 1024 * 1024;

const RPM_STRING_TYPE = 6;
const RPM_I18NSTRING_TYPE = 9;

const TAG_NAME = 1000;
const TAG_VERSION = 1001;
const TAG_RELEASE = 1002;
const TAG_ARCH = 1022;

interface HeaderStructure {
  /** Offset just past the header store */
  end: number;
  strings: Map<number, string>;
}

function readHeader(buffer: Buffer, offset: number, label: string): HeaderStructure {
  if (offset + HEADER_INTRO_SIZE > buffer.length) {
    throw new RpmFormatError(`${label} header is truncated`);
  }
  if (buffer.readUIntBE(offset, 3) !== HEADER_MAGIC || buffer[offset + 3] !== 0x01) {
    throw new RpmFormatError(`${label} header has a bad magic number`);
  }

  const entries = buffer.readUInt32BE(offset + 8);
  const dataSize = buffer.readUInt32BE(offset + 12);
  if (entries > MAX_INDEX_ENTRIES || dataSize > MAX_HEADER_DATA) {
    throw new RpmFormatError(`${label} header declares an implausible size`);
  }

  const indexStart = offset + HEADER_INTRO_SIZE;
  const storeStart = indexStart + entries * INDEX_ENTRY_SIZE;
  const end = storeStart + dataSize;
  if (end > buffer.length) {
    throw new RpmFormatError(`${label} header is truncated (${buffer.length} of ${end} bytes present)`);
  }

  const strings = new Map<number, string>();
  for (let i = 0; i < entries; i++) {
    const entry = indexStart + i * INDEX_ENTRY_SIZE;
    const tag = buffer.readUInt32BE(entry);
    const type = buffer.readUInt32BE(entry + 4);
    const dataOffset = buffer.readUInt32BE(entry + 8);
    if (dataOffset >= dataSize) {
      throw new RpmFormatError(`${label} header entry ${tag} points outside the header`);
    }
    if (type === RPM_STRING_TYPE || type === RPM_I18NSTRING_TYPE) {
      const start = storeStart + dataOffset;
      const terminator = buffer.indexOf(0, start);
      if (terminator < 0 || terminator >= end) {
        throw new RpmFormatError(`${label} header string for tag ${tag} is not terminated`);
      }
      strings.set(tag, buffer.toString('utf-8', start, terminator));
    }
  }

  return { end, strings };
}

export function readRpmPackage(buffer: Buffer): RpmPackageInfo {
  if (buffer.length < LEAD_SIZE) {
    throw new RpmFormatError('file is shorter than the rpm lead');
  }
  if (buffer.readUInt32BE(0) !== LEAD_MAGIC) {
    throw new RpmFormatError('missing rpm lead signature');
  }

  const signature = readHeader(buffer, LEAD_SIZE, 'signature');
  // The main header starts on the next 8-byte boundary
  const mainOffset = signature.end + ((8 - (signature.end % 8)) % 8);
  const main = readHeader(buffer, mainOffset, 'main');

  if (main.end >= buffer.length) {
    throw new RpmFormatError('payload is missing');
  }

  const tags: Array<[keyof RpmPackageInfo, number]> = [
    ['name', TAG_NAME],
    ['version', TAG_VERSION],
    ['release', TAG_RELEASE],
    ['arch', TAG_ARCH],
  ];
  const missing = tags.filter(([, tag]) => !main.strings.get(tag)).map(([field]) => field);
  if (missing.length > 0) {
    throw new RpmFormatError(`main header lacks ${missing.join(', ')}`);
  }

  return {
    name: main.strings.get(TAG_NAME) ?? '',
    version: main.strings.get(TAG_VERSION) ?? '',
    release: main.strings.get(TAG_RELEASE) ?? '',
    arch: main.strings.get(TAG_ARCH) ?? '',
  };
}

/**
 * `<name>-<version>-<release>.<arch>.rpm`
 */
export function expectedRpmFileName(info: RpmPackageInfo): string {
  return `${info.name}-${info.version}-${info.release}.${info.arch}.rpm`;
}
