/**
 * Reader for the `ar` container used by .deb files
 */

export const AR_MAGIC = '!<arch>\n';
const HEADER_SIZE = 60;

export interface ArMember {
  name: string;
  size: number;
  /** Offset of the member data in the archive */
  offset: number;
  data: Buffer;
}

export class ArFormatError extends Error {}

/**
 * Parses every member header and checks that each member lies inside the
 * buffer. Throws ArFormatError on the first structural problem.
 */
export function readArMembers(buffer: Buffer): ArMember[] {
  if (buffer.length < AR_MAGIC.length || buffer.toString('latin1', 0, AR_MAGIC.length) !== AR_MAGIC) {
    throw new ArFormatError('missing ar archive signature');
  }

  const members: ArMember[] = [];
  let offset = AR_MAGIC.length;

  while (offset < buffer.length) {
    // A single padding newline may end the archive
    if (offset === buffer.length - 1 && buffer[offset] === 0x0a) {
      break;
    }
    if (offset + HEADER_SIZE > buffer.length) {
      throw new ArFormatError(`truncated member header at byte ${offset}`);
    }

    const header = buffer.toString('latin1', offset, offset + HEADER_SIZE);
    if (header.slice(58, 60) !== '`\n') {
      throw new ArFormatError(`bad member header at byte ${offset}`);
    }

    const name = header.slice(0, 16).trim().replace(/\/$/, '');
    const sizeField = header.slice(48, 58).trim();
    if (!/^\d+$/.test(sizeField)) {
      throw new ArFormatError(`member "${name}" has an invalid size field`);
    }

    const size = Number(sizeField);
    const dataOffset = offset + HEADER_SIZE;
    if (dataOffset + size > buffer.length) {
      throw new ArFormatError(
        `member "${name}" is truncated (${buffer.length - dataOffset} of ${size} bytes present)`
      );
    }

    members.push({ name, size, offset: dataOffset, data: buffer.subarray(dataOffset, dataOffset + size) });
    offset = dataOffset + size + (size % 2);
  }

  return members;
}
