/**
 * Structural checks of Debian binary packages
 */

import { gunzipSync } from 'zlib';
import { ArFormatError, ArMember, readArMembers } from './ar';
import { ControlFields, controlField, parseControl } from './control';
import { readTarEntry } from './tar';

export class DebFormatError extends Error {}

export interface DebPackageInfo {
  /** Control fields; empty when the control archive uses a compression we do not read */
  control: ControlFields;
  controlVerified: boolean;
  /** Member name of the control archive, e.g. `control.tar.gz` */
  controlMember: string;
}

const REQUIRED_CONTROL_FIELDS = ['Package', 'Version', 'Architecture'];

async function readControlArchive(member: string, data: Buffer): Promise<ControlFields | null> {
  let tarball: Buffer;
  if (member === 'control.tar.gz') {
    try {
      tarball = gunzipSync(data);
    } catch {
      throw new DebFormatError(`${member} is not valid gzip data`);
    }
  } else if (member === 'control.tar') {
    tarball = data;
  } else {
    return null;
  }

  let control: Buffer | null;
  try {
    control = await readTarEntry(tarball, 'control');
  } catch {
    throw new DebFormatError(`${member} is not a valid tar archive`);
  }
  if (control === null) {
    throw new DebFormatError(`${member} does not contain a control file`);
  }

  return parseControl(control.toString('utf-8'));
}

function membersOf(buffer: Buffer): ArMember[] {
  try {
    return readArMembers(buffer);
  } catch (error) {
    if (error instanceof ArFormatError) {
      throw new DebFormatError(error.message);
    }
    throw error;
  }
}

export async function readDebPackage(buffer: Buffer): Promise<DebPackageInfo> {
  const members = membersOf(buffer);
  const [binary, control] = members;
  if (!binary || binary.name !== 'debian-binary') {
    throw new DebFormatError('first member is not debian-binary');
  }
  if (!/^2\.\d+\n?$/.test(binary.data.toString('latin1'))) {
    throw new DebFormatError(`unsupported debian-binary version "${binary.data.toString('latin1').trim()}"`);
  }
  if (!control || !control.name.startsWith('control.tar')) {
    throw new DebFormatError('control archive member is missing');
  }
  if (!members.some((member) => member.name.startsWith('data.tar'))) {
    throw new DebFormatError('data archive member is missing');
  }

  const fields = await readControlArchive(control.name, control.data);
  if (fields === null) {
    return { control: [], controlVerified: false, controlMember: control.name };
  }

  const missing = REQUIRED_CONTROL_FIELDS.filter((name) => !controlField(fields, name));
  if (missing.length > 0) {
    throw new DebFormatError(`control file lacks ${missing.join(', ')}`);
  }

  return { control: fields, controlVerified: true, controlMember: control.name };
}

/**
 * `<package>_<version without epoch>_<architecture>.deb`
 */
export function expectedDebFileName(control: ControlFields): string {
  const version = (controlField(control, 'Version') ?? '').replace(/^\d+:/, '');
  return `${controlField(control, 'Package')}_${version}_${controlField(control, 'Architecture')}.deb`;
}
