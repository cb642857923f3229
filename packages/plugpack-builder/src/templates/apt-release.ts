/**
 * Release file of a flat apt repository
 */

export interface ReleaseChecksum {
  file: string;
  size: number;
  md5: string;
  sha1: string;
  sha256: string;
}

export interface AptReleaseData {
  origin: string;
  label: string;
  /** Plugin `major.minor` */
  version: string;
  suite: string;
  architectures: readonly string[];
  components: readonly string[];
  checksums: readonly ReleaseChecksum[];
}

function section(title: string, checksums: readonly ReleaseChecksum[], pick: (c: ReleaseChecksum) => string): string {
  return `${title}:\n${checksums.map((c) => ` ${pick(c)} ${String(c.size).padStart(16)} ${c.file}`).join('\n')}\n`;
}

export function renderAptRelease(data: AptReleaseData): string {
  return (
    `Origin: ${data.origin}\n` +
    `Label: ${data.label}\n` +
    `Suite: ${data.suite}\n` +
    `Version: ${data.version}\n` +
    `Architectures: ${data.architectures.join(' ')}\n` +
    `Components: ${data.components.join(' ')}\n` +
    section('MD5Sum', data.checksums, (c) => c.md5) +
    section('SHA1', data.checksums, (c) => c.sha1) +
    section('SHA256', data.checksums, (c) => c.sha256)
  );
}
