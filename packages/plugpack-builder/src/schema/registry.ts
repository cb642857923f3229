/**
 * Schema Registry
 *
 * Maps a declared package_format_version to its schema. Unknown versions
 * are rejected; there is no fallback to an older schema.
 */

import { UnsupportedFormatVersionError } from '@plugpack/errors';
import type { FormatVersion } from '../types/plugin';
import type { PluginSchema } from './types';
import { schemaV1 } from './v1';
import { schemaV2 } from './v2';
import { schemaV3 } from './v3';

const SCHEMAS: Readonly<Record<FormatVersion, PluginSchema>> = Object.freeze({
  '1.0.0': schemaV1,
  '2.0.0': schemaV2,
  '3.0.0': schemaV3,
});

export function supportedFormatVersions(): FormatVersion[] {
  return [schemaV1.formatVersion, schemaV2.formatVersion, schemaV3.formatVersion];
}

export function isSupportedFormatVersion(value: unknown): value is FormatVersion {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SCHEMAS, value);
}

/**
 * @throws UnsupportedFormatVersionError for any value outside the registry
 */
export function schemaFor(formatVersion: unknown): PluginSchema {
  if (!isSupportedFormatVersion(formatVersion)) {
    throw new UnsupportedFormatVersionError(describe(formatVersion), supportedFormatVersions());
  }
  return SCHEMAS[formatVersion];
}

function describe(value: unknown): string {
  if (value === undefined) {
    return '(missing)';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}
