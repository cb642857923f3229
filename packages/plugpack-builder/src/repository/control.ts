/**
 * Debian control-file (RFC 822 style) parsing and serialization
 */

export type ControlFields = Array<[string, string]>;

export function parseControl(text: string): ControlFields {
  const fields: ControlFields = [];
  for (const line of text.split('\n')) {
    if (line.trim().length === 0) {
      if (fields.length > 0) break;
      continue;
    }
    if (/^\s/.test(line) && fields.length > 0) {
      const last = fields[fields.length - 1];
      last[1] = `${last[1]}\n${line}`;
      continue;
    }
    const colon = line.indexOf(':');
    if (colon > 0) {
      fields.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
    }
  }
  return fields;
}

export function controlField(fields: ControlFields, name: string): string | undefined {
  const lower = name.toLowerCase();
  return fields.find(([key]) => key.toLowerCase() === lower)?.[1];
}

export function serializeControl(fields: ControlFields): string {
  return fields.map(([key, value]) => `${key}: ${value}`).join('\n') + '\n';
}
