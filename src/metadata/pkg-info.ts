// Metadata file (PKG-INFO) parsing.
//
// The file is a block of "Key: Value" header lines, optionally followed by a
// blank line and a free-form body.

import type { PkgInfoFields, PkgInfoIdentity } from './types.js';

const NAME_PREFIX = 'Name:';
const VERSION_PREFIX = 'Version:';

/**
 * Extract the package name and version.
 * The first line starting with each prefix wins; values are trimmed.
 */
export function parsePkgInfo(content: string): PkgInfoIdentity {
  const identity: PkgInfoIdentity = {};

  for (const line of splitLines(content)) {
    if (identity.version === undefined && line.startsWith(VERSION_PREFIX)) {
      identity.version = valueAfterColon(line);
    } else if (identity.name === undefined && line.startsWith(NAME_PREFIX)) {
      identity.name = valueAfterColon(line);
    }
    if (identity.name !== undefined && identity.version !== undefined) break;
  }

  return identity;
}

/**
 * Read every header field in file order. Indented lines continue the
 * previous field and are dropped when there is none. Parsing stops at the
 * first blank line.
 */
export function readPkgInfoFields(content: string): PkgInfoFields {
  const fields: PkgInfoFields = [];

  for (const line of splitLines(content)) {
    if (line.trim() === '') break;

    if (/^\s/.test(line)) {
      const previous = fields[fields.length - 1];
      if (previous) previous[1] = `${previous[1]}\n${line.trim()}`;
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    fields.push([line.slice(0, colon).trim(), valueAfterColon(line)]);
  }

  return fields;
}

/** All values recorded for a key, in file order */
export function getPkgInfoValues(fields: PkgInfoFields, key: string): string[] {
  return fields.filter(([k]) => k === key).map(([, value]) => value);
}

function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

function valueAfterColon(line: string): string {
  return line.slice(line.indexOf(':') + 1).trim();
}
