/**
 * Host version parsing, used once at startup to decide whether items carry
 * meaningful numeric sub-types.
 *
 * @module domain/version/HostVersion
 */

export interface HostVersion {
  major: number;
  minor: number;
  patch: number;
}

/** First release with flattened item identifiers. */
export const FLATTENING_VERSION: HostVersion = { major: 1, minor: 13, patch: 0 };

const SERVER_STRING_PATTERN = /\(MC: (\d+)\.(\d+)(?:\.(\d+))?\)/;
const PLAIN_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?(?:$|[-_\s])/;

/**
 * Accepts `1.12.2`, `1.8`, `1.16.5-R0.1-SNAPSHOT` or a full server string
 * such as `git-Paper-196 (MC: 1.12.2)`.
 */
export function parseHostVersion(raw: string): HostVersion {
  const trimmed = raw.trim();
  const match =
    SERVER_STRING_PATTERN.exec(trimmed) ?? PLAIN_PATTERN.exec(trimmed);

  if (!match) {
    throw new Error(`Unrecognized host version '${raw}'`);
  }

  return {
    major: parseInt(match[1], 10),
    minor: parseInt(match[2], 10),
    patch: match[3] ? parseInt(match[3], 10) : 0,
  };
}

export function compareVersions(a: HostVersion, b: HostVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

/**
 * Whether the host predates the identifier flattening, i.e. item sub-types
 * still distinguish items.
 */
export function isLegacyHost(version: HostVersion): boolean {
  return compareVersions(version, FLATTENING_VERSION) < 0;
}
