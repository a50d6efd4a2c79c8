/**
 * Four-part module versions (major.minor[.build[.revision]])
 *
 * Absent build/revision components compare lower than 0, so "4.0" < "4.0.0".
 */

import type { Version } from "../types/metadata.js";

const MAX_COMPONENT = 0x7fffffff;
const ALL_ONES = 0xffff;

export const zeroVersion: Version = { major: 0, minor: 0, build: 0, revision: 0 };

export const createVersion = (
  major: number,
  minor: number,
  build?: number,
  revision?: number
): Version => ({ major, minor, build, revision });

/**
 * Parse a version string. Accepts a leading "v" and ignores a
 * "-prerelease" or "+metadata" suffix.
 */
export const parseVersion = (text: string): Version | undefined => {
  const trimmed = text.trim().replace(/^[vV]/, "");
  const core = trimmed.split(/[-+]/, 1)[0] ?? "";
  const parts = core.split(".");
  if (parts.length < 2 || parts.length > 4) {
    return undefined;
  }

  const numbers: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) return undefined;
    const value = Number.parseInt(part, 10);
    if (value > MAX_COMPONENT) return undefined;
    numbers.push(value);
  }

  const [major = 0, minor = 0, build, revision] = numbers;
  return createVersion(major, minor, build, revision);
};

const components = (version: Version): readonly number[] => [
  version.major,
  version.minor,
  version.build ?? -1,
  version.revision ?? -1,
];

export const compareVersions = (a: Version, b: Version): number => {
  const left = components(a);
  const right = components(b);
  for (let i = 0; i < left.length; i++) {
    const diff = (left[i] ?? -1) - (right[i] ?? -1);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
};

export const versionsEqual = (a: Version, b: Version): boolean =>
  compareVersions(a, b) === 0;

/**
 * Format a version, optionally limited to the first `fieldCount` components.
 */
export const formatVersion = (version: Version, fieldCount?: number): string => {
  const defined: number[] = [version.major, version.minor];
  if (version.build !== undefined) {
    defined.push(version.build);
    if (version.revision !== undefined) defined.push(version.revision);
  }
  const count = fieldCount === undefined ? defined.length : fieldCount;
  return defined.slice(0, count).join(".");
};

/** High 16 bits of the revision component */
export const majorRevision = (version: Version): number =>
  (version.revision ?? -1) >> 16;

export const isZeroOrAllOnes = (version: Version | undefined): boolean => {
  if (version === undefined) return true;
  const values = components(version);
  return (
    values.every((value) => value === 0) ||
    values.every((value) => value === ALL_ONES)
  );
};
